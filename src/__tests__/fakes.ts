import {
  AnswerJudgment,
  InterviewSetupInput,
  InterviewStateStore,
  NewSessionRecord,
  PersistenceAdapter,
  Persona,
  ProfileAnalysis,
  ProfileSource,
  QuestionRequest,
  QuestionSource,
  ReportContent,
  ReportRequest,
  ReportSource,
  ResearchSource,
  ScoringRequest,
  ScoringSource,
  SessionState,
  SessionSummary,
  StrategyPlan,
  Turn,
} from '../models/types';
import { ChatMessage, CompletionOptions, LlmClient } from '../services/ai/llmClient';
import { OrchestratorCollaborators } from '../services/interview-orchestrator/interviewOrchestrator';
import { CollaboratorError, PersistenceError } from '../utils/errors';

export const SETUP: InterviewSetupInput = {
  candidateName: 'Test Candidate',
  resumeText: 'Five years building payment APIs in TypeScript and Node.js.',
  jobDescription: 'Backend engineer working on Node.js services backed by MongoDB.',
  companyName: 'Acme Corp',
};

export const PROFILE: ProfileAnalysis = {
  matchedSkills: ['TypeScript', 'Node.js'],
  missingSkills: ['MongoDB'],
  strengths: ['API design'],
  weaknesses: ['Database modelling'],
  experienceLevel: 'mid',
  redFlags: [],
};

export class ScriptedLlm implements LlmClient {
  readonly calls: Array<{ messages: ChatMessage[]; options: CompletionOptions | undefined }> = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    const next = this.responses.shift();
    if (next === undefined) throw new Error('LLM script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function judgment(score: number): AnswerJudgment {
  return {
    score,
    strengths: `strength ${score}`,
    weaknesses: `weakness ${score}`,
    tip: `tip ${score}`,
    sentiment: 'confident',
  };
}

export class ScriptedScoring implements ScoringSource {
  readonly requests: ScoringRequest[] = [];

  constructor(private readonly script: Array<number | Error> = []) {}

  push(...entries: Array<number | Error>): void {
    this.script.push(...entries);
  }

  async scoreAnswer(request: ScoringRequest): Promise<AnswerJudgment> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) throw new Error('Scoring script exhausted');
    if (next instanceof Error) throw next;
    return judgment(next);
  }
}

export class FakeQuestions implements QuestionSource {
  readonly requests: QuestionRequest[] = [];
  mode: 'normal' | 'blank' | 'failing' = 'normal';

  async generateQuestion(request: QuestionRequest): Promise<string> {
    this.requests.push(request);
    if (this.mode === 'failing') throw new CollaboratorError('question', 'Question generation failed: offline');
    if (this.mode === 'blank') return '   ';
    return `${request.intensify ? 'Pushback' : 'Question'} ${request.stage} topic ${request.topic}`;
  }
}

export class FakeReports implements ReportSource {
  readonly requests: ReportRequest[] = [];
  failing = false;

  async generateReport(request: ReportRequest): Promise<ReportContent> {
    this.requests.push(request);
    if (this.failing) throw new CollaboratorError('report', 'Report generation failed: offline');
    return { verdict: 'Scripted verdict', roadmap: '1. Scripted step' };
  }
}

export class FakeProfiles implements ProfileSource {
  failing = false;

  async analyzeProfile(): Promise<ProfileAnalysis> {
    if (this.failing) throw new CollaboratorError('profile', 'Profile analysis returned malformed JSON');
    return PROFILE;
  }
}

export class FakeResearch implements ResearchSource {
  researchFailing = false;
  strategyFailing = false;
  persona: Persona = 'neutral';

  async researchCompany(company: string): Promise<string> {
    if (this.researchFailing) throw new CollaboratorError('research', 'Company research failed: offline');
    return `${company} ships fast and reviews design docs.`;
  }

  async planStrategy(): Promise<StrategyPlan> {
    if (this.strategyFailing) throw new CollaboratorError('strategy', 'Strategy planning failed: offline');
    return { strategy: `Adopt a ${this.persona} persona.`, persona: this.persona };
  }
}

type PersistenceOperation = 'createSession' | 'recordTurn' | 'saveProfile' | 'finishSession';

export class InMemoryPersistence implements PersistenceAdapter {
  readonly sessions: NewSessionRecord[] = [];
  readonly turns: Array<{ sessionId: string; turn: Turn }> = [];
  readonly profiles = new Map<string, ProfileAnalysis>();
  readonly finished = new Map<string, SessionSummary>();
  // Remaining failures per operation; Infinity fails every call
  readonly failures = new Map<PersistenceOperation, number>();

  fail(operation: PersistenceOperation, times: number = Infinity): void {
    this.failures.set(operation, times);
  }

  private check(operation: PersistenceOperation): void {
    const remaining = this.failures.get(operation) ?? 0;
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1);
      throw new PersistenceError(operation, `${operation} unavailable`);
    }
  }

  async createSession(record: NewSessionRecord): Promise<void> {
    this.check('createSession');
    this.sessions.push(record);
  }

  async recordTurn(sessionId: string, turn: Turn): Promise<void> {
    this.check('recordTurn');
    this.turns.push({ sessionId, turn: { ...turn } });
  }

  async saveProfile(sessionId: string, profile: ProfileAnalysis): Promise<void> {
    this.check('saveProfile');
    this.profiles.set(sessionId, profile);
  }

  async finishSession(sessionId: string, summary: SessionSummary): Promise<void> {
    this.check('finishSession');
    this.finished.set(sessionId, summary);
  }
}

export class InMemoryStateStore implements InterviewStateStore {
  readonly states = new Map<string, SessionState>();

  async load(sessionId: string): Promise<SessionState | null> {
    const state = this.states.get(sessionId);
    return state ? structuredClone(state) : null;
  }

  async save(state: SessionState): Promise<void> {
    this.states.set(state.sessionId, structuredClone(state));
  }
}

export interface TestCollaborators extends OrchestratorCollaborators {
  questions: FakeQuestions;
  scoring: ScriptedScoring;
  reports: FakeReports;
  profiles: FakeProfiles;
  research: FakeResearch;
  persistence: InMemoryPersistence;
}

export function createCollaborators(scores: Array<number | Error> = []): TestCollaborators {
  return {
    questions: new FakeQuestions(),
    scoring: new ScriptedScoring(scores),
    reports: new FakeReports(),
    profiles: new FakeProfiles(),
    research: new FakeResearch(),
    persistence: new InMemoryPersistence(),
  };
}
