import {
  AnswerJudgment,
  CurrentQuestion,
  DecisionState,
  InterviewReport,
  InterviewSetupInput,
  InterviewStage,
  OrchestratorPhase,
  PersistenceAdapter,
  Persona,
  PolicyDecision,
  ProfileAnalysis,
  ProfileSource,
  QuestionRequest,
  QuestionSource,
  ReportContent,
  ReportSource,
  ResearchSource,
  ScoringSource,
  SessionState,
  Turn,
} from '../../models/types';
import {
  PersistenceError,
  SkippedAnswerError,
  ValidationError,
  describeError,
} from '../../utils/errors';
import { INTERVIEW_POLICY, InterviewPolicy } from './interviewPolicy';
import { assertPhaseTransition } from './phaseTransitions';
import { decide } from './scoringPolicy';
import { planNextStage, selectPersona } from './stagePlanner';
import {
  addWarning,
  allScores,
  appendTurn,
  overallScore,
  questionCount,
  recentScores,
  transcript,
} from './sessionState';
import {
  FALLBACK_QUESTIONS,
  PUSHBACK_FALLBACK,
  emptyProfile,
  fallbackCompanyIntel,
  fallbackReport,
} from './fallbacks';
import { buildReportMarkdown } from './reportFormatter';

export interface OrchestratorCollaborators {
  questions: QuestionSource;
  scoring: ScoringSource;
  reports: ReportSource;
  profiles: ProfileSource;
  research: ResearchSource;
  persistence: PersistenceAdapter;
}

export interface StartResult {
  sessionId: string;
  question: CurrentQuestion;
  persona: Persona;
  profile: ProfileAnalysis;
  warnings: string[];
}

export interface TurnFeedback {
  questionNumber: number;
  score: number;
  strengths: string;
  weaknesses: string;
  tip: string;
  sentiment: string;
  skipped: boolean;
  evaluationDegraded: boolean;
}

export interface AnswerResult {
  decisionState: DecisionState;
  decision: PolicyDecision;
  nextQuestion: CurrentQuestion | null;
  feedback: TurnFeedback;
  stage: InterviewStage;
  persona: Persona;
  questionCount: number;
  terminationReason: string | null;
  report: InterviewReport | null;
  warnings: string[];
}

export const ENDED_BY_CANDIDATE = 'Ended by candidate';

interface Evaluation {
  judgment: AnswerJudgment;
  skipped: boolean;
  degraded: boolean;
}

const REQUIRED_SETUP_FIELDS: Array<keyof InterviewSetupInput> = [
  'candidateName',
  'resumeText',
  'jobDescription',
  'companyName',
];

/**
 * Throws a ValidationError naming every required field that is missing or
 * blank.
 */
export function validateSetup(input: InterviewSetupInput): void {
  const missing = REQUIRED_SETUP_FIELDS.filter((field) => !input[field]?.trim());
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing);
  }
}

/**
 * Drives one interview session through its phases. An instance is bound to a
 * single SessionState and mutates it in place; the caller persists the state
 * between calls.
 */
export class InterviewOrchestrator {
  constructor(
    private readonly state: SessionState,
    private readonly deps: OrchestratorCollaborators,
    private readonly policy: InterviewPolicy = INTERVIEW_POLICY
  ) {}

  getState(): SessionState {
    return this.state;
  }

  async start(): Promise<StartResult> {
    const state = this.state;
    validateSetup({
      candidateName: state.candidateName,
      resumeText: state.resumeText,
      jobDescription: state.jobDescription,
      companyName: state.company,
    });

    const warningsBefore = state.warnings.length;
    this.transition('PREPARING');

    await this.persist('createSession', () =>
      this.deps.persistence.createSession({
        sessionId: state.sessionId,
        candidateName: state.candidateName,
        company: state.company,
        role: state.role,
        startTime: state.startTime,
        resumeLength: state.resumeLength,
      })
    );

    const profile = await this.analyzeProfile();
    state.profile = profile;
    await this.persistProfile(profile);

    state.companyIntel = await this.researchCompany();
    const plan = await this.planStrategy();
    state.strategy = plan.strategy;
    state.persona = plan.persona;

    state.stage = 'intro';
    state.topicCount = 1;
    state.topicsInStage = 0;
    const question = await this.askQuestion({ number: 1, topic: 1, stage: 'intro', intensify: false });

    this.transition('AWAITING_ANSWER');
    console.log(`[InterviewOrchestrator] ✓ Session ${state.sessionId} ready for ${state.candidateName}`);

    return {
      sessionId: state.sessionId,
      question,
      persona: state.persona,
      profile,
      warnings: state.warnings.slice(warningsBefore),
    };
  }

  async submitAnswer(answer: string, nonVerbalSignal?: string): Promise<AnswerResult> {
    const state = this.state;
    const question = state.currentQuestion;
    if (state.phase !== 'AWAITING_ANSWER' || !question) {
      assertPhaseTransition(state.phase, 'SCORING');
      throw new Error(`Session ${state.sessionId} has no open question`);
    }

    const warningsBefore = state.warnings.length;
    let evaluation: Evaluation;
    try {
      evaluation = await this.evaluate(question, answer, nonVerbalSignal);
    } catch (error) {
      if (!(error instanceof SkippedAnswerError)) throw error;
      console.warn(`[InterviewOrchestrator] ⚠️ ${error.message}, recording score 0`);
      evaluation = {
        judgment: {
          score: this.policy.SCORING.SKIPPED_SCORE,
          strengths: '',
          weaknesses: 'No answer given',
          tip: 'Attempt every question, even with a partial answer.',
          sentiment: 'skipped',
        },
        skipped: true,
        degraded: false,
      };
    }
    this.transition('DECIDING');

    const trimmedAnswer = answer.trim();
    const turn: Turn = {
      questionNumber: question.number,
      topic: question.topic,
      stage: question.stage,
      question: question.text,
      answer: trimmedAnswer,
      answerLength: trimmedAnswer.length,
      score: evaluation.judgment.score,
      strengths: evaluation.judgment.strengths,
      weaknesses: evaluation.judgment.weaknesses,
      tip: evaluation.judgment.tip,
      sentiment: evaluation.judgment.sentiment,
      timestamp: new Date().toISOString(),
      skipped: evaluation.skipped,
      evaluationDegraded: evaluation.degraded,
      decision: null,
      topicFailed: false,
      persisted: false,
    };
    appendTurn(state, turn);
    await this.persistTurn(turn);

    const outcome = decide(
      {
        score: turn.score,
        pushbackCount: state.pushbackCount,
        recentScores: recentScores(state, this.policy),
        questionCount: questionCount(state),
        stage: state.stage,
      },
      this.policy
    );
    turn.decision = outcome.decision;
    turn.topicFailed = outcome.topicFailed;
    state.lastDecision = outcome.decision;
    console.log(
      `[InterviewOrchestrator] Q${turn.questionNumber} scored ${turn.score}/10 -> ${outcome.decision}` +
        (outcome.windowAverage !== null ? ` (window avg ${outcome.windowAverage.toFixed(2)})` : '')
    );

    let nextQuestion: CurrentQuestion | null = null;

    switch (outcome.decision) {
      case 'PUSHBACK': {
        this.transition('PUSHBACK_LOOP');
        state.pushbackCount += 1;
        state.decisionState = 'pushback';
        state.persona = selectPersona(state.persona, allScores(state), this.policy);
        nextQuestion = await this.askQuestion({
          number: turn.questionNumber + 1,
          topic: question.topic,
          stage: question.stage,
          intensify: true,
        });
        this.transition('AWAITING_ANSWER');
        break;
      }

      case 'ADVANCE': {
        this.transition('ADVANCING');
        if (outcome.topicFailed) {
          state.failedTopics.push(question.text);
          console.warn(`[InterviewOrchestrator] ⚠️ Topic ${question.topic} not recovered after pushbacks`);
        }
        state.pushbackCount = 0;

        const plan = planNextStage(
          {
            stage: state.stage,
            topicsInStage: state.topicsInStage,
            questionCount: questionCount(state),
            decision: outcome.decision,
          },
          this.policy
        );
        state.stage = plan.stage;
        state.topicsInStage = plan.topicsInStage;
        state.persona = selectPersona(state.persona, allScores(state), this.policy);

        if (plan.stage === 'complete' || questionCount(state) >= this.policy.COMPLETION.MAX_QUESTIONS) {
          state.decisionState = 'reporting';
          this.transition('REPORTING');
          await this.finalize();
          break;
        }

        state.topicCount += 1;
        state.decisionState = 'continuing';
        nextQuestion = await this.askQuestion({
          number: turn.questionNumber + 1,
          topic: state.topicCount,
          stage: state.stage,
          intensify: false,
        });
        this.transition('AWAITING_ANSWER');
        break;
      }

      case 'EARLY_TERMINATE': {
        this.transition('TERMINATING');
        state.terminationReason = outcome.reason;
        state.decisionState = 'terminated';
        console.warn(`[InterviewOrchestrator] ⚠️ Terminating ${state.sessionId}: ${outcome.reason}`);
        this.transition('REPORTING');
        await this.finalize();
        break;
      }

      case 'REPORT': {
        state.decisionState = 'reporting';
        this.transition('REPORTING');
        await this.finalize();
        break;
      }
    }

    return {
      decisionState: state.decisionState ?? 'continuing',
      decision: outcome.decision,
      nextQuestion,
      feedback: {
        questionNumber: turn.questionNumber,
        score: turn.score,
        strengths: turn.strengths,
        weaknesses: turn.weaknesses,
        tip: turn.tip,
        sentiment: turn.sentiment,
        skipped: turn.skipped,
        evaluationDegraded: turn.evaluationDegraded,
      },
      stage: state.stage,
      persona: state.persona,
      questionCount: questionCount(state),
      terminationReason: state.terminationReason,
      report: state.report,
      warnings: state.warnings.slice(warningsBefore),
    };
  }

  /**
   * Ends an interview that is waiting for an answer and builds its report.
   */
  async end(reason: string = ENDED_BY_CANDIDATE): Promise<InterviewReport> {
    const state = this.state;
    assertPhaseTransition(state.phase, 'REPORTING');

    state.terminationReason = reason.trim() || ENDED_BY_CANDIDATE;
    state.decisionState = 'terminated';
    this.transition('REPORTING');
    return this.finalize();
  }

  private async evaluate(
    question: CurrentQuestion,
    answer: string,
    nonVerbalSignal?: string
  ): Promise<Evaluation> {
    if (!answer.trim()) {
      throw new SkippedAnswerError(question.number);
    }

    this.transition('SCORING');
    try {
      const judgment = await this.deps.scoring.scoreAnswer({
        question: question.text,
        answer: answer.trim(),
        stage: question.stage,
        nonVerbalSignal,
      });
      return { judgment, skipped: false, degraded: false };
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ Scoring degraded for Q${question.number}: ${describeError(error)}`);
      return {
        judgment: {
          score: this.policy.SCORING.NEUTRAL_SCORE,
          strengths: '',
          weaknesses: '',
          tip: '',
          sentiment: 'degraded',
        },
        skipped: false,
        degraded: true,
      };
    }
  }

  private async askQuestion(target: {
    number: number;
    topic: number;
    stage: InterviewStage;
    intensify: boolean;
  }): Promise<CurrentQuestion> {
    const state = this.state;
    const last = state.turns[state.turns.length - 1];
    const request: QuestionRequest = {
      stage: target.stage,
      persona: state.persona,
      topic: target.topic,
      intensify: target.intensify,
      company: state.company,
      role: state.role,
      profile: state.profile,
      companyIntel: state.companyIntel,
      strategy: state.strategy,
      history: transcript(state),
      previous: last
        ? {
            question: last.question,
            answer: last.answer,
            score: last.score,
            weaknesses: last.weaknesses,
            tip: last.tip,
          }
        : null,
    };

    const fallback = target.intensify ? PUSHBACK_FALLBACK : FALLBACK_QUESTIONS[target.stage];
    let text: string;
    try {
      text = (await this.deps.questions.generateQuestion(request)).trim();
      if (!text) {
        console.warn(`[InterviewOrchestrator] ⚠️ Blank question for Q${target.number}, using fallback`);
        text = fallback;
      }
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ ${describeError(error)}, using fallback question`);
      text = fallback;
    }

    const question: CurrentQuestion = { ...target, text, intensified: target.intensify };
    state.currentQuestion = question;
    return question;
  }

  private async analyzeProfile(): Promise<ProfileAnalysis> {
    try {
      return await this.deps.profiles.analyzeProfile({
        resumeText: this.state.resumeText,
        jobDescription: this.state.jobDescription,
      });
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ ${describeError(error)}, using empty profile`);
      return emptyProfile();
    }
  }

  private async researchCompany(): Promise<string> {
    try {
      const intel = await this.deps.research.researchCompany(this.state.company);
      return intel || fallbackCompanyIntel(this.state.company);
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ ${describeError(error)}, using generic company intel`);
      return fallbackCompanyIntel(this.state.company);
    }
  }

  private async planStrategy(): Promise<{ strategy: string; persona: Persona }> {
    try {
      return await this.deps.research.planStrategy({
        company: this.state.company,
        profile: this.state.profile,
        companyIntel: this.state.companyIntel,
      });
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ ${describeError(error)}, starting with a neutral persona`);
      return { strategy: '', persona: 'neutral' };
    }
  }

  private async finalize(): Promise<InterviewReport> {
    const state = this.state;
    const score = overallScore(state);

    let content: ReportContent;
    try {
      content = await this.deps.reports.generateReport({
        candidateName: state.candidateName,
        company: state.company,
        role: state.role,
        turns: state.turns,
        profile: state.profile,
        overallScore: score,
        terminationReason: state.terminationReason,
      });
    } catch (error) {
      console.warn(`[InterviewOrchestrator] ⚠️ ${describeError(error)}, building report locally`);
      content = fallbackReport(score, state.turns);
    }

    const endTime = new Date().toISOString();
    state.endTime = endTime;
    state.overallScore = score;
    state.finalVerdict = content.verdict;

    for (const turn of state.turns) {
      if (!turn.persisted) {
        await this.persistTurn(turn);
      }
    }
    if (state.profile && !state.profilePersisted) {
      await this.persistProfile(state.profile);
    }

    await this.persist('finishSession', () =>
      this.deps.persistence.finishSession(state.sessionId, {
        endTime,
        overallScore: score,
        finalVerdict: content.verdict,
        totalQuestions: state.turns.length,
        earlyTermination: state.terminationReason,
      })
    );

    const report: InterviewReport = {
      verdict: content.verdict,
      roadmap: content.roadmap,
      overallScore: score,
      terminationReason: state.terminationReason,
      degradedTurns: state.turns.filter((turn) => turn.evaluationDegraded).length,
      skippedTurns: state.turns.filter((turn) => turn.skipped).length,
      failedTopics: [...state.failedTopics],
      markdown: buildReportMarkdown(state, content, score),
      generatedAt: endTime,
    };
    state.report = report;
    state.currentQuestion = null;

    this.transition('DONE');
    console.log(`[InterviewOrchestrator] ✓ Report ready for ${state.sessionId} (score ${score.toFixed(2)}/10)`);
    return report;
  }

  private async persistTurn(turn: Turn): Promise<void> {
    turn.persisted = await this.persist(`recordTurn Q${turn.questionNumber}`, () =>
      this.deps.persistence.recordTurn(this.state.sessionId, turn)
    );
  }

  private async persistProfile(profile: ProfileAnalysis): Promise<void> {
    this.state.profilePersisted = await this.persist('saveProfile', () =>
      this.deps.persistence.saveProfile(this.state.sessionId, profile)
    );
  }

  private async persist(operation: string, write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      const message =
        error instanceof PersistenceError ? error.message : `${operation} failed: ${describeError(error)}`;
      console.error(`[InterviewOrchestrator] ❌ ${message}`);
      addWarning(this.state, message);
      return false;
    }
  }

  private transition(to: OrchestratorPhase): void {
    const from = this.state.phase;
    assertPhaseTransition(from, to);
    this.state.phase = to;
    console.log(`[InterviewOrchestrator] ${this.state.sessionId} ${from} -> ${to}`);
  }
}
