import {
  InterviewReport,
  InterviewSetupInput,
  InterviewStateStore,
  OrchestratorPhase,
} from '../../models/types';
import { SessionNotFoundError } from '../../utils/errors';
import { RedisInterviewStateStore } from '../../repositories/interviewStateStore';
import { sessionRepository } from '../../repositories/sessionRepository';
import { interviewerAgent } from '../ai/interviewerAgent';
import { profilerAgent } from '../ai/profilerAgent';
import { researchAgent } from '../ai/researchAgent';
import { evaluationService } from '../evaluation/evaluationService';
import { INTERVIEW_POLICY, InterviewPolicy } from './interviewPolicy';
import {
  AnswerResult,
  InterviewOrchestrator,
  OrchestratorCollaborators,
  StartResult,
  validateSetup,
} from './interviewOrchestrator';
import { createSessionState } from './sessionState';

export type ReportView =
  | { status: 'complete'; report: InterviewReport }
  | { status: 'in_progress'; phase: OrchestratorPhase };

/**
 * Entry point for callers. Loads a session's state, runs one orchestrator
 * call against it and stores the result. Calls for the same session id run
 * one after another.
 */
export class InterviewService {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly store: InterviewStateStore,
    private readonly deps: OrchestratorCollaborators,
    private readonly policy: InterviewPolicy = INTERVIEW_POLICY
  ) {}

  async startInterview(input: InterviewSetupInput): Promise<StartResult> {
    validateSetup(input);

    const state = createSessionState(input);
    console.log(`\n${'='.repeat(60)}`);
    console.log(`📝 Creating new interview session: ${state.sessionId}`);
    console.log(`${'='.repeat(60)}`);

    const orchestrator = new InterviewOrchestrator(state, this.deps, this.policy);
    const result = await orchestrator.start();
    await this.store.save(state);
    return result;
  }

  submitAnswer(sessionId: string, answer: string, nonVerbalSignal?: string): Promise<AnswerResult> {
    return this.withSession(sessionId, (orchestrator) => orchestrator.submitAnswer(answer, nonVerbalSignal));
  }

  endInterview(sessionId: string, reason?: string): Promise<InterviewReport> {
    return this.withSession(sessionId, (orchestrator) => orchestrator.end(reason));
  }

  async getReport(sessionId: string): Promise<ReportView> {
    const state = await this.store.load(sessionId);
    if (!state) {
      throw new SessionNotFoundError(sessionId);
    }
    if (state.phase === 'DONE' && state.report) {
      return { status: 'complete', report: state.report };
    }
    return { status: 'in_progress', phase: state.phase };
  }

  private withSession<T>(sessionId: string, work: (orchestrator: InterviewOrchestrator) => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();

    const run = previous.then(async () => {
      const state = await this.store.load(sessionId);
      if (!state) {
        throw new SessionNotFoundError(sessionId);
      }
      const result = await work(new InterviewOrchestrator(state, this.deps, this.policy));
      await this.store.save(state);
      return result;
    });

    const release = (): void => {
      if (this.queues.get(sessionId) === tail) {
        this.queues.delete(sessionId);
      }
    };
    const tail: Promise<void> = run.then(release, release);
    this.queues.set(sessionId, tail);

    return run;
  }
}

export const interviewService = new InterviewService(new RedisInterviewStateStore(), {
  questions: interviewerAgent,
  scoring: evaluationService,
  reports: evaluationService,
  profiles: profilerAgent,
  research: researchAgent,
  persistence: sessionRepository,
});
