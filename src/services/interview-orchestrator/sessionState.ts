import { v4 as uuidv4 } from 'uuid';
import { InterviewSetupInput, SessionState, Turn, TranscriptEntry } from '../../models/types';
import { INTERVIEW_POLICY, InterviewPolicy } from './interviewPolicy';

export const DEFAULT_ROLE = 'Engineering Role';

export function createSessionState(input: InterviewSetupInput, now: Date = new Date()): SessionState {
  const resumeText = input.resumeText.trim();
  return {
    sessionId: uuidv4(),
    candidateName: input.candidateName.trim(),
    company: input.companyName.trim(),
    role: input.role?.trim() || DEFAULT_ROLE,
    resumeText,
    jobDescription: input.jobDescription.trim(),
    resumeLength: resumeText.length,
    startTime: now.toISOString(),
    endTime: null,

    phase: 'INIT',
    stage: 'intro',
    persona: 'neutral',
    profile: null,
    profilePersisted: false,
    companyIntel: '',
    strategy: '',

    currentQuestion: null,
    pushbackCount: 0,
    topicCount: 0,
    topicsInStage: 0,
    failedTopics: [],
    turns: [],

    lastDecision: null,
    decisionState: null,
    terminationReason: null,
    overallScore: null,
    finalVerdict: null,
    report: null,
    warnings: [],
  };
}

export function appendTurn(state: SessionState, turn: Turn): void {
  const last = state.turns[state.turns.length - 1];
  if (last && turn.questionNumber <= last.questionNumber) {
    throw new Error(
      `Question numbers must increase: got ${turn.questionNumber} after ${last.questionNumber}`
    );
  }
  state.turns.push(turn);
}

export function questionCount(state: SessionState): number {
  return state.turns.length;
}

export function allScores(state: SessionState): number[] {
  return state.turns.map((turn) => turn.score);
}

/**
 * The rolling score window: the most recent scores, newest last.
 */
export function recentScores(state: SessionState, policy: InterviewPolicy = INTERVIEW_POLICY): number[] {
  return allScores(state).slice(-policy.TERMINATION.WINDOW_SIZE);
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function overallScore(state: SessionState): number {
  return mean(allScores(state));
}

export function transcript(state: SessionState): TranscriptEntry[] {
  return state.turns.map((turn) => ({
    questionNumber: turn.questionNumber,
    question: turn.question,
    answer: turn.answer,
    score: turn.score,
  }));
}

export function addWarning(state: SessionState, warning: string): void {
  state.warnings.push(warning);
}
