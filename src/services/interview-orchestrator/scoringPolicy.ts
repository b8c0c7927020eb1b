import { InterviewStage, PolicyDecision } from '../../models/types';
import { INTERVIEW_POLICY, InterviewPolicy } from './interviewPolicy';
import { mean } from './sessionState';

export interface PolicyInput {
  score: number;
  pushbackCount: number;
  // Newest last; must already include `score`
  recentScores: number[];
  questionCount: number;
  stage: InterviewStage;
}

export interface PolicyOutcome {
  decision: PolicyDecision;
  topicFailed: boolean;
  windowAverage: number | null;
  reason: string | null;
}

export function formatTerminationReason(average: number): string {
  return `Performance below bar (avg ${average.toFixed(1)}/10)`;
}

/**
 * Decides what happens after a scored turn.
 *
 * A third weak answer on one topic always moves on, even when the rolling
 * average is failing. Otherwise a failing average ends the interview before
 * a weak answer can earn a retry.
 */
export function decide(input: PolicyInput, policy: InterviewPolicy = INTERVIEW_POLICY): PolicyOutcome {
  const { TERMINATION, SCORING, PUSHBACK, COMPLETION } = policy;

  const windowAverage = input.recentScores.length > 0 ? mean(input.recentScores) : null;
  const weakAnswer = input.score <= SCORING.PUSHBACK_SCORE;

  if (weakAnswer && input.pushbackCount >= PUSHBACK.MAX_ATTEMPTS) {
    return { decision: 'ADVANCE', topicFailed: true, windowAverage, reason: null };
  }

  if (
    windowAverage !== null &&
    input.recentScores.length >= TERMINATION.MIN_SCORED_TURNS &&
    windowAverage < TERMINATION.AVERAGE_BELOW
  ) {
    return {
      decision: 'EARLY_TERMINATE',
      topicFailed: false,
      windowAverage,
      reason: formatTerminationReason(windowAverage),
    };
  }

  if (weakAnswer) {
    return { decision: 'PUSHBACK', topicFailed: false, windowAverage, reason: null };
  }

  if (input.questionCount >= COMPLETION.MAX_QUESTIONS || input.stage === 'complete') {
    return { decision: 'REPORT', topicFailed: false, windowAverage, reason: null };
  }

  return { decision: 'ADVANCE', topicFailed: false, windowAverage, reason: null };
}
