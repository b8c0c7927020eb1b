import { InterviewStage } from '../../models/types';

// ============================================================================
// Every threshold the scoring policy and stage planner act on.
// ============================================================================

export interface StageRange {
  min: number;
  max: number;
}

const STAGE_ORDER: InterviewStage[] = ['intro', 'technical', 'behavioral', 'closing', 'complete'];

// Topics per stage; a pushback retry never counts as a new topic
const STAGE_RANGES: Record<Exclude<InterviewStage, 'complete'>, StageRange> = {
  intro: { min: 1, max: 1 },
  technical: { min: 3, max: 4 },
  behavioral: { min: 2, max: 3 },
  closing: { min: 1, max: 1 },
};

export const INTERVIEW_POLICY = {
  SCORING: {
    MIN_SCORE: 0,
    MAX_SCORE: 10,
    PUSHBACK_SCORE: 2, // score <= this asks the same topic again
    NEUTRAL_SCORE: 5, // substituted when the scoring call degrades
    SKIPPED_SCORE: 0,
  },

  PUSHBACK: {
    MAX_ATTEMPTS: 2, // the 3rd weak answer on a topic forces an advance
  },

  TERMINATION: {
    MIN_SCORED_TURNS: 3,
    WINDOW_SIZE: 3, // rolling average over the latest scores
    AVERAGE_BELOW: 3.5,
  },

  COMPLETION: {
    MAX_QUESTIONS: 8,
  },

  STAGES: {
    ORDER: STAGE_ORDER,
    RANGES: STAGE_RANGES,
  },

  PERSONA: {
    CHALLENGE_BELOW: 5,
    SUPPORT_AT_OR_ABOVE: 8,
    STREAK: 2,
  },
};

export type InterviewPolicy = typeof INTERVIEW_POLICY;
