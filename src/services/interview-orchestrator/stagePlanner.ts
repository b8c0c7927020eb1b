import { InterviewStage, Persona, PolicyDecision } from '../../models/types';
import { INTERVIEW_POLICY, InterviewPolicy } from './interviewPolicy';

export interface StagePlanInput {
  stage: InterviewStage;
  // Topics already finished in `stage`, not counting the one just decided
  topicsInStage: number;
  questionCount: number;
  decision: PolicyDecision;
}

export interface StagePlan {
  stage: InterviewStage;
  topicsInStage: number;
  stageChanged: boolean;
}

function nextStageOf(stage: InterviewStage, policy: InterviewPolicy): InterviewStage {
  const order = policy.STAGES.ORDER;
  const index = order.indexOf(stage);
  return order[Math.min(index + 1, order.length - 1)];
}

/**
 * Sum of minimum topic counts of every stage after `stage`.
 */
function laterMinimum(stage: InterviewStage, policy: InterviewPolicy): number {
  const order = policy.STAGES.ORDER;
  let total = 0;
  for (const later of order.slice(order.indexOf(stage) + 1)) {
    if (later === 'complete') continue;
    total += policy.STAGES.RANGES[later].min;
  }
  return total;
}

export function planNextStage(input: StagePlanInput, policy: InterviewPolicy = INTERVIEW_POLICY): StagePlan {
  const stage = input.stage;
  if (input.decision !== 'ADVANCE' || stage === 'complete') {
    return { stage, topicsInStage: input.topicsInStage, stageChanged: false };
  }

  const finished = input.topicsInStage + 1;
  const range = policy.STAGES.RANGES[stage];
  const remaining = policy.COMPLETION.MAX_QUESTIONS - input.questionCount;
  const reserved = laterMinimum(stage, policy);

  const moveOn =
    finished >= range.max ||
    (finished >= range.min && remaining <= reserved) ||
    remaining < reserved;

  if (!moveOn) {
    return { stage, topicsInStage: finished, stageChanged: false };
  }

  return { stage: nextStageOf(stage, policy), topicsInStage: 0, stageChanged: true };
}

export function selectPersona(
  current: Persona,
  scores: number[],
  policy: InterviewPolicy = INTERVIEW_POLICY
): Persona {
  const { STREAK, CHALLENGE_BELOW, SUPPORT_AT_OR_ABOVE } = policy.PERSONA;
  if (scores.length < STREAK) return current;

  const streak = scores.slice(-STREAK);
  if (streak.every((score) => score < CHALLENGE_BELOW)) return 'challenging';
  if (streak.every((score) => score >= SUPPORT_AT_OR_ABOVE)) return 'supportive';
  return 'neutral';
}
