import { OrchestratorPhase } from '../../models/types';
import { InvalidTransitionError } from '../../utils/errors';

const transitionRules: Record<OrchestratorPhase, OrchestratorPhase[]> = {
  INIT: ['PREPARING'],
  PREPARING: ['AWAITING_ANSWER'],
  AWAITING_ANSWER: ['SCORING', 'DECIDING', 'REPORTING'],
  SCORING: ['DECIDING'],
  DECIDING: ['PUSHBACK_LOOP', 'ADVANCING', 'TERMINATING', 'REPORTING'],
  PUSHBACK_LOOP: ['AWAITING_ANSWER'],
  ADVANCING: ['AWAITING_ANSWER', 'REPORTING'],
  TERMINATING: ['REPORTING'],
  REPORTING: ['DONE'],
  DONE: [],
};

export function isAllowedTransition(from: OrchestratorPhase, to: OrchestratorPhase): boolean {
  return transitionRules[from].includes(to);
}

export function assertPhaseTransition(from: OrchestratorPhase, to: OrchestratorPhase): void {
  if (!isAllowedTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
