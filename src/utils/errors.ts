/**
 * Domain errors raised by the interview core. Only ValidationError ever
 * reaches the caller during session creation; the others are absorbed by the
 * orchestrator and turned into fallbacks or warnings.
 */

export class ValidationError extends Error {
  constructor(message: string, public readonly fields: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type CollaboratorName = 'question' | 'scoring' | 'report' | 'profile' | 'research' | 'strategy';

export class CollaboratorError extends Error {
  constructor(
    public readonly collaborator: CollaboratorName,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CollaboratorError';
  }
}

export class SkippedAnswerError extends Error {
  constructor(public readonly questionNumber: number) {
    super(`No answer submitted for question ${questionNumber}`);
    this.name = 'SkippedAnswerError';
  }
}

export class PersistenceError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Invalid interview transition from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Interview session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
