import { getRedisClient } from '../config/redis';
import { interviewConfig } from '../config/services';
import { InterviewStateStore, SessionState } from '../models/types';

export const stateKey = (sessionId: string): string => `interview:${sessionId}`;

function isSessionState(value: unknown): value is SessionState {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sessionId' in value &&
    typeof value.sessionId === 'string' &&
    'phase' in value &&
    typeof value.phase === 'string' &&
    'turns' in value &&
    Array.isArray(value.turns)
  );
}

/**
 * Live interview state in Redis. Every save refreshes the TTL, so an
 * abandoned interview expires on its own.
 */
export class RedisInterviewStateStore implements InterviewStateStore {
  constructor(private readonly ttlSeconds: number = interviewConfig.stateTtlSeconds) {}

  async load(sessionId: string): Promise<SessionState | null> {
    const redis = getRedisClient();
    const stateJson = await redis.get(stateKey(sessionId));
    if (!stateJson) return null;

    const parsed: unknown = JSON.parse(stateJson);
    if (!isSessionState(parsed)) {
      console.warn(`[InterviewStateStore] ⚠️ Discarding unreadable state for ${sessionId}`);
      return null;
    }
    return parsed;
  }

  async save(state: SessionState): Promise<void> {
    const redis = getRedisClient();
    await redis.set(stateKey(state.sessionId), JSON.stringify(state), { EX: this.ttlSeconds });
  }
}
