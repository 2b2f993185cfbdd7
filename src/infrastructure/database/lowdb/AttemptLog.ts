// Attempt Log - LowDB implementation
// Append-only record of login attempts, read by the lockout policy

import type { DatabaseConnection, LoginAttemptRecord } from './connection.js';
import type { LoginAttempt, Clock } from '@/domain/user/types.js';
import { systemClock } from '@/domain/user/types.js';
import type { AttemptRecord, IAttemptLog } from '@/domain/user/repository.js';
import { normalizeIdentifier } from '@/domain/user/rules.js';
import { authLogger, authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';

const FAILURE_OUTCOMES: ReadonlySet<LoginAttemptRecord['outcome']> = new Set([
  'bad_credentials',
  'unknown_identifier',
]);

export class AttemptLog implements IAttemptLog {
  constructor(
    private db: DatabaseConnection,
    private clock: Clock = systemClock
  ) {}

  /**
   * Append an attempt. Never rejects: a failed write is logged and dropped.
   */
  async record(attempt: AttemptRecord): Promise<void> {
    const timestamp = this.clock.now().toISOString();

    try {
      await this.db.transaction((draft) => {
        draft.loginAttempts.push({
          id: draft._nextAttemptId,
          identifier: attempt.identifier,
          identifier_key: normalizeIdentifier(attempt.identifier),
          timestamp,
          outcome: attempt.outcome,
          user_id: attempt.userId ?? null,
          source_address: attempt.sourceAddress ?? null,
        });
        draft._nextAttemptId += 1;
      }, 'loginAttempts.record');
    } catch (error) {
      authMetrics.increment(AUTH_METRICS.ATTEMPT_LOG_FAILURE);
      authLogger.error('Failed to record login attempt', {
        identifier: attempt.identifier,
        outcome: attempt.outcome,
        error: String(error),
      });
    }
  }

  /**
   * Failed attempts for an identifier inside the trailing window
   */
  async countRecentFailures(identifier: string, windowMs: number): Promise<number> {
    const key = normalizeIdentifier(identifier);
    const since = this.clock.now().getTime() - windowMs;

    return this.db
      .getData()
      .loginAttempts.filter(
        (a) =>
          a.identifier_key === key &&
          FAILURE_OUTCOMES.has(a.outcome) &&
          Date.parse(a.timestamp) > since
      ).length;
  }

  /**
   * Newest-first audit view of the attempts resolved to a user
   */
  async listForUser(userId: string, limit: number): Promise<LoginAttempt[]> {
    return this.db
      .getData()
      .loginAttempts.filter((a) => a.user_id === userId)
      .slice(-limit)
      .reverse()
      .map((a) => this.rowToAttempt(a));
  }

  private rowToAttempt(row: LoginAttemptRecord): LoginAttempt {
    return {
      id: row.id,
      identifier: row.identifier,
      timestamp: new Date(row.timestamp),
      outcome: row.outcome,
      userId: row.user_id ?? undefined,
      sourceAddress: row.source_address ?? undefined,
    };
  }
}
