// Session Store - LowDB implementation
// Handles session issuance, validation and revocation for authentication

import { randomBytes } from 'crypto';
import type { DatabaseConnection, SessionRecord } from './connection.js';
import type { Session, UserContext, Clock } from '@/domain/user/types.js';
import { systemClock } from '@/domain/user/types.js';
import type { ISessionStore, IssueSessionOptions } from '@/domain/user/repository.js';
import {
  SessionExpiredError,
  SessionNotFoundError,
  SessionRevokedError,
} from '@/domain/user/errors.js';

const TOKEN_BYTES = 32;
const DEFAULT_SWEEP_BATCH_SIZE = 100;

export function generateSessionToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

export class SessionStore implements ISessionStore {
  constructor(
    private db: DatabaseConnection,
    private clock: Clock = systemClock,
    private sweepBatchSize: number = DEFAULT_SWEEP_BATCH_SIZE
  ) {}

  /**
   * Issue a new session with a fresh CSPRNG token
   */
  async issue(userId: string, ttlMs: number, options: IssueSessionOptions): Promise<Session> {
    const now = this.clock.now();

    const record = await this.db.transaction((draft) => {
      let token = generateSessionToken();
      while (draft.sessions.some((s) => s.token === token)) {
        token = generateSessionToken();
      }

      const newSession: SessionRecord = {
        token,
        user_id: userId,
        issued_at: now.toISOString(),
        expires_at: new Date(now.getTime() + ttlMs).toISOString(),
        last_activity_at: now.toISOString(),
        revoked: 0,
        revoked_at: null,
        revoked_reason: null,
        credential_version: options.credentialVersion,
        device_name: options.deviceName ?? null,
      };

      draft.sessions.push(newSession);
      return newSession;
    }, 'sessions.issue');

    return this.rowToSession(record);
  }

  /**
   * Find session by token
   */
  async find(token: string): Promise<Session | null> {
    const record = this.db.getData().sessions.find((s) => s.token === token);
    return record ? this.rowToSession(record) : null;
  }

  /**
   * Resolve a token to the identity it proves.
   * A disabled owner or a rotated password counts as revocation.
   */
  async validate(token: string): Promise<UserContext> {
    const data = this.db.getData();
    const record = data.sessions.find((s) => s.token === token);
    if (!record) {
      throw new SessionNotFoundError();
    }

    if (record.revoked === 1) {
      throw new SessionRevokedError(record.revoked_reason ?? 'revoked');
    }

    const expiresAt = new Date(record.expires_at);
    if (this.clock.now().getTime() >= expiresAt.getTime()) {
      throw new SessionExpiredError(expiresAt);
    }

    const user = data.users.find((u) => u.id === record.user_id);
    if (!user || user.is_active !== 1) {
      throw new SessionRevokedError('account_disabled');
    }
    if (user.credential_version !== record.credential_version) {
      throw new SessionRevokedError('credentials_changed');
    }

    return {
      userId: user.id,
      username: user.username,
      email: user.email,
      fullName: user.full_name,
      sessionToken: record.token,
      expiresAt,
    };
  }

  /**
   * Sliding refresh: push expiry to now + ttl, capped at issuedAt + maxLifetime.
   * Returns null when the session is gone, revoked or already expired.
   */
  async extend(token: string, ttlMs: number, maxLifetimeMs: number): Promise<Session | null> {
    const now = this.clock.now();

    const record = await this.db.transaction((draft) => {
      const session = draft.sessions.find((s) => s.token === token);
      if (!session || session.revoked === 1) {
        return null;
      }

      const currentExpiry = Date.parse(session.expires_at);
      if (currentExpiry <= now.getTime()) {
        return null;
      }

      const hardLimit = Date.parse(session.issued_at) + maxLifetimeMs;
      const nextExpiry = Math.max(currentExpiry, Math.min(now.getTime() + ttlMs, hardLimit));

      session.expires_at = new Date(nextExpiry).toISOString();
      session.last_activity_at = now.toISOString();
      return session;
    }, 'sessions.extend');

    return record ? this.rowToSession(record) : null;
  }

  /**
   * Revoke one session; false if it was missing or already revoked
   */
  async revoke(token: string, reason: string): Promise<boolean> {
    const existing = this.db.getData().sessions.find((s) => s.token === token);
    if (!existing || existing.revoked === 1) {
      return false;
    }

    return this.db.transaction((draft) => {
      const session = draft.sessions.find((s) => s.token === token);
      if (!session || session.revoked === 1) {
        return false;
      }
      this.markRevoked(session, reason);
      return true;
    }, 'sessions.revoke');
  }

  /**
   * Revoke every live session of a user, returns how many were revoked
   */
  async revokeAllForUser(userId: string, reason: string): Promise<number> {
    return this.db.transaction((draft) => {
      let revoked = 0;
      for (const session of draft.sessions) {
        if (session.user_id === userId && session.revoked === 0) {
          this.markRevoked(session, reason);
          revoked += 1;
        }
      }
      return revoked;
    }, 'sessions.revokeAllForUser');
  }

  /**
   * Live (unrevoked, unexpired) sessions of a user
   */
  async listForUser(userId: string): Promise<Session[]> {
    const now = this.clock.now().getTime();
    return this.db
      .getData()
      .sessions.filter(
        (s) => s.user_id === userId && s.revoked === 0 && Date.parse(s.expires_at) > now
      )
      .map((s) => this.rowToSession(s));
  }

  /**
   * Delete expired rows in short batches so other writers can interleave
   */
  async sweepExpired(): Promise<number> {
    let removed = 0;

    for (;;) {
      const now = this.clock.now();
      const isExpired = (s: SessionRecord) => Date.parse(s.expires_at) <= now.getTime();

      if (!this.db.getData().sessions.some(isExpired)) {
        break;
      }

      const deleted = await this.db.transaction((draft) => {
        let count = 0;
        draft.sessions = draft.sessions.filter((s) => {
          if (count < this.sweepBatchSize && isExpired(s)) {
            count += 1;
            return false;
          }
          return true;
        });
        draft._lastCleanup = now.toISOString();
        return count;
      }, 'sessions.sweepExpired');

      removed += deleted;
      if (deleted < this.sweepBatchSize) {
        break;
      }
    }

    return removed;
  }

  private markRevoked(session: SessionRecord, reason: string): void {
    session.revoked = 1;
    session.revoked_at = this.clock.now().toISOString();
    session.revoked_reason = reason;
  }

  private rowToSession(row: SessionRecord): Session {
    return {
      token: row.token,
      userId: row.user_id,
      issuedAt: new Date(row.issued_at),
      expiresAt: new Date(row.expires_at),
      lastActivityAt: new Date(row.last_activity_at),
      revoked: row.revoked === 1,
      revokedAt: row.revoked_at ? new Date(row.revoked_at) : null,
      revokedReason: row.revoked_reason ?? undefined,
      credentialVersion: row.credential_version,
      deviceName: row.device_name ?? undefined,
    };
  }
}
