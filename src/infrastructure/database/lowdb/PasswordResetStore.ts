// Password Reset Store - LowDB implementation
// Single-use, time-bounded reset tokens; only their digests are stored

import type { DatabaseConnection } from './connection.js';
import type { Clock } from '@/domain/user/types.js';
import { systemClock } from '@/domain/user/types.js';
import type { IPasswordResetStore } from '@/domain/user/repository.js';
import { ResetTokenInvalidError } from '@/domain/user/errors.js';

export class PasswordResetStore implements IPasswordResetStore {
  constructor(
    private db: DatabaseConnection,
    private clock: Clock = systemClock
  ) {}

  async create(userId: string, tokenDigest: string, expiresAt: Date): Promise<void> {
    const createdAt = this.clock.now().toISOString();

    await this.db.transaction((draft) => {
      draft.passwordResets.push({
        token: tokenDigest,
        user_id: userId,
        created_at: createdAt,
        expires_at: expiresAt.toISOString(),
        used: 0,
      });
    }, 'passwordResets.create');
  }

  /**
   * Mark a token used and return its owner
   */
  async consume(tokenDigest: string): Promise<string> {
    const now = this.clock.now().getTime();

    return this.db.transaction((draft) => {
      const request = draft.passwordResets.find((r) => r.token === tokenDigest);
      if (!request) {
        throw new ResetTokenInvalidError('missing');
      }
      if (request.used === 1) {
        throw new ResetTokenInvalidError('used');
      }
      if (Date.parse(request.expires_at) <= now) {
        throw new ResetTokenInvalidError('expired');
      }

      request.used = 1;
      return request.user_id;
    }, 'passwordResets.consume');
  }
}
