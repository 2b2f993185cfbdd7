// Test helpers: in-memory database, fake clock and recording collaborators

import type { Adapter } from 'lowdb';
import type { Clock } from '@/domain/user/types.js';
import type { PasswordResetNotifier } from '@/domain/user/repository.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { IN_MEMORY_PATH, type DatabaseSchema } from '@/infrastructure/database/lowdb/connection.js';
import { AuthService, type AuthServiceConfig } from '@/application/auth/AuthService.js';
import { PasswordHasher } from '@/application/auth/PasswordHasher.js';
import { DEFAULT_AUTH_CONFIG } from '@/utils/config.js';

export const T0 = new Date('2026-01-01T00:00:00.000Z');
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;
export const TEST_ITERATIONS = 1000;

export const STRONG_PASSWORD = 'Str0ng!Pass';
export const OTHER_PASSWORD = 'An0ther!Pass';

export class FakeClock implements Clock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface SentResetToken {
  userId: string;
  email: string;
  token: string;
  expiresAt: Date;
}

export class RecordingNotifier implements PasswordResetNotifier {
  readonly sent: SentResetToken[] = [];

  async sendResetToken(input: SentResetToken): Promise<void> {
    this.sent.push(input);
  }
}

/**
 * Memory adapter whose writes can be made to fail or hang
 */
export class ControlledAdapter implements Adapter<DatabaseSchema> {
  data: DatabaseSchema | null = null;
  failWrites = false;
  failAttemptWrites = false;
  hangWrites = false;
  failReads = false;

  async read(): Promise<DatabaseSchema | null> {
    if (this.failReads) {
      throw new Error('disk unreadable');
    }
    return this.data;
  }

  write(data: DatabaseSchema): Promise<void> {
    if (this.hangWrites) {
      return new Promise<void>(() => undefined);
    }
    if (this.failWrites) {
      return Promise.reject(new Error('disk full'));
    }
    const previousAttempts = this.data?.loginAttempts.length ?? 0;
    if (this.failAttemptWrites && data.loginAttempts.length !== previousAttempts) {
      return Promise.reject(new Error('attempt table locked'));
    }
    this.data = structuredClone(data);
    return Promise.resolve();
  }
}

export function testAuthConfig(overrides: Partial<AuthServiceConfig> = {}): AuthServiceConfig {
  return {
    session: { ...DEFAULT_AUTH_CONFIG.session },
    lockout: { ...DEFAULT_AUTH_CONFIG.lockout },
    passwordResetTtlMs: DEFAULT_AUTH_CONFIG.passwordResetTtlMs,
    ...overrides,
  };
}

export interface TestContext {
  clock: FakeClock;
  db: DatabaseService;
  hasher: PasswordHasher;
  notifier: RecordingNotifier;
  auth: AuthService;
}

export async function createTestContext(
  options: {
    config?: Partial<AuthServiceConfig>;
    adapter?: Adapter<DatabaseSchema>;
    sweepBatchSize?: number;
  } = {}
): Promise<TestContext> {
  const clock = new FakeClock();
  const db = await DatabaseService.open({
    path: IN_MEMORY_PATH,
    adapter: options.adapter,
    clock,
    sweepBatchSize: options.sweepBatchSize,
    timeoutMs: 1000,
  });
  const hasher = new PasswordHasher(TEST_ITERATIONS);
  const notifier = new RecordingNotifier();

  const auth = new AuthService(
    {
      users: db.users,
      sessions: db.sessions,
      attempts: db.attempts,
      passwordResets: db.passwordResets,
      hasher,
      notifier,
      clock,
    },
    testAuthConfig(options.config)
  );

  return { clock, db, hasher, notifier, auth };
}
