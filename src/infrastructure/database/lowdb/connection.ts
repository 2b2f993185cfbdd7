// LowDB connection and database instance management
// One JSON document holds the users, sessions, login attempts and password resets tables

import { Low, Memory, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { StorageUnavailableError } from '@/domain/user/errors.js';
import { storageLogger } from '@/utils/auth-logger.js';

// Database schema definition with a commit counter
export interface DatabaseSchema {
  _version: number;           // Incremented on every committed transaction
  _lastCleanup?: string;      // Last sweep timestamp for maintenance jobs
  _nextAttemptId: number;
  users: UserRecord[];
  sessions: SessionRecord[];
  loginAttempts: LoginAttemptRecord[];
  passwordResets: PasswordResetRecord[];
}

export interface UserRecord {
  id: string;
  username: string;
  username_key: string;       // Lower-cased, unique
  email: string;
  email_key: string;          // Lower-cased, unique
  password_hash: string;
  salt: string;
  iterations: number;
  credential_version: number;
  created_at: string;
  last_login_at: string | null;
  is_active: number;
  full_name: string;
  settings: Record<string, unknown>;
}

export interface SessionRecord {
  token: string;
  user_id: string;
  issued_at: string;
  expires_at: string;
  last_activity_at: string;
  revoked: number;
  revoked_at: string | null;
  revoked_reason: string | null;
  credential_version: number;
  device_name: string | null;
}

export interface LoginAttemptRecord {
  id: number;
  identifier: string;
  identifier_key: string;
  timestamp: string;
  outcome: 'success' | 'bad_credentials' | 'unknown_identifier' | 'locked';
  user_id: string | null;
  source_address: string | null;
}

export interface PasswordResetRecord {
  token: string;              // SHA-256 digest of the issued token
  user_id: string;
  created_at: string;
  expires_at: string;
  used: number;
}

// Default data for new database
export function defaultData(): DatabaseSchema {
  return {
    _version: 1,
    _nextAttemptId: 1,
    users: [],
    sessions: [],
    loginAttempts: [],
    passwordResets: [],
  };
}

export const IN_MEMORY_PATH = ':memory:';

// Database configuration
export interface DatabaseConfig {
  path: string;
  timeoutMs?: number;
  adapter?: Adapter<DatabaseSchema>;  // Overrides the adapter picked from path
}

function createAdapter(config: DatabaseConfig): Adapter<DatabaseSchema> {
  if (config.adapter) {
    return config.adapter;
  }

  if (config.path === IN_MEMORY_PATH) {
    return new Memory<DatabaseSchema>();
  }

  mkdirSync(dirname(config.path), { recursive: true });
  return new JSONFile<DatabaseSchema>(config.path);
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StorageUnavailableError(`${label}: timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

interface PendingCommit<T> {
  result: Promise<T>;
  settled: Promise<void>;
}

/**
 * LowDB wrapper with serialized, all-or-nothing write transactions.
 *
 * Reads go straight to the published document. Writes run one at a time:
 * the updater mutates a draft copy, the draft is written, and it stays
 * published only if the write succeeds.
 */
export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private queue: Promise<void> = Promise.resolve();
  private readonly timeoutMs: number;

  constructor(private config: DatabaseConfig) {
    this.db = new Low<DatabaseSchema>(createAdapter(config), defaultData());
    this.timeoutMs = config.timeoutMs ?? 5000;
  }

  /**
   * Initialize by reading data, filling in tables missing from older files
   */
  async init(): Promise<void> {
    try {
      await this.db.read();
    } catch (error) {
      throw new StorageUnavailableError(`Failed to read ${this.config.path}`, error);
    }
    this.db.data = { ...defaultData(), ...this.db.data };
  }

  /**
   * Get the published data (read-only use)
   */
  getData(): DatabaseSchema {
    return this.db.data;
  }

  /**
   * Run an updater as one atomic transaction.
   * If the updater throws, nothing is written and the error propagates.
   * A failed or timed-out write surfaces as StorageUnavailableError.
   */
  transaction<T>(updater: (draft: DatabaseSchema) => T, label = 'transaction'): Promise<T> {
    const pending = this.queue.then(() => this.commit(updater, label));

    // The next transaction waits for this write to land, even if the caller timed out
    this.queue = pending.then(
      (commit) => commit.settled,
      () => undefined
    );

    return pending.then((commit) => commit.result);
  }

  private commit<T>(updater: (draft: DatabaseSchema) => T, label: string): PendingCommit<T> {
    const published = this.db.data;
    const draft = structuredClone(published);
    const value = updater(draft);

    draft._version = published._version + 1;
    this.db.data = draft;

    const write = this.db.write().then(
      () => undefined,
      (error: unknown) => {
        if (this.db.data === draft) {
          this.db.data = published;
        }
        storageLogger.error('Write failed, transaction rolled back', {
          label,
          version: draft._version,
          error: String(error),
        });
        throw new StorageUnavailableError(`${label}: write failed`, error);
      }
    );

    return {
      result: withTimeout(write, this.timeoutMs, label).then(() => value),
      settled: write.catch(() => undefined),
    };
  }

  /**
   * Get current version
   */
  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Get last cleanup timestamp
   */
  getLastCleanup(): Date | null {
    return this.db.data._lastCleanup ? new Date(this.db.data._lastCleanup) : null;
  }

  /**
   * Wait for queued writes to land
   */
  async close(): Promise<void> {
    await this.queue;
  }
}

export async function openDatabase(config: DatabaseConfig): Promise<DatabaseConnection> {
  const connection = new DatabaseConnection(config);
  await connection.init();
  return connection;
}
