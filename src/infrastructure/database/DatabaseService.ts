// Database Service - Main entry point for LowDB database operations
// Opens the document and wires one store per table

import type { Clock } from '@/domain/user/types.js';
import { systemClock } from '@/domain/user/types.js';
import {
  openDatabase,
  type DatabaseConfig,
  type DatabaseConnection,
} from './lowdb/connection.js';
import { CredentialStore } from './lowdb/CredentialStore.js';
import { SessionStore } from './lowdb/SessionStore.js';
import { AttemptLog } from './lowdb/AttemptLog.js';
import { PasswordResetStore } from './lowdb/PasswordResetStore.js';

export interface DatabaseServiceOptions extends DatabaseConfig {
  clock?: Clock;
  sweepBatchSize?: number;
}

export class DatabaseService {
  // Stores
  public readonly users: CredentialStore;
  public readonly sessions: SessionStore;
  public readonly attempts: AttemptLog;
  public readonly passwordResets: PasswordResetStore;

  private constructor(
    private readonly connection: DatabaseConnection,
    clock: Clock,
    sweepBatchSize?: number
  ) {
    this.users = new CredentialStore(connection, clock);
    this.sessions = new SessionStore(connection, clock, sweepBatchSize);
    this.attempts = new AttemptLog(connection, clock);
    this.passwordResets = new PasswordResetStore(connection, clock);
  }

  /**
   * Open the database and build the stores
   */
  static async open(options: DatabaseServiceOptions): Promise<DatabaseService> {
    const { clock = systemClock, sweepBatchSize, ...config } = options;
    const connection = await openDatabase(config);
    return new DatabaseService(connection, clock, sweepBatchSize);
  }

  /**
   * Wait for pending writes before shutdown
   */
  async close(): Promise<void> {
    await this.connection.close();
  }

  /**
   * Get database statistics
   */
  async getStats(): Promise<{
    users: { total: number; active: number };
    version: number;
    lastCleanup: Date | null;
  }> {
    return {
      users: await this.users.count(),
      version: this.connection.getVersion(),
      lastCleanup: this.connection.getLastCleanup(),
    };
  }
}

export default DatabaseService;
