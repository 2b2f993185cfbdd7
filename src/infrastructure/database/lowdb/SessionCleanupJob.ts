// Infrastructure: Session Cleanup Job
// Periodic background sweep of expired sessions

import type { ISessionStore } from '@/domain/user/repository.js';
import { cleanupLogger, authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';

export interface SessionCleanupConfig {
  intervalMs: number;      // Sweep interval (default: 1 hour)
  enabled: boolean;        // Whether cleanup is enabled
  logEnabled: boolean;     // Whether to log idle runs
}

/**
 * SessionCleanupJob - Periodic sweep of expired sessions
 *
 * The timer is unref'd, so it never keeps the process alive on its own.
 */
export class SessionCleanupJob {
  private intervalId: NodeJS.Timeout | null = null;

  constructor(
    private sessionStore: ISessionStore,
    private config: SessionCleanupConfig
  ) {}

  /**
   * Start the periodic cleanup job
   */
  start(): void {
    if (!this.config.enabled || this.config.intervalMs <= 0) {
      if (this.config.logEnabled) {
        cleanupLogger.info('Cleanup disabled, not starting');
      }
      return;
    }

    if (this.intervalId) {
      if (this.config.logEnabled) {
        cleanupLogger.warn('Already running');
      }
      return;
    }

    // Run immediately on start
    this.runOnce().catch((error) => {
      cleanupLogger.error('Initial cleanup failed', { error: String(error) });
    });

    this.intervalId = setInterval(() => {
      this.runOnce().catch((error) => {
        cleanupLogger.error('Periodic cleanup failed', { error: String(error) });
      });
    }, this.config.intervalMs);
    this.intervalId.unref();

    if (this.config.logEnabled) {
      cleanupLogger.info('Started', { intervalMs: this.config.intervalMs });
    }
  }

  /**
   * Stop the periodic cleanup job
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;

      if (this.config.logEnabled) {
        cleanupLogger.info('Stopped');
      }
    }
  }

  /**
   * Sweep once, returns the number of sessions removed
   */
  async runOnce(): Promise<number> {
    authMetrics.increment(AUTH_METRICS.CLEANUP_RUN);
    const deleted = await this.sessionStore.sweepExpired();

    if (deleted > 0) {
      authMetrics.increment(AUTH_METRICS.CLEANUP_SESSIONS_REMOVED, deleted);
      cleanupLogger.info('Removed expired sessions', { count: deleted });
    } else if (this.config.logEnabled) {
      cleanupLogger.debug('No expired sessions to remove');
    }

    return deleted;
  }

  /**
   * Get current status
   */
  getStatus(): { running: boolean; intervalMs: number; enabled: boolean } {
    return {
      running: this.intervalId !== null,
      intervalMs: this.config.intervalMs,
      enabled: this.config.enabled,
    };
  }
}

/**
 * Default configuration for session cleanup
 */
export function defaultCleanupConfig(): SessionCleanupConfig {
  return {
    intervalMs: 60 * 60 * 1000,  // 1 hour
    enabled: true,
    logEnabled: true,
  };
}
