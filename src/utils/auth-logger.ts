// Utility: Structured logger for auth events
// Provides consistent logging format for authentication, session and storage events

export interface LogContext {
  [key: string]: string | number | boolean | undefined;
}

/**
 * Simple structured logger for auth events
 */
export class AuthLogger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private log(level: string, message: string, context?: LogContext): void {
    if (process.env.NODE_ENV === 'test') {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      component: this.prefix,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(`[AUTH] ${formatted}`);
    } else {
      console.log(`[AUTH] ${formatted}`);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.NODE_ENV !== 'production') {
      this.log('debug', message, context);
    }
  }
}

/**
 * Auth-specific logger instance
 */
export const authLogger = new AuthLogger('Auth');

/**
 * Session cleanup logger instance
 */
export const cleanupLogger = new AuthLogger('SessionCleanup');

/**
 * Storage layer logger instance
 */
export const storageLogger = new AuthLogger('Storage');

/**
 * Metrics tracker (simple in-memory counter)
 */
export class AuthMetrics {
  private counters: Map<string, number> = new Map();

  increment(name: string, value = 1): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);
  }

  getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  getAll(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  reset(): void {
    this.counters.clear();
  }
}

/**
 * Auth metrics instance
 */
export const authMetrics = new AuthMetrics();

/**
 * Metric names constants
 */
export const AUTH_METRICS = {
  LOGIN_SUCCESS: 'auth.login.success',
  LOGIN_FAILURE: 'auth.login.failure',
  LOGIN_LOCKED: 'auth.login.locked',
  LOGOUT: 'auth.logout',
  REGISTER_SUCCESS: 'auth.register.success',
  REGISTER_FAILURE: 'auth.register.failure',
  PASSWORD_CHANGED: 'auth.password.changed',
  PASSWORD_RESET_REQUESTED: 'auth.password.reset_requested',
  PASSWORD_RESET_COMPLETED: 'auth.password.reset_completed',

  SESSION_CREATED: 'auth.session.created',
  SESSION_VALIDATED: 'auth.session.validated',
  SESSION_REJECTED: 'auth.session.rejected',
  SESSION_REFRESHED: 'auth.session.refreshed',
  SESSION_REVOKED: 'auth.session.revoked',

  ATTEMPT_LOG_FAILURE: 'auth.attempt_log.failure',
  STORAGE_UNAVAILABLE: 'auth.storage.unavailable',

  CLEANUP_RUN: 'auth.cleanup.run',
  CLEANUP_SESSIONS_REMOVED: 'auth.cleanup.sessions_removed',
} as const;
