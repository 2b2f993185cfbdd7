// Utilities: Configuration management
// Pure functions, no external dependencies

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
}

export interface SessionPolicy {
  ttlMs: number;                 // Default 30 days
  maxLifetimeMs: number;         // Hard cap on sliding renewal, from issuedAt
  slidingExpiration: boolean;
  refreshIntervalMs: number;     // Minimum age of last activity before extending
}

export interface LockoutPolicy {
  threshold: number;             // Failures tolerated inside the window
  windowMs: number;
}

export interface AuthConfig {
  dbPath: string;                // ':memory:' keeps everything in process
  passwordIterations: number;
  session: SessionPolicy;
  lockout: LockoutPolicy;
  passwordResetTtlMs: number;
  sweepIntervalMs: number;       // 0 disables the periodic sweep
  storageTimeoutMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  auth: AuthConfig;
}

export const DEFAULT_AUTH_CONFIG: AuthConfig = {
  dbPath: './data/auth.json',
  passwordIterations: 100_000,
  session: {
    ttlMs: 30 * DAY_MS,
    maxLifetimeMs: 90 * DAY_MS,
    slidingExpiration: true,
    refreshIntervalMs: 60 * MINUTE_MS,
  },
  lockout: {
    threshold: 5,
    windowMs: 15 * MINUTE_MS,
  },
  passwordResetTtlMs: 60 * MINUTE_MS,
  sweepIntervalMs: 60 * MINUTE_MS,
  storageTimeoutMs: 5000,
};

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : Number.NaN;
}

function readBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv =
    env.NODE_ENV === 'production' || env.NODE_ENV === 'test' ? env.NODE_ENV : 'development';

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv,
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}

export function buildAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  const defaults = DEFAULT_AUTH_CONFIG;

  return {
    dbPath: env.AUTH_DB_PATH || defaults.dbPath,
    passwordIterations: readNumber(env.PASSWORD_ITERATIONS, defaults.passwordIterations),
    session: {
      ttlMs: readNumber(env.SESSION_TTL_DAYS, defaults.session.ttlMs / DAY_MS) * DAY_MS,
      maxLifetimeMs:
        readNumber(env.SESSION_MAX_LIFETIME_DAYS, defaults.session.maxLifetimeMs / DAY_MS) * DAY_MS,
      slidingExpiration: readBoolean(env.SESSION_SLIDING, defaults.session.slidingExpiration),
      refreshIntervalMs:
        readNumber(env.SESSION_REFRESH_MINUTES, defaults.session.refreshIntervalMs / MINUTE_MS) *
        MINUTE_MS,
    },
    lockout: {
      threshold: readNumber(env.LOCKOUT_THRESHOLD, defaults.lockout.threshold),
      windowMs:
        readNumber(env.LOCKOUT_WINDOW_MINUTES, defaults.lockout.windowMs / MINUTE_MS) * MINUTE_MS,
    },
    passwordResetTtlMs:
      readNumber(env.PASSWORD_RESET_TTL_MINUTES, defaults.passwordResetTtlMs / MINUTE_MS) *
      MINUTE_MS,
    sweepIntervalMs:
      readNumber(env.SESSION_SWEEP_INTERVAL_MINUTES, defaults.sweepIntervalMs / MINUTE_MS) *
      MINUTE_MS,
    storageTimeoutMs: readNumber(env.STORAGE_TIMEOUT_MS, defaults.storageTimeoutMs),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    auth: buildAuthConfig(env),
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const { auth } = config;

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!Number.isInteger(auth.passwordIterations) || auth.passwordIterations < 1) {
    errors.push('PASSWORD_ITERATIONS must be a positive integer');
  }

  if (!(auth.session.ttlMs > 0)) {
    errors.push('SESSION_TTL_DAYS must be positive');
  }

  if (!(auth.session.maxLifetimeMs >= auth.session.ttlMs)) {
    errors.push('SESSION_MAX_LIFETIME_DAYS must be at least SESSION_TTL_DAYS');
  }

  if (!(auth.session.refreshIntervalMs >= 0)) {
    errors.push('SESSION_REFRESH_MINUTES must not be negative');
  }

  if (!Number.isInteger(auth.lockout.threshold) || auth.lockout.threshold < 1) {
    errors.push('LOCKOUT_THRESHOLD must be a positive integer');
  }

  if (!(auth.lockout.windowMs > 0)) {
    errors.push('LOCKOUT_WINDOW_MINUTES must be positive');
  }

  if (!(auth.passwordResetTtlMs > 0)) {
    errors.push('PASSWORD_RESET_TTL_MINUTES must be positive');
  }

  if (!(auth.sweepIntervalMs >= 0)) {
    errors.push('SESSION_SWEEP_INTERVAL_MINUTES must not be negative');
  }

  if (!(auth.storageTimeoutMs > 0)) {
    errors.push('STORAGE_TIMEOUT_MS must be positive');
  }

  return errors;
}
