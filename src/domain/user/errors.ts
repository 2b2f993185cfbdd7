// Domain: Error taxonomy
// Store-level errors stay inside the service; AuthError subclasses cross the boundary

export type AuthErrorKind =
  | 'validation'
  | 'conflict'
  | 'credentials'
  | 'session'
  | 'not_found'
  | 'unavailable';

export type AuthErrorCode =
  | 'INVALID_USERNAME'
  | 'INVALID_EMAIL'
  | 'INVALID_INPUT'
  | 'INVALID_RESET_TOKEN'
  | 'WEAK_PASSWORD'
  | 'USERNAME_TAKEN'
  | 'EMAIL_TAKEN'
  | 'INVALID_CREDENTIALS'
  | 'ACCOUNT_LOCKED'
  | 'INVALID_SESSION'
  | 'EXPIRED_SESSION'
  | 'REVOKED_SESSION'
  | 'USER_NOT_FOUND'
  | 'UNAVAILABLE';

/**
 * Caller-facing messages, fixed per code so nothing internal leaks
 */
export const AUTH_ERROR_MESSAGES: Record<AuthErrorCode, string> = {
  INVALID_USERNAME: 'Username must be 3-20 characters: letters, digits or underscore',
  INVALID_EMAIL: 'Email address is not valid',
  INVALID_INPUT: 'Request is not valid',
  INVALID_RESET_TOKEN: 'Password reset link is invalid or has expired',
  WEAK_PASSWORD: 'Password does not meet the strength requirements',
  USERNAME_TAKEN: 'Username is not available',
  EMAIL_TAKEN: 'Email is already registered',
  INVALID_CREDENTIALS: 'Invalid credentials',
  ACCOUNT_LOCKED: 'Too many failed attempts, try again later',
  INVALID_SESSION: 'Authentication required',
  EXPIRED_SESSION: 'Session has expired',
  REVOKED_SESSION: 'Session is no longer valid',
  USER_NOT_FOUND: 'User not found',
  UNAVAILABLE: 'Service temporarily unavailable',
};

export class AuthError extends Error {
  readonly retryable: boolean;

  constructor(
    public readonly code: AuthErrorCode,
    public readonly kind: AuthErrorKind,
    public readonly details?: Record<string, unknown>
  ) {
    super(AUTH_ERROR_MESSAGES[code]);
    this.name = 'AuthError';
    this.retryable = kind === 'unavailable';
  }
}

export class ValidationError extends AuthError {
  constructor(
    code: 'INVALID_USERNAME' | 'INVALID_EMAIL' | 'INVALID_INPUT' | 'INVALID_RESET_TOKEN',
    details?: Record<string, unknown>
  ) {
    super(code, 'validation', details);
    this.name = 'ValidationError';
  }
}

export class WeakPasswordError extends AuthError {
  constructor(public readonly failedRules: string[]) {
    super('WEAK_PASSWORD', 'validation', { failedRules });
    this.name = 'WeakPasswordError';
  }
}

export class ConflictError extends AuthError {
  constructor(code: 'USERNAME_TAKEN' | 'EMAIL_TAKEN') {
    super(code, 'conflict');
    this.name = 'ConflictError';
  }
}

export class InvalidCredentialsError extends AuthError {
  constructor() {
    super('INVALID_CREDENTIALS', 'credentials');
    this.name = 'InvalidCredentialsError';
  }
}

export class AccountLockedError extends AuthError {
  constructor() {
    super('ACCOUNT_LOCKED', 'credentials');
    this.name = 'AccountLockedError';
  }
}

export class SessionError extends AuthError {
  constructor(code: 'INVALID_SESSION' | 'EXPIRED_SESSION' | 'REVOKED_SESSION') {
    super(code, 'session');
    this.name = 'SessionError';
  }
}

export class UserNotFoundError extends AuthError {
  constructor() {
    super('USER_NOT_FOUND', 'not_found');
    this.name = 'UserNotFoundError';
  }
}

export class UnavailableError extends AuthError {
  constructor() {
    super('UNAVAILABLE', 'unavailable');
    this.name = 'UnavailableError';
  }
}

// ==================== Store-level errors ====================

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export class DuplicateUsernameError extends StoreError {
  constructor(username: string) {
    super(`Username already exists: ${username}`);
    this.name = 'DuplicateUsernameError';
  }
}

export class DuplicateEmailError extends StoreError {
  constructor(email: string) {
    super(`Email already exists: ${email}`);
    this.name = 'DuplicateEmailError';
  }
}

export class MissingUserError extends StoreError {
  constructor(userId: string) {
    super(`User not found: ${userId}`);
    this.name = 'MissingUserError';
  }
}

export class StaleCredentialError extends StoreError {
  constructor(userId: string, public readonly expectedVersion: number) {
    super(`Credentials of ${userId} changed since version ${expectedVersion}`);
    this.name = 'StaleCredentialError';
  }
}

export class SessionNotFoundError extends StoreError {
  constructor() {
    super('Session not found');
    this.name = 'SessionNotFoundError';
  }
}

export class SessionExpiredError extends StoreError {
  constructor(public readonly expiredAt: Date) {
    super(`Session expired at ${expiredAt.toISOString()}`);
    this.name = 'SessionExpiredError';
  }
}

export class SessionRevokedError extends StoreError {
  constructor(public readonly reason: string) {
    super(`Session revoked: ${reason}`);
    this.name = 'SessionRevokedError';
  }
}

export class ResetTokenInvalidError extends StoreError {
  constructor(reason: 'missing' | 'used' | 'expired') {
    super(`Password reset token ${reason}`);
    this.name = 'ResetTokenInvalidError';
  }
}

export class StorageUnavailableError extends StoreError {
  constructor(message: string, public readonly origin?: unknown) {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}
