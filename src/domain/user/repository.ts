// Domain: Storage and service contracts
// Implemented by the infrastructure layer (LowDB) and the application layer

import type {
  User,
  Session,
  UserContext,
  LoginAttempt,
  LoginOutcome,
  UserProfile,
  ProfileChanges,
  PublicUser,
  SessionSummary,
  LoginOptions,
} from './types.js';

export interface NewUserData {
  username: string;
  email: string;
  passwordHash: string;
  salt: string;
  iterations: number;
  profile?: Partial<UserProfile>;
}

/**
 * Durable users table; the only writer of user rows
 */
export interface ICredentialStore {
  create(data: NewUserData): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByIdentifier(identifier: string): Promise<User | null>;
  updatePassword(
    userId: string,
    expectedVersion: number,
    passwordHash: string,
    salt: string,
    iterations: number
  ): Promise<User>;
  rehashPassword(
    userId: string,
    expectedVersion: number,
    passwordHash: string,
    salt: string,
    iterations: number
  ): Promise<boolean>;
  updateProfile(userId: string, changes: ProfileChanges): Promise<User>;
  recordLogin(userId: string, at: Date): Promise<void>;
  disable(userId: string): Promise<void>;
  count(): Promise<{ total: number; active: number }>;
}

export interface IssueSessionOptions {
  credentialVersion: number;
  deviceName?: string;
}

/**
 * Durable sessions table; the only writer of session rows
 */
export interface ISessionStore {
  issue(userId: string, ttlMs: number, options: IssueSessionOptions): Promise<Session>;
  find(token: string): Promise<Session | null>;
  validate(token: string): Promise<UserContext>;
  extend(token: string, ttlMs: number, maxLifetimeMs: number): Promise<Session | null>;
  revoke(token: string, reason: string): Promise<boolean>;
  revokeAllForUser(userId: string, reason: string): Promise<number>;
  listForUser(userId: string): Promise<Session[]>;
  sweepExpired(): Promise<number>;
}

export interface AttemptRecord {
  identifier: string;
  outcome: LoginOutcome;
  userId?: string;
  sourceAddress?: string;
}

/**
 * Append-only login attempts table
 */
export interface IAttemptLog {
  record(attempt: AttemptRecord): Promise<void>;
  countRecentFailures(identifier: string, windowMs: number): Promise<number>;
  listForUser(userId: string, limit: number): Promise<LoginAttempt[]>;
}

/**
 * Durable password reset requests table
 */
export interface IPasswordResetStore {
  create(userId: string, tokenDigest: string, expiresAt: Date): Promise<void>;
  consume(tokenDigest: string): Promise<string>;
}

export interface IPasswordHasher {
  hash(password: string, salt: string, iterations: number): Promise<string>;
  generateSalt(): string;
  verify(password: string, salt: string, iterations: number, digest: string): Promise<boolean>;
  needsRehash(iterations: number): boolean;
  readonly iterations: number;
}

/**
 * Delivers password reset tokens out of band (mail, UI prompt, ...)
 */
export interface PasswordResetNotifier {
  sendResetToken(input: { userId: string; email: string; token: string; expiresAt: Date }): Promise<void>;
}

/**
 * Authentication service interface
 */
export interface IAuthService {
  register(username: string, email: string, password: string, profile?: { fullName?: string }): Promise<PublicUser>;
  login(identifier: string, password: string, options?: LoginOptions): Promise<Session>;
  validateSession(token: string): Promise<UserContext>;
  logout(token: string): Promise<void>;
  logoutAll(userId: string): Promise<number>;
  changePassword(userId: string, oldPassword: string, newPassword: string): Promise<void>;
  getProfile(userId: string): Promise<PublicUser>;
  updateProfile(context: UserContext, changes: ProfileChanges): Promise<PublicUser>;
  listSessions(context: UserContext): Promise<SessionSummary[]>;
  getLoginActivity(context: UserContext, limit?: number): Promise<LoginAttempt[]>;
  disableUser(userId: string): Promise<void>;
  requestPasswordReset(email: string): Promise<void>;
  resetPassword(token: string, newPassword: string): Promise<void>;
  sweepExpiredSessions(): Promise<number>;
}
