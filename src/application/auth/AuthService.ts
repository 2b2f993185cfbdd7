// Application: Authentication Service
// Handles registration, login, logout, session validation and credential changes

import { createHash, randomBytes } from 'crypto';
import type {
  Session,
  UserContext,
  User,
  Clock,
  LoginAttempt,
  LoginOptions,
  LoginOutcome,
  ProfileChanges,
  PublicUser,
  SessionSummary,
} from '@/domain/user/types.js';
import { systemClock, toPublicUser } from '@/domain/user/types.js';
import type {
  IAuthService,
  ICredentialStore,
  ISessionStore,
  IAttemptLog,
  IPasswordResetStore,
  IPasswordHasher,
  PasswordResetNotifier,
} from '@/domain/user/repository.js';
import {
  AuthError,
  AccountLockedError,
  ConflictError,
  DuplicateEmailError,
  DuplicateUsernameError,
  InvalidCredentialsError,
  MissingUserError,
  ResetTokenInvalidError,
  SessionError,
  SessionExpiredError,
  SessionNotFoundError,
  SessionRevokedError,
  StaleCredentialError,
  UnavailableError,
  UserNotFoundError,
  ValidationError,
  WeakPasswordError,
} from '@/domain/user/errors.js';
import {
  EMAIL_RULES,
  PASSWORD_RULES,
  USERNAME_RULES,
  evaluateRules,
  normalizeIdentifier,
} from '@/domain/user/rules.js';
import type { LockoutPolicy, SessionPolicy } from '@/utils/config.js';
import { DEFAULT_AUTH_CONFIG } from '@/utils/config.js';
import { authLogger, authMetrics, AUTH_METRICS, type LogContext } from '@/utils/auth-logger.js';
import { KeyedQueue } from '@/utils/keyed-queue.js';
import { LogPasswordResetNotifier } from './PasswordResetNotifier.js';

const RESET_TOKEN_BYTES = 32;
const TOKEN_HINT_LENGTH = 6;
const DEFAULT_ACTIVITY_LIMIT = 20;

export interface AuthServiceConfig {
  session: SessionPolicy;
  lockout: LockoutPolicy;
  passwordResetTtlMs: number;
}

export interface AuthServiceDependencies {
  users: ICredentialStore;
  sessions: ISessionStore;
  attempts: IAttemptLog;
  passwordResets: IPasswordResetStore;
  hasher: IPasswordHasher;
  notifier?: PasswordResetNotifier;
  clock?: Clock;
}

/**
 * Digest under which reset tokens are stored; the raw token never hits disk
 */
export function digestResetToken(token: string): string {
  return createHash('sha256').update(token, 'utf8').digest('hex');
}

export class AuthService implements IAuthService {
  private users: ICredentialStore;
  private sessions: ISessionStore;
  private attempts: IAttemptLog;
  private passwordResets: IPasswordResetStore;
  private hasher: IPasswordHasher;
  private notifier: PasswordResetNotifier;
  private clock: Clock;
  private dummyCredential?: Promise<{ salt: string; digest: string }>;
  private attemptQueue = new KeyedQueue();

  constructor(
    deps: AuthServiceDependencies,
    private config: AuthServiceConfig = {
      session: DEFAULT_AUTH_CONFIG.session,
      lockout: DEFAULT_AUTH_CONFIG.lockout,
      passwordResetTtlMs: DEFAULT_AUTH_CONFIG.passwordResetTtlMs,
    }
  ) {
    this.users = deps.users;
    this.sessions = deps.sessions;
    this.attempts = deps.attempts;
    this.passwordResets = deps.passwordResets;
    this.hasher = deps.hasher;
    this.notifier = deps.notifier ?? new LogPasswordResetNotifier();
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Register a new user
   */
  async register(
    username: string,
    email: string,
    password: string,
    profile: { fullName?: string } = {}
  ): Promise<PublicUser> {
    try {
      const cleanUsername = username.trim();
      const cleanEmail = email.trim();

      if (evaluateRules(cleanUsername, USERNAME_RULES).length > 0) {
        throw new ValidationError('INVALID_USERNAME');
      }
      if (evaluateRules(cleanEmail, EMAIL_RULES).length > 0) {
        throw new ValidationError('INVALID_EMAIL');
      }
      this.assertStrongPassword(password);

      const salt = this.hasher.generateSalt();
      const passwordHash = await this.hasher.hash(password, salt, this.hasher.iterations);

      const user = await this.users.create({
        username: cleanUsername,
        email: cleanEmail,
        passwordHash,
        salt,
        iterations: this.hasher.iterations,
        profile: { fullName: profile.fullName },
      });

      authMetrics.increment(AUTH_METRICS.REGISTER_SUCCESS);
      authLogger.info('User registered', { userId: user.id, username: user.username });

      return toPublicUser(user);
    } catch (error) {
      authMetrics.increment(AUTH_METRICS.REGISTER_FAILURE);
      const authError = this.toAuthError(error, 'register', { username });
      authLogger.warn('Registration failed', { username, code: authError.code });
      throw authError;
    }
  }

  /**
   * Login with username or email.
   * Unknown identifiers and wrong passwords fail identically.
   */
  async login(identifier: string, password: string, options: LoginOptions = {}): Promise<Session> {
    try {
      // Count, verify and record run as one step per identifier
      return await this.attemptQueue.run(normalizeIdentifier(identifier), () =>
        this.attemptLogin(identifier, password, options)
      );
    } catch (error) {
      throw this.toAuthError(error, 'login', { identifier });
    }
  }

  /**
   * Resolve a session token to its user, sliding the expiry when due
   */
  async validateSession(token: string): Promise<UserContext> {
    try {
      const context = await this.sessions.validate(token);
      authMetrics.increment(AUTH_METRICS.SESSION_VALIDATED);

      const refreshed = await this.refreshIfDue(token);
      return refreshed ? { ...context, expiresAt: refreshed.expiresAt } : context;
    } catch (error) {
      authMetrics.increment(AUTH_METRICS.SESSION_REJECTED);
      throw this.toAuthError(error, 'validateSession');
    }
  }

  /**
   * Revoke one session. Unknown or already revoked tokens are a no-op.
   */
  async logout(token: string): Promise<void> {
    try {
      const revoked = await this.sessions.revoke(token, 'logout');
      if (revoked) {
        authMetrics.increment(AUTH_METRICS.LOGOUT);
        authMetrics.increment(AUTH_METRICS.SESSION_REVOKED);
        authLogger.info('User logged out');
      }
    } catch (error) {
      throw this.toAuthError(error, 'logout');
    }
  }

  /**
   * Revoke every session of a user
   */
  async logoutAll(userId: string): Promise<number> {
    try {
      const count = await this.sessions.revokeAllForUser(userId, 'logout_all');
      authMetrics.increment(AUTH_METRICS.SESSION_REVOKED, count);
      authLogger.info('All sessions revoked', { userId, count });
      return count;
    } catch (error) {
      throw this.toAuthError(error, 'logoutAll', { userId });
    }
  }

  /**
   * Rotate a password after re-verifying the old one; all sessions end
   */
  async changePassword(userId: string, oldPassword: string, newPassword: string): Promise<void> {
    try {
      const { username } = await this.requireActiveUser(userId);

      // Wrong old passwords count toward the same lockout as logins
      await this.attemptQueue.run(normalizeIdentifier(username), async () => {
        await this.assertNotLocked(username, undefined, userId);

        const user = await this.requireActiveUser(userId);
        const valid = await this.hasher.verify(oldPassword, user.salt, user.iterations, user.passwordHash);
        if (!valid) {
          await this.recordAttempt(username, 'bad_credentials', undefined, userId);
          authLogger.warn('Password change failed: invalid password', { userId });
          throw new InvalidCredentialsError();
        }
        this.assertStrongPassword(newPassword);

        await this.rotatePassword(user, newPassword, 'password_changed');
      });

      authMetrics.increment(AUTH_METRICS.PASSWORD_CHANGED);
      authLogger.info('Password changed', { userId });
    } catch (error) {
      throw this.toAuthError(error, 'changePassword', { userId });
    }
  }

  /**
   * Public profile of an active user
   */
  async getProfile(userId: string): Promise<PublicUser> {
    try {
      return toPublicUser(await this.requireActiveUser(userId));
    } catch (error) {
      throw this.toAuthError(error, 'getProfile', { userId });
    }
  }

  /**
   * Update the caller's own profile
   */
  async updateProfile(context: UserContext, changes: ProfileChanges): Promise<PublicUser> {
    try {
      const update: ProfileChanges = { ...changes };
      if (update.email !== undefined) {
        update.email = update.email.trim();
        if (evaluateRules(update.email, EMAIL_RULES).length > 0) {
          throw new ValidationError('INVALID_EMAIL');
        }
      }

      await this.requireActiveUser(context.userId);
      const user = await this.users.updateProfile(context.userId, update);

      authLogger.info('Profile updated', { userId: user.id });
      return toPublicUser(user);
    } catch (error) {
      throw this.toAuthError(error, 'updateProfile', { userId: context.userId });
    }
  }

  /**
   * Live sessions of the caller, most recently active first
   */
  async listSessions(context: UserContext): Promise<SessionSummary[]> {
    try {
      const sessions = await this.sessions.listForUser(context.userId);

      return sessions
        .sort((a, b) => b.lastActivityAt.getTime() - a.lastActivityAt.getTime())
        .map((session) => ({
          tokenHint: session.token.slice(-TOKEN_HINT_LENGTH),
          deviceName: session.deviceName || 'Unknown Device',
          issuedAt: session.issuedAt,
          lastActivityAt: session.lastActivityAt,
          expiresAt: session.expiresAt,
          isCurrent: session.token === context.sessionToken,
        }));
    } catch (error) {
      throw this.toAuthError(error, 'listSessions', { userId: context.userId });
    }
  }

  /**
   * Recent login attempts resolved to the caller
   */
  async getLoginActivity(context: UserContext, limit = DEFAULT_ACTIVITY_LIMIT): Promise<LoginAttempt[]> {
    try {
      return await this.attempts.listForUser(context.userId, limit);
    } catch (error) {
      throw this.toAuthError(error, 'getLoginActivity', { userId: context.userId });
    }
  }

  /**
   * Soft-disable an account and end its sessions
   */
  async disableUser(userId: string): Promise<void> {
    try {
      await this.users.disable(userId);
      const count = await this.sessions.revokeAllForUser(userId, 'account_disabled');

      authMetrics.increment(AUTH_METRICS.SESSION_REVOKED, count);
      authLogger.info('User disabled', { userId, sessionsRevoked: count });
    } catch (error) {
      throw this.toAuthError(error, 'disableUser', { userId });
    }
  }

  /**
   * Issue a reset token for an email address.
   * Resolves the same way whether or not the address is registered.
   */
  async requestPasswordReset(email: string): Promise<void> {
    try {
      const cleanEmail = email.trim();
      if (evaluateRules(cleanEmail, EMAIL_RULES).length > 0) {
        throw new ValidationError('INVALID_EMAIL');
      }

      const user = await this.users.findByIdentifier(cleanEmail);
      if (!user || !user.isActive || normalizeIdentifier(user.email) !== normalizeIdentifier(cleanEmail)) {
        authLogger.debug('Password reset requested for unknown email');
        return;
      }

      const token = randomBytes(RESET_TOKEN_BYTES).toString('base64url');
      const expiresAt = new Date(this.clock.now().getTime() + this.config.passwordResetTtlMs);

      await this.passwordResets.create(user.id, digestResetToken(token), expiresAt);
      await this.notifier.sendResetToken({ userId: user.id, email: user.email, token, expiresAt });

      authMetrics.increment(AUTH_METRICS.PASSWORD_RESET_REQUESTED);
      authLogger.info('Password reset requested', { userId: user.id });
    } catch (error) {
      throw this.toAuthError(error, 'requestPasswordReset');
    }
  }

  /**
   * Redeem a reset token; all sessions of the user end
   */
  async resetPassword(token: string, newPassword: string): Promise<void> {
    try {
      this.assertStrongPassword(newPassword);

      const userId = await this.passwordResets.consume(digestResetToken(token));
      const user = await this.requireActiveUser(userId);
      await this.rotatePassword(user, newPassword, 'password_reset');

      authMetrics.increment(AUTH_METRICS.PASSWORD_RESET_COMPLETED);
      authLogger.info('Password reset completed', { userId });
    } catch (error) {
      throw this.toAuthError(error, 'resetPassword');
    }
  }

  /**
   * Remove expired sessions from storage
   */
  async sweepExpiredSessions(): Promise<number> {
    try {
      return await this.sessions.sweepExpired();
    } catch (error) {
      throw this.toAuthError(error, 'sweepExpiredSessions');
    }
  }

  // ==================== Helpers ====================

  private async attemptLogin(identifier: string, password: string, options: LoginOptions): Promise<Session> {
    const { sourceAddress, deviceName } = options;

    await this.assertNotLocked(identifier, sourceAddress);

    const user = await this.users.findByIdentifier(identifier);
    if (!user || !user.isActive) {
      // Same PBKDF2 cost as a real check
      const dummy = await this.getDummyCredential();
      await this.hasher.verify(password, dummy.salt, this.hasher.iterations, dummy.digest);
      await this.recordAttempt(identifier, 'unknown_identifier', sourceAddress, user?.id);
      authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
      authLogger.warn('Login failed: unknown identifier', { identifier, sourceAddress });
      throw new InvalidCredentialsError();
    }

    const valid = await this.hasher.verify(password, user.salt, user.iterations, user.passwordHash);
    if (!valid) {
      await this.recordAttempt(identifier, 'bad_credentials', sourceAddress, user.id);
      authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
      authLogger.warn('Login failed: invalid password', { userId: user.id, sourceAddress });
      throw new InvalidCredentialsError();
    }

    await this.recordAttempt(identifier, 'success', sourceAddress, user.id);

    const session = await this.sessions.issue(user.id, this.config.session.ttlMs, {
      credentialVersion: user.credentialVersion,
      deviceName,
    });

    await this.bestEffort('recordLogin', () => this.users.recordLogin(user.id, session.issuedAt));
    if (this.hasher.needsRehash(user.iterations)) {
      await this.bestEffort('rehashPassword', () => this.upgradeHash(user, password));
    }

    authMetrics.increment(AUTH_METRICS.LOGIN_SUCCESS);
    authMetrics.increment(AUTH_METRICS.SESSION_CREATED);
    authLogger.info('User logged in', { userId: user.id, username: user.username, sourceAddress });

    return session;
  }

  /**
   * Refuse an identifier with too many recent failures, before any hashing
   */
  private async assertNotLocked(identifier: string, sourceAddress?: string, userId?: string): Promise<void> {
    const failures = await this.attempts.countRecentFailures(identifier, this.config.lockout.windowMs);
    if (failures >= this.config.lockout.threshold) {
      await this.recordAttempt(identifier, 'locked', sourceAddress, userId);
      authMetrics.increment(AUTH_METRICS.LOGIN_LOCKED);
      authLogger.warn('Attempt refused: identifier locked', { identifier, failures, sourceAddress });
      throw new AccountLockedError();
    }
  }

  private assertStrongPassword(password: string): void {
    const failedRules = evaluateRules(password, PASSWORD_RULES);
    if (failedRules.length > 0) {
      throw new WeakPasswordError(failedRules);
    }
  }

  private async requireActiveUser(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user || !user.isActive) {
      throw new UserNotFoundError();
    }
    return user;
  }

  private async rotatePassword(user: User, newPassword: string, reason: string): Promise<void> {
    const salt = this.hasher.generateSalt();
    const passwordHash = await this.hasher.hash(newPassword, salt, this.hasher.iterations);

    await this.users.updatePassword(user.id, user.credentialVersion, passwordHash, salt, this.hasher.iterations);
    const count = await this.sessions.revokeAllForUser(user.id, reason);
    authMetrics.increment(AUTH_METRICS.SESSION_REVOKED, count);
  }

  private async upgradeHash(user: User, password: string): Promise<void> {
    const salt = this.hasher.generateSalt();
    const passwordHash = await this.hasher.hash(password, salt, this.hasher.iterations);
    const applied = await this.users.rehashPassword(
      user.id,
      user.credentialVersion,
      passwordHash,
      salt,
      this.hasher.iterations
    );

    if (applied) {
      authLogger.info('Password digest upgraded', {
        userId: user.id,
        from: user.iterations,
        to: this.hasher.iterations,
      });
    }
  }

  private async refreshIfDue(token: string): Promise<Session | null> {
    const { slidingExpiration, refreshIntervalMs, ttlMs, maxLifetimeMs } = this.config.session;
    if (!slidingExpiration) {
      return null;
    }

    const session = await this.sessions.find(token);
    if (!session || this.clock.now().getTime() - session.lastActivityAt.getTime() < refreshIntervalMs) {
      return null;
    }

    try {
      const extended = await this.sessions.extend(token, ttlMs, maxLifetimeMs);
      if (extended) {
        authMetrics.increment(AUTH_METRICS.SESSION_REFRESHED);
      }
      return extended;
    } catch (error) {
      // The session is still valid; only the refresh is lost
      authLogger.warn('Session refresh failed', { error: String(error) });
      return null;
    }
  }

  private async recordAttempt(
    identifier: string,
    outcome: LoginOutcome,
    sourceAddress?: string,
    userId?: string
  ): Promise<void> {
    await this.attempts.record({ identifier, outcome, userId, sourceAddress });
  }

  private async bestEffort(operation: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      authLogger.warn(`${operation} failed after login`, { error: String(error) });
    }
  }

  private getDummyCredential(): Promise<{ salt: string; digest: string }> {
    if (!this.dummyCredential) {
      const salt = this.hasher.generateSalt();
      this.dummyCredential = this.hasher
        .hash(randomBytes(16).toString('hex'), salt, this.hasher.iterations)
        .then((digest) => ({ salt, digest }));
    }
    return this.dummyCredential;
  }

  /**
   * Translate store failures into the caller-facing taxonomy.
   * Anything unrecognised is reported as storage being unavailable.
   */
  private toAuthError(error: unknown, operation: string, context: LogContext = {}): AuthError {
    if (error instanceof AuthError) {
      return error;
    }
    if (error instanceof DuplicateUsernameError) {
      return new ConflictError('USERNAME_TAKEN');
    }
    if (error instanceof DuplicateEmailError) {
      return new ConflictError('EMAIL_TAKEN');
    }
    if (error instanceof MissingUserError) {
      return new UserNotFoundError();
    }
    if (error instanceof SessionNotFoundError) {
      return new SessionError('INVALID_SESSION');
    }
    if (error instanceof SessionExpiredError) {
      return new SessionError('EXPIRED_SESSION');
    }
    if (error instanceof SessionRevokedError) {
      return new SessionError('REVOKED_SESSION');
    }
    if (error instanceof StaleCredentialError) {
      return new InvalidCredentialsError();
    }
    if (error instanceof ResetTokenInvalidError) {
      return new ValidationError('INVALID_RESET_TOKEN');
    }

    authMetrics.increment(AUTH_METRICS.STORAGE_UNAVAILABLE);
    authLogger.error(`${operation} failed`, { ...context, error: String(error) });
    return new UnavailableError();
  }
}
