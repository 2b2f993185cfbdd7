// Credential Store - LowDB implementation
// Owns the users table; username and email are unique case-insensitively

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseConnection, UserRecord } from './connection.js';
import type { User, ProfileChanges, Clock } from '@/domain/user/types.js';
import { systemClock } from '@/domain/user/types.js';
import type { ICredentialStore, NewUserData } from '@/domain/user/repository.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  MissingUserError,
  StaleCredentialError,
} from '@/domain/user/errors.js';
import { normalizeIdentifier } from '@/domain/user/rules.js';

export class CredentialStore implements ICredentialStore {
  constructor(
    private db: DatabaseConnection,
    private clock: Clock = systemClock
  ) {}

  /**
   * Create a new user; the uniqueness check and the insert share one transaction
   */
  async create(data: NewUserData): Promise<User> {
    const usernameKey = normalizeIdentifier(data.username);
    const emailKey = normalizeIdentifier(data.email);

    const record = await this.db.transaction((draft) => {
      if (draft.users.some((u) => u.username_key === usernameKey)) {
        throw new DuplicateUsernameError(data.username);
      }
      if (draft.users.some((u) => u.email_key === emailKey)) {
        throw new DuplicateEmailError(data.email);
      }

      const newUser: UserRecord = {
        id: uuidv4(),
        username: data.username.trim(),
        username_key: usernameKey,
        email: data.email.trim(),
        email_key: emailKey,
        password_hash: data.passwordHash,
        salt: data.salt,
        iterations: data.iterations,
        credential_version: 1,
        created_at: this.clock.now().toISOString(),
        last_login_at: null,
        is_active: 1,
        full_name: data.profile?.fullName?.trim() ?? '',
        settings: { ...(data.profile?.settings ?? {}) },
      };

      draft.users.push(newUser);
      return newUser;
    }, 'users.create');

    return this.rowToUser(record);
  }

  /**
   * Get user by ID
   */
  async findById(id: string): Promise<User | null> {
    const user = this.db.getData().users.find((u) => u.id === id);
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Find by username OR email, case-insensitively
   */
  async findByIdentifier(identifier: string): Promise<User | null> {
    const key = normalizeIdentifier(identifier);
    if (!key) return null;

    const user = this.db
      .getData()
      .users.find((u) => u.username_key === key || u.email_key === key);
    return user ? this.rowToUser(user) : null;
  }

  /**
   * Replace the digest material and bump the credential version.
   * Fails with StaleCredentialError if the version moved since the caller verified it.
   */
  async updatePassword(
    userId: string,
    expectedVersion: number,
    passwordHash: string,
    salt: string,
    iterations: number
  ): Promise<User> {
    const record = await this.db.transaction((draft) => {
      const user = draft.users.find((u) => u.id === userId);
      if (!user) {
        throw new MissingUserError(userId);
      }
      if (user.credential_version !== expectedVersion) {
        throw new StaleCredentialError(userId, expectedVersion);
      }

      user.password_hash = passwordHash;
      user.salt = salt;
      user.iterations = iterations;
      user.credential_version += 1;
      return user;
    }, 'users.updatePassword');

    return this.rowToUser(record);
  }

  /**
   * Re-hash with a new iteration count without invalidating sessions.
   * Skipped if the password changed since the caller read the user.
   */
  async rehashPassword(
    userId: string,
    expectedVersion: number,
    passwordHash: string,
    salt: string,
    iterations: number
  ): Promise<boolean> {
    return this.db.transaction((draft) => {
      const user = draft.users.find((u) => u.id === userId);
      if (!user || user.credential_version !== expectedVersion) {
        return false;
      }

      user.password_hash = passwordHash;
      user.salt = salt;
      user.iterations = iterations;
      return true;
    }, 'users.rehashPassword');
  }

  /**
   * Update profile fields; settings are merged, email stays unique
   */
  async updateProfile(userId: string, changes: ProfileChanges): Promise<User> {
    const record = await this.db.transaction((draft) => {
      const user = draft.users.find((u) => u.id === userId);
      if (!user) {
        throw new MissingUserError(userId);
      }

      if (changes.email !== undefined) {
        const emailKey = normalizeIdentifier(changes.email);
        if (draft.users.some((u) => u.id !== userId && u.email_key === emailKey)) {
          throw new DuplicateEmailError(changes.email);
        }
        user.email = changes.email.trim();
        user.email_key = emailKey;
      }
      if (changes.fullName !== undefined) {
        user.full_name = changes.fullName.trim();
      }
      if (changes.settings !== undefined) {
        user.settings = { ...user.settings, ...changes.settings };
      }

      return user;
    }, 'users.updateProfile');

    return this.rowToUser(record);
  }

  async recordLogin(userId: string, at: Date): Promise<void> {
    await this.db.transaction((draft) => {
      const user = draft.users.find((u) => u.id === userId);
      if (user) {
        user.last_login_at = at.toISOString();
      }
    }, 'users.recordLogin');
  }

  /**
   * Soft-disable; the row stays for referential integrity
   */
  async disable(userId: string): Promise<void> {
    await this.db.transaction((draft) => {
      const user = draft.users.find((u) => u.id === userId);
      if (!user) {
        throw new MissingUserError(userId);
      }
      user.is_active = 0;
    }, 'users.disable');
  }

  async count(): Promise<{ total: number; active: number }> {
    const users = this.db.getData().users;
    return {
      total: users.length,
      active: users.filter((u) => u.is_active === 1).length,
    };
  }

  private rowToUser(row: UserRecord): User {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      passwordHash: row.password_hash,
      salt: row.salt,
      iterations: row.iterations,
      credentialVersion: row.credential_version,
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      lastLoginAt: row.last_login_at ? new Date(row.last_login_at) : null,
      profile: {
        fullName: row.full_name,
        settings: { ...row.settings },
      },
    };
  }
}
