// Domain: User types
// Pure TypeScript interfaces for identity, sessions and login activity

/**
 * Free-form profile data owned by the user
 */
export interface UserProfile {
  fullName: string;
  settings: Record<string, unknown>;
}

/**
 * User entity representing a local account
 */
export interface User {
  id: string;                    // UUID
  username: string;
  email: string;
  passwordHash: string;          // PBKDF2 digest (hex)
  salt: string;                  // Per-user random salt (hex)
  iterations: number;            // PBKDF2 iteration count used for this digest
  credentialVersion: number;     // Bumped on every password rotation
  isActive: boolean;             // false once soft-disabled
  createdAt: Date;
  lastLoginAt: Date | null;
  profile: UserProfile;
}

/**
 * Issued session token and its validity window
 */
export interface Session {
  token: string;
  userId: string;
  issuedAt: Date;
  expiresAt: Date;
  lastActivityAt: Date;          // For sliding expiration
  revoked: boolean;
  revokedAt: Date | null;
  revokedReason?: string;
  credentialVersion: number;
  deviceName?: string;
}

/**
 * Minimal authenticated identity handed to collaborators
 */
export interface UserContext {
  userId: string;
  username: string;
  email: string;
  fullName: string;
  sessionToken: string;
  expiresAt: Date;
}

export type LoginOutcome = 'success' | 'bad_credentials' | 'unknown_identifier' | 'locked';

/**
 * Append-only audit record of one login attempt
 */
export interface LoginAttempt {
  id: number;
  identifier: string;
  timestamp: Date;
  outcome: LoginOutcome;
  userId?: string;
  sourceAddress?: string;
}

export interface LoginOptions {
  sourceAddress?: string;
  deviceName?: string;
}

export interface ProfileChanges {
  fullName?: string;
  email?: string;
  settings?: Record<string, unknown>;
}

/**
 * User without credential material
 */
export interface PublicUser {
  id: string;
  username: string;
  email: string;
  fullName: string;
  settings: Record<string, unknown>;
  createdAt: Date;
  lastLoginAt: Date | null;
}

export interface SessionSummary {
  tokenHint: string;             // Last characters of the token, never the token itself
  deviceName: string;
  issuedAt: Date;
  lastActivityAt: Date;
  expiresAt: Date;
  isCurrent: boolean;
}

/**
 * Time source, injectable so expiry can be tested
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.profile.fullName,
    settings: { ...user.profile.settings },
    createdAt: user.createdAt,
    lastLoginAt: user.lastLoginAt,
  };
}
