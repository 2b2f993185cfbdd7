// LowDB Repository exports
// JSON file-based storage for the identity tables

export { DatabaseConnection, openDatabase, defaultData, IN_MEMORY_PATH } from './connection.js';
export { CredentialStore } from './CredentialStore.js';
export { SessionStore, generateSessionToken } from './SessionStore.js';
export { AttemptLog } from './AttemptLog.js';
export { PasswordResetStore } from './PasswordResetStore.js';
export { SessionCleanupJob, defaultCleanupConfig } from './SessionCleanupJob.js';

export type { DatabaseConfig, DatabaseSchema } from './connection.js';
export type { SessionCleanupConfig } from './SessionCleanupJob.js';
