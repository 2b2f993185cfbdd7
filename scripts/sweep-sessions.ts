// Maintenance Script: Remove expired sessions from an auth database file
// Usage: tsx scripts/sweep-sessions.ts [path]   (defaults to AUTH_DB_PATH)

import 'dotenv/config';
import { DatabaseService } from '../src/infrastructure/database/DatabaseService.js';
import { buildAuthConfig } from '../src/utils/config.js';

async function sweepSessions(): Promise<void> {
  const config = buildAuthConfig(process.env);
  const path = process.argv[2] ?? config.dbPath;

  console.log(`Sweeping expired sessions in ${path}...`);

  const db = await DatabaseService.open({ path, timeoutMs: config.storageTimeoutMs });
  try {
    const removed = await db.sessions.sweepExpired();
    const stats = await db.getStats();

    console.log(`✓ Removed ${removed} expired session(s)`);
    console.log(`  Users: ${stats.users.total} (${stats.users.active} active)`);
  } finally {
    await db.close();
  }
}

sweepSessions().catch((error) => {
  console.error('✗ Sweep failed:', error);
  process.exit(1);
});
