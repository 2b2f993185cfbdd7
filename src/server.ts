// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { SessionCleanupJob } from '@/infrastructure/database/lowdb/index.js';
import { AuthService } from '@/application/auth/AuthService.js';
import { PasswordHasher } from '@/application/auth/PasswordHasher.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  // Open the identity store
  console.log('Opening auth database...');
  let dbService: DatabaseService;
  try {
    dbService = await DatabaseService.open({
      path: config.auth.dbPath,
      timeoutMs: config.auth.storageTimeoutMs,
    });
    const stats = await dbService.getStats();
    console.log(`  Users: ${stats.users.total} (${stats.users.active} active)`);
  } catch (error) {
    console.error('Failed to open database:', error);
    process.exit(1);
  }

  const authService = new AuthService(
    {
      users: dbService.users,
      sessions: dbService.sessions,
      attempts: dbService.attempts,
      passwordResets: dbService.passwordResets,
      hasher: new PasswordHasher(config.auth.passwordIterations),
    },
    {
      session: config.auth.session,
      lockout: config.auth.lockout,
      passwordResetTtlMs: config.auth.passwordResetTtlMs,
    }
  );

  const cleanupJob = new SessionCleanupJob(dbService.sessions, {
    intervalMs: config.auth.sweepIntervalMs,
    enabled: config.auth.sweepIntervalMs > 0,
    logEnabled: config.server.nodeEnv !== 'production',
  });
  cleanupJob.start();

  // Log startup info
  console.log('========================================');
  console.log('  Auth Server Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Database: ${config.auth.dbPath}`);
  console.log('========================================');

  // Create Express app
  const app = createApp({
    authService,
    corsOrigins: config.server.corsOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    cleanupJob.stop();
    server.close(() => {
      console.log('✓ Server closed');
      dbService
        .close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('✗ Failed to flush database:', error);
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
  });
}

// Run main
main().catch((error) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
