import type { Server } from 'node:http';
import pino from 'pino';
import { createApp } from './app.js';
import { loadEnv } from './config/index.js';
import { loadScannerConfig } from './config/scanner-config.js';
import { createContainer } from './container.js';
import { runMigrations } from './db/migrate.js';
import { registerAllJobs, SCAN_JOB } from './services/jobs/register-all.js';
import { getErrorMessage, toErrorObject } from './utils/errors.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${getErrorMessage(reason)}`);
  process.exit(1);
});

const SHUTDOWN_GRACE_MS = 30_000;

async function boot(): Promise<void> {
  // Step 1: Validate configuration
  const env = loadEnv();
  const scannerConfig = loadScannerConfig(env.SCANNER_CONFIG);
  logger.info({ configPath: env.SCANNER_CONFIG, nodeEnv: env.NODE_ENV }, 'Configuration validated');

  // Step 2: Database (optional) and migrations
  if (env.DATABASE_URL) {
    await runMigrations(env.DATABASE_URL);
  }

  // Step 3: Wire services
  const container = createContainer(env, scannerConfig);
  if (container.pool) {
    await container.pool.query('SELECT 1');
    logger.info('Database connected');
  }

  // Step 4: Background jobs
  const shutdown = new AbortController();
  registerAllJobs({
    scheduler: container.scheduler,
    tierRunner: container.tierRunner,
    tiers: container.tiers,
    store: container.store,
    telegram: container.telegram,
    scanSchedule: scannerConfig.scan.schedule,
    purgeSchedule: scannerConfig.checkpoint.purgeSchedule,
    retentionDays: scannerConfig.checkpoint.retentionDays,
    shutdownSignal: shutdown.signal,
  });

  // Step 5: Start Express
  const app = createApp({
    db: container.pool,
    breaker: container.breaker,
    limiter: container.limiter,
    executor: container.executor,
    cache: container.cache,
    scheduler: container.scheduler,
    scanner: container.scanner,
    tierRunner: container.tierRunner,
  });
  const server: Server = app.listen(env.PORT, () => {
    logger.info(`Server ready on port ${env.PORT}`);
  });

  // First scan right away, then on schedule
  const firstScan = container.scheduler.runNow(SCAN_JOB);

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down: cancelling scan and writing checkpoint');

    const forceExit = setTimeout(() => {
      logger.error('Shutdown grace period exceeded, exiting');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    forceExit.unref();

    shutdown.abort();
    container.scheduler.stopAllJobs();
    server.close();

    try {
      await firstScan;
      while (Object.values(container.scheduler.getJobStatuses()).some((job) => job.isRunning)) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      await container.close();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ err: toErrorObject(err) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void stop('SIGINT');
  });
  process.on('SIGTERM', () => {
    void stop('SIGTERM');
  });
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
