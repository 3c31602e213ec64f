import pino from 'pino';
import type { TierRunner } from '../arbitrage/tier-runner.js';
import type { TierDefinition } from '../arbitrage/types.js';
import type { CheckpointStore } from '../checkpoint/types.js';
import type { TelegramClient } from '../notifications/telegram.js';
import type { JobScheduler } from './scheduler.js';

const log = pino({ name: 'register-jobs' });

const DAY_MS = 24 * 60 * 60 * 1000;

export const SCAN_JOB = 'arbitrage-scan';
export const PURGE_JOB = 'checkpoint-purge';

export interface JobDeps {
  scheduler: JobScheduler;
  tierRunner: Pick<TierRunner, 'runAll'>;
  tiers: readonly TierDefinition[];
  store: Pick<CheckpointStore, 'purgeOlderThan'>;
  telegram: Pick<TelegramClient, 'sendAlert'> | null;
  scanSchedule: string;
  purgeSchedule: string;
  retentionDays: number;
  /** Aborted on shutdown; the running scan stops and checkpoints. */
  shutdownSignal: AbortSignal;
}

export async function runScanJob(deps: JobDeps): Promise<void> {
  const summary = await deps.tierRunner.runAll(deps.tiers, deps.shutdownSignal);

  const circuitAborts = summary.results.filter((r) => r.abortReason?.startsWith('CircuitOpen'));
  if (circuitAborts.length > 0 && deps.telegram) {
    await deps.telegram.sendAlert(
      'warning',
      'Marketplace circuit open',
      `${circuitAborts.length} tier(s) aborted: ${circuitAborts.map((r) => r.tierKey).join(', ')}`,
    );
  }

  if (summary.aborted > 0 && !summary.cancelled) {
    log.warn(
      { aborted: summary.results.filter((r) => r.status === 'aborted').map((r) => r.tierKey) },
      'Some tiers did not complete; their checkpoints are kept for the next run',
    );
  }
}

export async function runPurgeJob(deps: JobDeps): Promise<void> {
  const purged = await deps.store.purgeOlderThan(deps.retentionDays * DAY_MS);
  log.info({ purged, retentionDays: deps.retentionDays }, 'Checkpoint purge complete');
}

/**
 * Register all background jobs. Called once at boot.
 */
export function registerAllJobs(deps: JobDeps): void {
  deps.scheduler.registerJob(SCAN_JOB, deps.scanSchedule, () => runScanJob(deps));
  deps.scheduler.registerJob(PURGE_JOB, deps.purgeSchedule, () => runPurgeJob(deps));

  log.info({ jobs: [SCAN_JOB, PURGE_JOB], tiers: deps.tiers.length }, 'All background jobs registered');
}
