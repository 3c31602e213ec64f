import cron from 'node-cron';
import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';

const log = pino({ name: 'scheduler' });

interface JobEntry {
  task: cron.ScheduledTask;
  fn: () => Promise<void>;
  schedule: string;
  isRunning: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

export interface JobStatus {
  schedule: string;
  isRunning: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

/**
 * Cron-driven background jobs with overlap protection: a tick that fires while the
 * previous run is still going is skipped.
 */
export class JobScheduler {
  private readonly jobs = new Map<string, JobEntry>();

  /**
   * Register a background job.
   *
   * @param name - Unique job name (for logging and diagnostics)
   * @param schedule - Cron expression (e.g. '0 4 * * *' for daily at 04:00)
   */
  registerJob(name: string, schedule: string, fn: () => Promise<void>): void {
    if (this.jobs.has(name)) {
      log.warn({ job: name }, 'Job already registered, skipping');
      return;
    }
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for job ${name}: ${schedule}`);
    }

    const task = cron.schedule(schedule, () => {
      void this.runNow(name);
    });

    this.jobs.set(name, {
      task,
      fn,
      schedule,
      isRunning: false,
      lastRun: null,
      lastError: null,
      runCount: 0,
    });

    log.info({ job: name, schedule }, 'Job registered');
  }

  /**
   * Run a job immediately, outside its schedule. Returns false when the job is unknown
   * or already running.
   */
  async runNow(name: string): Promise<boolean> {
    const job = this.jobs.get(name);
    if (!job) return false;

    if (job.isRunning) {
      log.warn({ job: name }, 'Job still running, skipping this cycle');
      return false;
    }

    job.isRunning = true;
    const startTime = Date.now();

    try {
      await job.fn();
      const durationMs = Date.now() - startTime;
      job.lastRun = new Date();
      job.lastError = null;
      job.runCount++;
      log.info({ job: name, durationMs, runCount: job.runCount }, 'Job completed');
    } catch (err) {
      const durationMs = Date.now() - startTime;
      job.lastError = getErrorMessage(err);
      log.error({ job: name, err, durationMs }, 'Job failed');
    } finally {
      job.isRunning = false;
    }
    return true;
  }

  /** Status of all registered jobs, for the status endpoint. */
  getJobStatuses(): Record<string, JobStatus> {
    const statuses: Record<string, JobStatus> = {};
    for (const [name, entry] of this.jobs) {
      statuses[name] = {
        schedule: entry.schedule,
        isRunning: entry.isRunning,
        lastRun: entry.lastRun,
        lastError: entry.lastError,
        runCount: entry.runCount,
      };
    }
    return statuses;
  }

  /** Stop all registered jobs (for graceful shutdown). */
  stopAllJobs(): void {
    for (const [name, entry] of this.jobs) {
      entry.task.stop();
      log.info({ job: name }, 'Job stopped');
    }
  }
}
