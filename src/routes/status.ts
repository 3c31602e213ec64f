import { Router, type Request, type Response } from 'express';
import type { ScannerStatus } from '../services/arbitrage/scanner.js';
import type { TierResult } from '../services/arbitrage/types.js';
import type { CacheStats } from '../services/cache/tiered-cache.js';
import type { JobStatus } from '../services/jobs/scheduler.js';
import type { CircuitSnapshot } from '../services/market/circuit-breaker.js';
import type { RateLimiterStats } from '../services/market/rate-limiter.js';
import type { RequestExecutorStats } from '../services/market/request-executor.js';

/** Read-only views the status endpoint aggregates. */
export interface StatusSources {
  breaker: { snapshot(): CircuitSnapshot };
  limiter: { stats(): RateLimiterStats };
  executor: { stats(): RequestExecutorStats };
  cache: { stats(): CacheStats };
  scheduler: { getJobStatuses(): Record<string, JobStatus> };
  scanner: { getStatus(): ScannerStatus };
  tierRunner: { getLastResults(): TierResult[] };
}

function summarizeTier(result: TierResult) {
  return {
    tierKey: result.tierKey,
    status: result.status,
    abortReason: result.abortReason,
    opportunities: result.opportunities.length,
    best: result.opportunities[0] ?? null,
    listingsScanned: result.listingsScanned,
    segmentsFailed: result.segmentsFailed,
    resumedFrom: result.resumedFrom,
    finishedAt: result.finishedAt.toISOString(),
    durationMs: result.durationMs,
  };
}

/**
 * GET /api/status: breaker, limiter and cache state, job statuses and the last
 * result of every tier.
 */
export function createStatusRouter(sources: StatusSources): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const jobs = sources.scheduler.getJobStatuses();
    res.json({
      scanner: {
        ...sources.scanner.getStatus(),
        job: jobs['arbitrage-scan'] ?? null,
      },
      upstream: {
        circuit: sources.breaker.snapshot(),
        rateLimiter: sources.limiter.stats(),
        requests: sources.executor.stats(),
      },
      cache: sources.cache.stats(),
      jobs,
      tiers: sources.tierRunner.getLastResults().map(summarizeTier),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
