import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';
import type { ArbitrageScanner } from './scanner.js';
import type { TierDefinition, TierResult } from './types.js';

const log = pino({ name: 'tier-runner' });

export interface TierRunSummary {
  results: TierResult[];
  completed: number;
  aborted: number;
  /** The caller's signal fired during the run. */
  cancelled: boolean;
  durationMs: number;
}

/**
 * Runs tiers one after another. A tier that aborts or throws is recorded and the next
 * tier starts; cancellation stops the loop.
 */
export class TierRunner {
  private lastResults = new Map<string, TierResult>();

  constructor(private readonly scanner: Pick<ArbitrageScanner, 'scanTier'>) {}

  async runAll(tiers: readonly TierDefinition[], signal?: AbortSignal): Promise<TierRunSummary> {
    const startedAt = Date.now();
    const results: TierResult[] = [];

    for (const tier of tiers) {
      if (signal?.aborted) break;

      let result: TierResult;
      try {
        result = await this.scanner.scanTier(tier, signal);
      } catch (error) {
        log.error({ tierKey: tier.key, err: error }, 'Tier scan threw unexpectedly');
        const now = new Date();
        result = {
          tierKey: tier.key,
          scanId: '',
          correlationId: '',
          status: 'aborted',
          abortReason: `error: ${getErrorMessage(error)}`,
          opportunities: [],
          listingsScanned: 0,
          segmentsFailed: 0,
          resumedFrom: null,
          startedAt: now,
          finishedAt: now,
          durationMs: 0,
        };
      }

      results.push(result);
      this.lastResults.set(tier.key, result);
    }

    const summary: TierRunSummary = {
      results,
      completed: results.filter((r) => r.status === 'completed').length,
      aborted: results.filter((r) => r.status === 'aborted').length,
      cancelled: signal?.aborted === true,
      durationMs: Date.now() - startedAt,
    };

    log.info(
      {
        tiers: tiers.length,
        completed: summary.completed,
        aborted: summary.aborted,
        cancelled: summary.cancelled,
        durationMs: summary.durationMs,
      },
      'Tier run finished',
    );
    return summary;
  }

  /** Most recent result per tier key. */
  getLastResults(): TierResult[] {
    return [...this.lastResults.values()];
  }
}
