import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { getErrorMessage, ok, type ApiError, type Result } from '../../utils/errors.js';
import type { BatchProcessor } from '../batch/batch-processor.js';
import { sameParams, type CheckpointStore, type ScanCheckpoint, type ScanParams } from '../checkpoint/types.js';
import { createScanContext, type ScanContext } from '../logger/correlation.js';
import type { MarketClient } from '../market/client.js';
import type { Listing } from '../market/types.js';
import {
  dedupeListings,
  depthFromAggregated,
  findOpportunities,
  type FinderOptions,
} from './opportunity-finder.js';
import type {
  BatchSettings,
  Opportunity,
  OpportunityNotifier,
  ScanPhase,
  ScanSettings,
  TierDefinition,
  TierResult,
} from './types.js';

const log = pino({ name: 'arbitrage-scanner' });

/** Errors after which the rest of the tier is not worth attempting. */
const TIER_FATAL_KINDS = new Set<ApiError['kind']>(['ClientError', 'CircuitOpen']);

export type ListingSource = Pick<MarketClient, 'getListingPage' | 'getAggregatedPrices'>;

export interface PriceSegment {
  /** Inclusive, cents. */
  from: number;
  /** Exclusive, cents. */
  to: number;
}

export interface ArbitrageScannerDeps {
  client: ListingSource;
  store: CheckpointStore;
  batch: BatchProcessor;
  notifier?: OpportunityNotifier | null;
  newScanId?: () => string;
}

export interface ScannerStatus {
  phase: ScanPhase | 'idle';
  tierKey: string | null;
  correlationId: string | null;
  segmentsDone: number;
  segmentsTotal: number;
}

/**
 * Split [from, to) into at most `count` contiguous, non-empty segments of equal width
 * (the last may be narrower).
 */
export function splitPriceRange(from: number, to: number, count: number): PriceSegment[] {
  if (to <= from || count < 1) return [];
  const width = Math.ceil((to - from) / count);
  const segments: PriceSegment[] = [];
  for (let lo = from; lo < to; lo += width) {
    segments.push({ from: lo, to: Math.min(to, lo + width) });
  }
  return segments;
}

function parseCursor(cursor: string, max: number): number | null {
  if (!/^\d+$/.test(cursor)) return null;
  const value = Number.parseInt(cursor, 10);
  return value <= max ? value : null;
}

/**
 * Scans one tier at a time: paginates its price segments through the batch processor,
 * checkpointing as segments complete, then computes and ranks opportunities.
 * A checkpoint left by an interrupted run with the same parameters is resumed.
 */
export class ArbitrageScanner {
  private readonly client: ListingSource;
  private readonly store: CheckpointStore;
  private readonly batch: BatchProcessor;
  private readonly notifier: OpportunityNotifier | null;
  private readonly newScanId: () => string;
  private status: ScannerStatus = {
    phase: 'idle',
    tierKey: null,
    correlationId: null,
    segmentsDone: 0,
    segmentsTotal: 0,
  };

  constructor(
    private readonly settings: ScanSettings,
    private readonly batchSettings: BatchSettings,
    deps: ArbitrageScannerDeps,
  ) {
    this.client = deps.client;
    this.store = deps.store;
    this.batch = deps.batch;
    this.notifier = deps.notifier ?? null;
    this.newScanId = deps.newScanId ?? randomUUID;
  }

  getStatus(): ScannerStatus {
    return { ...this.status };
  }

  async scanTier(tier: TierDefinition, signal?: AbortSignal): Promise<TierResult> {
    const ctx = createScanContext(tier.key);
    const startedAt = new Date();
    const segments = splitPriceRange(tier.priceFrom, tier.priceTo, this.settings.segmentsPerTier);
    const params: ScanParams = {
      gameId: tier.gameId,
      level: tier.level,
      priceFrom: tier.priceFrom,
      priceTo: tier.priceTo,
      commissionRate: this.settings.commissionRate,
      segments: this.settings.segmentsPerTier,
    };

    // --- Starting ---
    this.setPhase('starting', ctx, 0, segments.length);
    const resume = await this.findResumable(tier.key, params, segments.length, ctx);
    const scanId = resume?.scanId ?? this.newScanId();
    const startIndex = resume ? resume.cursor : 0;
    const carried = resume ? resume.listings : [];

    if (resume) {
      log.info({ ...ctx, scanId, resumeFrom: startIndex, carried: carried.length }, 'Resuming tier scan');
    }

    const save = (cursor: number, listings: Listing[]) =>
      this.store.save({
        scanId,
        tierKey: tier.key,
        cursor: String(cursor),
        processedItems: listings.length,
        params,
        state: { listings },
        updatedAt: new Date(),
      });

    try {
      await save(startIndex, carried);
    } catch (error) {
      log.warn({ ...ctx, scanId, err: getErrorMessage(error) }, 'Initial checkpoint save failed, continuing');
    }

    // --- Paginating ---
    this.setPhase('paginating', ctx, startIndex, segments.length);
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    else signal?.addEventListener('abort', onOuterAbort, { once: true });

    const abort: { error: ApiError | null } = { error: null };

    const batchResult = await this.batch.run(
      segments,
      async (segment, index, itemSignal): Promise<Result<Listing[], ApiError>> => {
        const fetched = await this.fetchSegment(tier, segment, itemSignal);
        if (!fetched.success) {
          if (TIER_FATAL_KINDS.has(fetched.error.kind) && !abort.error) {
            abort.error = fetched.error;
            log.error(
              { ...ctx, segment: index, kind: fetched.error.kind, status: fetched.error.status },
              'Tier-fatal marketplace error, aborting tier',
            );
            controller.abort();
          } else if (fetched.error.kind !== 'Cancelled') {
            log.warn({ ...ctx, segment: index, kind: fetched.error.kind }, 'Segment failed');
          }
        }
        return fetched;
      },
      {
        chunkSize: this.batchSettings.chunkSize,
        maxConcurrency: this.batchSettings.maxConcurrency,
        startIndex,
        signal: controller.signal,
        onProgress: (progress) => {
          this.status.segmentsDone = progress.cursor;
        },
        checkpoint: {
          everyItems: this.batchSettings.checkpointEveryItems,
          intervalMs: this.batchSettings.checkpointIntervalMs,
          write: (cp) => save(cp.cursor, [...carried, ...cp.successes.flatMap((s) => s.value)]),
        },
      },
    );

    signal?.removeEventListener('abort', onOuterAbort);

    const scanned = [...carried, ...batchResult.successes.flatMap((s) => s.value)];
    const base = {
      tierKey: tier.key,
      scanId,
      correlationId: ctx.correlationId,
      listingsScanned: dedupeListings(scanned).length,
      segmentsFailed: batchResult.failures.length,
      resumedFrom: resume ? startIndex : null,
      startedAt,
    };

    if (batchResult.cancelled) {
      const abortReason = abort.error ? `${abort.error.kind}: ${abort.error.message}` : 'cancelled';
      this.setPhase('aborted', ctx, batchResult.cursor, segments.length);
      log.warn(
        { ...ctx, scanId, cursor: batchResult.cursor, abortReason },
        'Tier scan aborted, checkpoint retained',
      );
      return this.finish({ ...base, status: 'aborted', abortReason, opportunities: [] });
    }

    // --- Computing ---
    this.setPhase('computing', ctx, batchResult.cursor, segments.length);
    const opportunities = await this.computeOpportunities(tier, scanned, ctx, signal);

    // --- Completed ---
    try {
      await this.store.delete(scanId);
    } catch (error) {
      log.warn({ ...ctx, scanId, err: getErrorMessage(error) }, 'Failed to delete completed checkpoint');
    }

    this.setPhase('completed', ctx, batchResult.cursor, segments.length);
    const result = this.finish({ ...base, status: 'completed', abortReason: null, opportunities });

    log.info(
      {
        ...ctx,
        scanId,
        listings: result.listingsScanned,
        opportunities: opportunities.length,
        segmentsFailed: result.segmentsFailed,
        durationMs: result.durationMs,
      },
      'Tier scan complete',
    );

    if (this.notifier && opportunities.length > 0) {
      this.notifier
        .notify(
          {
            tierKey: tier.key,
            gameName: tier.gameName,
            level: tier.level,
            listingsScanned: result.listingsScanned,
            opportunityCount: opportunities.length,
            durationMs: result.durationMs,
          },
          opportunities,
        )
        .catch((error: unknown) => {
          log.warn({ ...ctx, err: getErrorMessage(error) }, 'Opportunity notification failed');
        });
    }

    return result;
  }

  private finish(result: Omit<TierResult, 'finishedAt' | 'durationMs'>): TierResult {
    const finishedAt = new Date();
    return { ...result, finishedAt, durationMs: finishedAt.getTime() - result.startedAt.getTime() };
  }

  private setPhase(phase: ScanPhase, ctx: ScanContext, segmentsDone: number, segmentsTotal: number): void {
    this.status = {
      phase,
      tierKey: ctx.tierKey,
      correlationId: ctx.correlationId,
      segmentsDone,
      segmentsTotal,
    };
    log.debug({ ...ctx, phase }, 'Scan phase');
  }

  private async findResumable(
    tierKey: string,
    params: ScanParams,
    segmentCount: number,
    ctx: ScanContext,
  ): Promise<{ scanId: string; cursor: number; listings: Listing[] } | null> {
    let existing: ScanCheckpoint | null;
    try {
      existing = await this.store.findLatest(tierKey);
    } catch (error) {
      log.warn({ ...ctx, err: getErrorMessage(error) }, 'Checkpoint lookup failed, starting fresh');
      return null;
    }
    if (!existing) return null;

    const cursor = parseCursor(existing.cursor, segmentCount);
    if (cursor !== null && sameParams(existing.params, params)) {
      return { scanId: existing.scanId, cursor, listings: existing.state.listings };
    }

    log.info({ ...ctx, scanId: existing.scanId }, 'Discarding checkpoint from a run with different parameters');
    try {
      await this.store.delete(existing.scanId);
    } catch (error) {
      log.warn({ ...ctx, err: getErrorMessage(error) }, 'Failed to delete stale checkpoint');
    }
    return null;
  }

  /**
   * Follow a segment's page cursor until the upstream runs out of pages or the page cap
   * is hit. Listings outside the segment's bounds are dropped.
   */
  private async fetchSegment(
    tier: TierDefinition,
    segment: PriceSegment,
    signal: AbortSignal,
  ): Promise<Result<Listing[], ApiError>> {
    const listings: Listing[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < this.settings.maxPagesPerSegment; page++) {
      const result = await this.client.getListingPage(
        { gameId: tier.gameId, priceFrom: segment.from, priceTo: segment.to - 1, limit: this.settings.pageSize },
        cursor,
        signal,
      );
      if (!result.success) return result;

      for (const listing of result.data.listings) {
        if (listing.price >= segment.from && listing.price < segment.to) listings.push(listing);
      }
      if (!result.data.cursor || result.data.listings.length === 0) break;
      cursor = result.data.cursor;
    }

    return ok(listings);
  }

  private async computeOpportunities(
    tier: TierDefinition,
    scanned: Listing[],
    ctx: ScanContext,
    signal?: AbortSignal,
  ): Promise<Opportunity[]> {
    const options: FinderOptions = {
      commissionRate: this.settings.commissionRate,
      minProfit: this.settings.minProfit,
      minProfitPercent: tier.minProfitPercent,
      maxProfitPercent: this.settings.maxProfitPercent,
      intramarketUndercut: this.settings.intramarketUndercut,
      excludeKeywords: this.settings.excludeKeywords,
    };

    const candidates = findOpportunities(scanned, options);
    if (!this.settings.useAggregatedPrices || candidates.length === 0) {
      return candidates;
    }

    const titles = candidates.map((o) => o.title);
    const aggregated = await this.client.getAggregatedPrices(tier.gameId, titles, signal);
    if (!aggregated.success) {
      log.warn(
        { ...ctx, kind: aggregated.error.kind },
        'Aggregated prices unavailable, scoring liquidity from sales only',
      );
      return candidates;
    }

    return findOpportunities(scanned, options, depthFromAggregated(aggregated.data));
  }
}
