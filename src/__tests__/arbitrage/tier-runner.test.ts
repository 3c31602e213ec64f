import { describe, expect, it, vi } from 'vitest';
import type { ArbitrageScanner } from '../../services/arbitrage/scanner.js';
import { TierRunner } from '../../services/arbitrage/tier-runner.js';
import type { TierDefinition, TierResult } from '../../services/arbitrage/types.js';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

function tier(key: string): TierDefinition {
  return { key, gameName: 'CS2', gameId: 'a8db', level: 'medium', priceFrom: 1000, priceTo: 3000, minProfitPercent: 5 };
}

function completed(tierKey: string): TierResult {
  const at = new Date('2026-01-10T00:00:00Z');
  return {
    tierKey,
    scanId: `scan-${tierKey}`,
    correlationId: 'abcd1234',
    status: 'completed',
    abortReason: null,
    opportunities: [],
    listingsScanned: 10,
    segmentsFailed: 0,
    resumedFrom: null,
    startedAt: at,
    finishedAt: at,
    durationMs: 0,
  };
}

type ScanTier = ArbitrageScanner['scanTier'];

describe('TierRunner', () => {
  it('runs tiers in order and records one that throws as aborted', async () => {
    const scanTier = vi.fn<ScanTier>(async (t) => {
      if (t.key === 'b') throw new Error('boom');
      return completed(t.key);
    });
    const runner = new TierRunner({ scanTier });

    const summary = await runner.runAll([tier('a'), tier('b'), tier('c')]);

    expect(scanTier.mock.calls.map(([t]) => t.key)).toEqual(['a', 'b', 'c']);
    expect(summary.completed).toBe(2);
    expect(summary.aborted).toBe(1);
    expect(summary.cancelled).toBe(false);
    expect(summary.results[1]).toMatchObject({
      tierKey: 'b',
      status: 'aborted',
      abortReason: 'error: boom',
      opportunities: [],
    });
    expect(runner.getLastResults().map((r) => r.tierKey)).toEqual(['a', 'b', 'c']);
  });

  it('stops between tiers once cancelled', async () => {
    const controller = new AbortController();
    const scanTier = vi.fn<ScanTier>(async (t) => {
      controller.abort();
      return completed(t.key);
    });

    const summary = await new TierRunner({ scanTier }).runAll([tier('a'), tier('b')], controller.signal);

    expect(scanTier).toHaveBeenCalledTimes(1);
    expect(summary.results).toHaveLength(1);
    expect(summary.cancelled).toBe(true);
  });

  it('runs nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const scanTier = vi.fn<ScanTier>(async (t) => completed(t.key));

    const summary = await new TierRunner({ scanTier }).runAll([tier('a')], controller.signal);

    expect(scanTier).not.toHaveBeenCalled();
    expect(summary).toMatchObject({ results: [], completed: 0, aborted: 0, cancelled: true });
  });

  it('keeps only the latest result per tier', async () => {
    const scanTier = vi.fn<ScanTier>(async (t) => completed(t.key));
    const runner = new TierRunner({ scanTier });

    await runner.runAll([tier('a')]);
    await runner.runAll([tier('a'), tier('b')]);

    expect(runner.getLastResults()).toHaveLength(2);
  });
});
