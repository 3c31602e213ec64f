import { describe, expect, it, vi } from 'vitest';
import { ArbitrageScanner, splitPriceRange, type ListingSource } from '../../services/arbitrage/scanner.js';
import type {
  BatchSettings,
  Opportunity,
  OpportunityNotifier,
  ScanSettings,
  TierDefinition,
} from '../../services/arbitrage/types.js';
import { BatchProcessor } from '../../services/batch/batch-processor.js';
import { MemoryCheckpointStore } from '../../services/checkpoint/memory-checkpoint-store.js';
import type { AggregatedPrice, Listing, ListingPage, ListingQuery } from '../../services/market/types.js';
import { ApiError, err, ok, type Result } from '../../utils/errors.js';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const tier: TierDefinition = {
  key: 'csgo:medium',
  gameName: 'CS2',
  gameId: 'a8db',
  level: 'medium',
  priceFrom: 1000,
  priceTo: 1400,
  minProfitPercent: 5,
};

const settings: ScanSettings = {
  pageSize: 10,
  maxPagesPerSegment: 3,
  segmentsPerTier: 4,
  commissionRate: 0.07,
  minProfit: 10,
  maxProfitPercent: 300,
  intramarketUndercut: 1,
  useAggregatedPrices: false,
  excludeKeywords: ['sticker'],
};

const batchSettings: BatchSettings = {
  chunkSize: 1,
  maxConcurrency: 1,
  checkpointEveryItems: 1,
  checkpointIntervalMs: 60_000,
};

function listing(itemId: string, title: string, price: number, suggestedPrice: number | null = null): Listing {
  return { itemId, title, gameId: 'a8db', price, suggestedPrice, recentSales: null };
}

const a1 = listing('a1', 'AK-47 | Redline', 1000, 1500);
const a0 = listing('a0', 'Glock-18 | Fade', 1050, 1200);
const b1 = listing('b1', 'AWP | Asiimov', 1100, 1150);
const c1 = listing('c1', 'M4A4 | Howl', 1200);
const c2 = listing('c2', 'M4A4 | Howl', 1390);
const s1 = listing('s1', 'Sticker | Crown', 1300, 5000);

/** Pages keyed by `${priceFrom}:${cursor}`. */
const PAGES: Record<string, ListingPage> = {
  '1000:': { listings: [a1], cursor: 'p2', total: 2 },
  '1000:p2': { listings: [a0], cursor: null, total: 2 },
  '1100:': { listings: [b1], cursor: null, total: 1 },
  '1200:': { listings: [c1], cursor: null, total: 1 },
  '1300:': { listings: [c2, s1], cursor: null, total: 2 },
};

const EXPECTED: Opportunity[] = [
  {
    kind: 'reference',
    itemId: 'a1',
    title: 'AK-47 | Redline',
    gameId: 'a8db',
    buyPrice: 1000,
    sellPrice: 1500,
    profit: 395,
    profitPercent: 39.5,
    commissionRate: 0.07,
    liquidityScore: null,
  },
  {
    kind: 'intramarket',
    itemId: 'c1',
    title: 'M4A4 | Howl',
    gameId: 'a8db',
    buyPrice: 1200,
    sellPrice: 1389,
    profit: 92,
    profitPercent: 7.67,
    commissionRate: 0.07,
    liquidityScore: null,
    sellItemId: 'c2',
  },
  {
    kind: 'reference',
    itemId: 'a0',
    title: 'Glock-18 | Fade',
    gameId: 'a8db',
    buyPrice: 1050,
    sellPrice: 1200,
    profit: 66,
    profitPercent: 6.29,
    commissionRate: 0.07,
    liquidityScore: null,
  },
];

type PageOverride = (query: ListingQuery) => Result<ListingPage, ApiError> | undefined;

class FakeSource implements ListingSource {
  readonly calls: { priceFrom: number; priceTo: number; cursor: string | undefined }[] = [];
  aggregated: Result<AggregatedPrice[], ApiError> = ok([]);
  readonly aggregatedTitles: string[][] = [];

  constructor(private readonly override: PageOverride = () => undefined) {}

  async getListingPage(query: ListingQuery, cursor?: string): Promise<Result<ListingPage, ApiError>> {
    this.calls.push({ priceFrom: query.priceFrom, priceTo: query.priceTo, cursor });
    const overridden = this.override(query);
    if (overridden) return overridden;
    return ok(PAGES[`${query.priceFrom}:${cursor ?? ''}`] ?? { listings: [], cursor: null, total: 0 });
  }

  async getAggregatedPrices(_gameId: string, titles: string[]): Promise<Result<AggregatedPrice[], ApiError>> {
    this.aggregatedTitles.push(titles);
    return this.aggregated;
  }
}

function scannerWith(
  source: FakeSource,
  store = new MemoryCheckpointStore(),
  extra: { settings?: Partial<ScanSettings>; notifier?: OpportunityNotifier } = {},
) {
  let n = 0;
  const scanner = new ArbitrageScanner({ ...settings, ...extra.settings }, batchSettings, {
    client: source,
    store,
    batch: new BatchProcessor('segments'),
    notifier: extra.notifier,
    newScanId: () => `scan-${++n}`,
  });
  return { scanner, store };
}

describe('splitPriceRange', () => {
  it('splits into equal contiguous segments', () => {
    expect(splitPriceRange(1000, 1400, 4)).toEqual([
      { from: 1000, to: 1100 },
      { from: 1100, to: 1200 },
      { from: 1200, to: 1300 },
      { from: 1300, to: 1400 },
    ]);
  });

  it('narrows the last segment when the range does not divide evenly', () => {
    expect(splitPriceRange(0, 10, 3)).toEqual([
      { from: 0, to: 4 },
      { from: 4, to: 8 },
      { from: 8, to: 10 },
    ]);
  });

  it('returns nothing for an empty range', () => {
    expect(splitPriceRange(500, 500, 4)).toEqual([]);
  });
});

describe('ArbitrageScanner', () => {
  it('scans every segment and ranks the opportunities', async () => {
    const source = new FakeSource();
    const { scanner, store } = scannerWith(source);

    const result = await scanner.scanTier(tier);

    expect(result.status).toBe('completed');
    expect(result.abortReason).toBeNull();
    expect(result.opportunities).toEqual(EXPECTED);
    expect(result.listingsScanned).toBe(6);
    expect(result.segmentsFailed).toBe(0);
    expect(result.resumedFrom).toBeNull();
    expect(result.scanId).toBe('scan-1');
    expect(store.size()).toBe(0);
  });

  it('queries each segment with an inclusive upper bound and follows page cursors', async () => {
    const source = new FakeSource();
    const { scanner } = scannerWith(source);

    await scanner.scanTier(tier);

    expect(source.calls).toEqual([
      { priceFrom: 1000, priceTo: 1099, cursor: undefined },
      { priceFrom: 1000, priceTo: 1099, cursor: 'p2' },
      { priceFrom: 1100, priceTo: 1199, cursor: undefined },
      { priceFrom: 1200, priceTo: 1299, cursor: undefined },
      { priceFrom: 1300, priceTo: 1399, cursor: undefined },
    ]);
  });

  it('stops paging a segment at maxPagesPerSegment', async () => {
    const source = new FakeSource((query) =>
      query.priceFrom === 1000 ? ok({ listings: [a1], cursor: 'again', total: null }) : undefined,
    );
    const { scanner } = scannerWith(source);

    await scanner.scanTier(tier);

    expect(source.calls.filter((c) => c.priceFrom === 1000)).toHaveLength(3);
  });

  it('drops listings outside the segment bounds', async () => {
    const source = new FakeSource((query) =>
      query.priceFrom === 1100 ? ok({ listings: [b1, listing('x', 'Stray', 1250, 9000)], cursor: null, total: 2 }) : undefined,
    );
    const { scanner } = scannerWith(source);

    const result = await scanner.scanTier(tier);

    expect(result.listingsScanned).toBe(6);
    expect(result.opportunities.map((o) => o.itemId)).toEqual(['a1', 'c1', 'a0']);
  });

  it('completes with a failed segment counted when the error is not tier-fatal', async () => {
    const source = new FakeSource((query) =>
      query.priceFrom === 1100 ? err(new ApiError('Unavailable', 'Marketplace error (503)', { status: 503 })) : undefined,
    );
    const { scanner } = scannerWith(source);

    const result = await scanner.scanTier(tier);

    expect(result.status).toBe('completed');
    expect(result.segmentsFailed).toBe(1);
    expect(result.listingsScanned).toBe(5);
    expect(result.opportunities).toEqual(EXPECTED);
  });

  it('aborts the tier on a client error and keeps the checkpoint', async () => {
    const source = new FakeSource((query) =>
      query.priceFrom === 1100
        ? err(new ApiError('ClientError', 'Marketplace rejected request (403)', { status: 403 }))
        : undefined,
    );
    const { scanner, store } = scannerWith(source);

    const result = await scanner.scanTier(tier);

    expect(result.status).toBe('aborted');
    expect(result.abortReason).toBe('ClientError: Marketplace rejected request (403)');
    expect(result.opportunities).toEqual([]);
    expect(source.calls.map((c) => c.priceFrom)).toEqual([1000, 1000, 1100]);

    const checkpoint = await store.load('scan-1');
    expect(checkpoint?.cursor).toBe('1');
    expect(checkpoint?.processedItems).toBe(2);
    expect(checkpoint?.state.listings).toEqual([a1, a0]);
  });

  it('aborts the tier when the circuit is open and keeps the checkpoint', async () => {
    const source = new FakeSource((query) =>
      query.priceFrom === 1200
        ? err(new ApiError('CircuitOpen', "Circuit 'marketplace' is open", { retryAfterMs: 60_000 }))
        : undefined,
    );
    const { scanner, store } = scannerWith(source);

    const result = await scanner.scanTier(tier);

    expect(result.status).toBe('aborted');
    expect(result.abortReason).toBe("CircuitOpen: Circuit 'marketplace' is open");
    expect(result.opportunities).toEqual([]);
    expect(result.segmentsFailed).toBe(0);
    expect(source.calls.map((c) => c.priceFrom)).toEqual([1000, 1000, 1100, 1200]);

    const checkpoint = await store.load('scan-1');
    expect(checkpoint?.cursor).toBe('2');
    expect(checkpoint?.processedItems).toBe(3);
    expect(checkpoint?.state.listings).toEqual([a1, a0, b1]);
  });

  it('resumes an interrupted scan and produces the same opportunities', async () => {
    const controller = new AbortController();
    const interrupting = new FakeSource((query) => {
      if (query.priceFrom !== 1200) return undefined;
      controller.abort();
      return err(new ApiError('Cancelled', 'Request cancelled'));
    });
    const store = new MemoryCheckpointStore();

    const first = await scannerWith(interrupting, store).scanner.scanTier(tier, controller.signal);

    expect(first.status).toBe('aborted');
    expect(first.abortReason).toBe('cancelled');
    const saved = await store.load(first.scanId);
    expect(saved?.cursor).toBe('2');
    expect(saved?.processedItems).toBe(3);
    expect(saved?.state.listings.map((l) => l.itemId)).toEqual(['a1', 'a0', 'b1']);

    const resuming = new FakeSource();
    const second = await scannerWith(resuming, store).scanner.scanTier(tier);

    expect(second.status).toBe('completed');
    expect(second.scanId).toBe(first.scanId);
    expect(second.resumedFrom).toBe(2);
    expect(resuming.calls.map((c) => c.priceFrom)).toEqual([1200, 1300]);
    expect(second.listingsScanned).toBe(6);
    expect(second.opportunities).toEqual(EXPECTED);
    expect(store.size()).toBe(0);
  });

  it('starts fresh when the checkpoint came from different parameters', async () => {
    const store = new MemoryCheckpointStore();
    await store.save({
      scanId: 'stale',
      tierKey: tier.key,
      cursor: '3',
      processedItems: 3,
      params: { gameId: 'a8db', level: 'medium', priceFrom: 1000, priceTo: 1400, commissionRate: 0.07, segments: 8 },
      state: { listings: [] },
      updatedAt: new Date(),
    });
    const source = new FakeSource();

    const result = await scannerWith(source, store).scanner.scanTier(tier);

    expect(result.resumedFrom).toBeNull();
    expect(result.scanId).toBe('scan-1');
    expect(source.calls[0].priceFrom).toBe(1000);
    await expect(store.load('stale')).resolves.toBeNull();
  });

  it('scores liquidity from aggregated prices when enabled', async () => {
    const source = new FakeSource();
    source.aggregated = ok([
      { title: 'AK-47 | Redline', orderBestPrice: 1400, orderCount: 20, offerBestPrice: 1000, offerCount: 5 },
    ]);
    const { scanner } = scannerWith(source, undefined, { settings: { useAggregatedPrices: true } });

    const result = await scanner.scanTier(tier);

    expect(source.aggregatedTitles).toEqual([['AK-47 | Redline', 'M4A4 | Howl', 'Glock-18 | Fade']]);
    expect(result.opportunities.map((o) => o.liquidityScore)).toEqual([0.5, null, null]);
  });

  it('keeps the candidates when aggregated prices fail', async () => {
    const source = new FakeSource();
    source.aggregated = err(new ApiError('Unavailable', 'Marketplace error (502)', { status: 502 }));
    const { scanner } = scannerWith(source, undefined, { settings: { useAggregatedPrices: true } });

    const result = await scanner.scanTier(tier);

    expect(result.status).toBe('completed');
    expect(result.opportunities).toEqual(EXPECTED);
  });

  it('notifies with the tier summary and ranked opportunities', async () => {
    const notify = vi.fn<OpportunityNotifier['notify']>().mockResolvedValue(undefined);
    const { scanner } = scannerWith(new FakeSource(), undefined, { notifier: { notify } });

    const result = await scanner.scanTier(tier);

    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith(
      {
        tierKey: 'csgo:medium',
        gameName: 'CS2',
        level: 'medium',
        listingsScanned: 6,
        opportunityCount: 3,
        durationMs: result.durationMs,
      },
      result.opportunities,
    );
  });

  it('reports its phase and progress', async () => {
    const { scanner } = scannerWith(new FakeSource());
    expect(scanner.getStatus().phase).toBe('idle');

    await scanner.scanTier(tier);

    expect(scanner.getStatus()).toMatchObject({
      phase: 'completed',
      tierKey: 'csgo:medium',
      segmentsDone: 4,
      segmentsTotal: 4,
    });
  });
});
