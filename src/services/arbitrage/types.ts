export type OpportunityKind = 'reference' | 'intramarket';

/**
 * A buy/sell pair that clears the profit thresholds. Prices and profit are cents.
 * Instances are frozen.
 */
export interface Opportunity {
  readonly kind: OpportunityKind;
  readonly itemId: string;
  readonly title: string;
  readonly gameId: string;
  readonly buyPrice: number;
  readonly sellPrice: number;
  readonly profit: number;
  readonly profitPercent: number;
  readonly commissionRate: number;
  readonly liquidityScore: number | null;
  /** Intramarket only: the listing whose price sets the resale price. */
  readonly sellItemId?: string;
}

export type ArbitrageLevelName = 'boost' | 'standard' | 'medium' | 'advanced' | 'pro';

/** One unit of scanning: a game, a level and its price window [priceFrom, priceTo). */
export interface TierDefinition {
  key: string;
  gameName: string;
  gameId: string;
  level: ArbitrageLevelName;
  priceFrom: number;
  priceTo: number;
  minProfitPercent: number;
}

export interface ScanSettings {
  pageSize: number;
  maxPagesPerSegment: number;
  segmentsPerTier: number;
  commissionRate: number;
  minProfit: number;
  maxProfitPercent: number;
  intramarketUndercut: number;
  useAggregatedPrices: boolean;
  excludeKeywords: string[];
}

export interface BatchSettings {
  chunkSize: number;
  maxConcurrency: number;
  checkpointEveryItems: number;
  checkpointIntervalMs: number;
}

export type ScanPhase = 'starting' | 'paginating' | 'computing' | 'completed' | 'aborted';

export type TierStatus = 'completed' | 'aborted';

export interface TierResult {
  tierKey: string;
  scanId: string;
  correlationId: string;
  status: TierStatus;
  /** Why the tier did not complete; null when completed. */
  abortReason: string | null;
  opportunities: Opportunity[];
  listingsScanned: number;
  segmentsFailed: number;
  /** Segment index the run resumed from, or null for a fresh run. */
  resumedFrom: number | null;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface ScanSummary {
  tierKey: string;
  gameName: string;
  level: ArbitrageLevelName;
  listingsScanned: number;
  opportunityCount: number;
  durationMs: number;
}

/** Receives each completed tier's ranked opportunities. Delivery is best effort. */
export interface OpportunityNotifier {
  notify(summary: ScanSummary, opportunities: readonly Opportunity[]): Promise<void>;
}
