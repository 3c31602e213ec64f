import type { AggregatedPrice, Listing } from '../market/types.js';
import { liquidityScore } from './liquidity.js';
import { calculateProfit, passesThresholds, rankOpportunities, type ProfitThresholds } from './profit.js';
import type { Opportunity, OpportunityKind } from './types.js';

export interface FinderOptions extends ProfitThresholds {
  commissionRate: number;
  /** Cents below the next-cheapest listing an intramarket resale is priced at. */
  intramarketUndercut: number;
  excludeKeywords: string[];
}

/** Order book depth (orders + offers) by exact title. */
export type DepthByTitle = ReadonlyMap<string, number>;

export function depthFromAggregated(prices: readonly AggregatedPrice[]): Map<string, number> {
  const depth = new Map<string, number>();
  for (const price of prices) {
    depth.set(price.title, price.orderCount + price.offerCount);
  }
  return depth;
}

/** First occurrence of each itemId wins. */
export function dedupeListings(listings: readonly Listing[]): Listing[] {
  const seen = new Set<string>();
  const unique: Listing[] = [];
  for (const listing of listings) {
    if (seen.has(listing.itemId)) continue;
    seen.add(listing.itemId);
    unique.push(listing);
  }
  return unique;
}

export function isExcluded(title: string, keywords: readonly string[]): boolean {
  const lower = title.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, ' ');
}

function build(
  kind: OpportunityKind,
  buy: Listing,
  sellPrice: number,
  options: FinderOptions,
  depth: DepthByTitle,
  sellItemId?: string,
): Opportunity | null {
  const breakdown = calculateProfit(buy.price, sellPrice, options.commissionRate);
  if (!passesThresholds(breakdown, options)) return null;

  const opportunity: Opportunity = {
    kind,
    itemId: buy.itemId,
    title: buy.title,
    gameId: buy.gameId,
    buyPrice: buy.price,
    sellPrice,
    profit: breakdown.profit,
    profitPercent: breakdown.profitPercent,
    commissionRate: options.commissionRate,
    liquidityScore: liquidityScore(buy.recentSales, depth.get(buy.title) ?? null),
    ...(sellItemId !== undefined ? { sellItemId } : {}),
  };
  return Object.freeze(opportunity);
}

/** Listings priced below the marketplace's suggested price. */
export function findReferenceOpportunities(
  listings: readonly Listing[],
  options: FinderOptions,
  depth: DepthByTitle = new Map(),
): Opportunity[] {
  const found: Opportunity[] = [];
  for (const listing of listings) {
    if (listing.suggestedPrice === null || listing.suggestedPrice <= listing.price) continue;
    const opportunity = build('reference', listing, listing.suggestedPrice, options, depth);
    if (opportunity) found.push(opportunity);
  }
  return found;
}

/**
 * Same-title price gaps: buy the cheapest listing of a title and resell just under the
 * next cheapest one.
 */
export function findIntramarketOpportunities(
  listings: readonly Listing[],
  options: FinderOptions,
  depth: DepthByTitle = new Map(),
): Opportunity[] {
  const groups = new Map<string, Listing[]>();
  for (const listing of listings) {
    const key = `${listing.gameId}|${normalizeTitle(listing.title)}`;
    const group = groups.get(key);
    if (group) group.push(listing);
    else groups.set(key, [listing]);
  }

  const found: Opportunity[] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    const [cheapest, next] = [...group].sort(
      (a, b) => a.price - b.price || (a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0),
    );
    const sellPrice = next.price - options.intramarketUndercut;
    if (sellPrice <= cheapest.price) continue;
    const opportunity = build('intramarket', cheapest, sellPrice, options, depth, next.itemId);
    if (opportunity) found.push(opportunity);
  }
  return found;
}

/**
 * De-duplicate, drop excluded titles, then collect reference and intramarket
 * opportunities in ranked order.
 */
export function findOpportunities(
  listings: readonly Listing[],
  options: FinderOptions,
  depth: DepthByTitle = new Map(),
): Opportunity[] {
  const eligible = dedupeListings(listings).filter((l) => !isExcluded(l.title, options.excludeKeywords));
  return rankOpportunities([
    ...findReferenceOpportunities(eligible, options, depth),
    ...findIntramarketOpportunities(eligible, options, depth),
  ]);
}
