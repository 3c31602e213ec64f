import type { Opportunity } from './types.js';

export interface ProfitBreakdown {
  fee: number;
  profit: number;
  profitPercent: number;
}

export interface ProfitThresholds {
  /** Absolute minimum profit, cents. */
  minProfit: number;
  minProfitPercent: number;
  maxProfitPercent: number;
}

/** Commission rate as integer basis points, so 0.07 becomes 700. */
export function commissionBps(rate: number): number {
  return Math.round(rate * 10_000);
}

/**
 * Marketplace fee on a sale, rounded half-up to whole cents.
 * Integer math: 1500 at 7% is 1500 * 700 / 10000 = 105.
 */
export function calculateFee(sellPrice: number, commissionRate: number): number {
  return Math.round((sellPrice * commissionBps(commissionRate)) / 10_000);
}

/**
 * profit = sell - buy - fee(sell); profitPercent is relative to the buy price,
 * rounded to 2 decimal places.
 */
export function calculateProfit(buyPrice: number, sellPrice: number, commissionRate: number): ProfitBreakdown {
  const fee = calculateFee(sellPrice, commissionRate);
  const profit = sellPrice - buyPrice - fee;
  const profitPercent = buyPrice > 0 ? Math.round((profit / buyPrice) * 100 * 100) / 100 : 0;
  return { fee, profit, profitPercent };
}

export function passesThresholds(breakdown: ProfitBreakdown, thresholds: ProfitThresholds): boolean {
  return (
    breakdown.profit > 0 &&
    breakdown.profit >= thresholds.minProfit &&
    breakdown.profitPercent >= thresholds.minProfitPercent &&
    breakdown.profitPercent <= thresholds.maxProfitPercent
  );
}

/** profitPercent desc, then profit desc, then itemId asc. */
export function compareOpportunities(a: Opportunity, b: Opportunity): number {
  if (a.profitPercent !== b.profitPercent) return b.profitPercent - a.profitPercent;
  if (a.profit !== b.profit) return b.profit - a.profit;
  if (a.itemId !== b.itemId) return a.itemId < b.itemId ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return 0;
}

export function rankOpportunities(opportunities: readonly Opportunity[]): Opportunity[] {
  return [...opportunities].sort(compareOpportunities);
}
