/**
 * Liquidity signals for an opportunity's item.
 *
 * Weights with both signals: sales 0.6, depth 0.4. With only one, it carries the full
 * weight. With neither the score is null (unknown, not illiquid).
 */

/**
 * Score recent sales. Linear, capped at 10: 0→0.0, 5→0.5, 10+→1.0
 */
export function scoreSales(recentSales: number): number {
  return Math.min(Math.max(recentSales, 0) / 10, 1.0);
}

/**
 * Score order book depth (open buy orders + sell offers). Linear, capped at 50.
 */
export function scoreDepth(depth: number): number {
  return Math.min(Math.max(depth, 0) / 50, 1.0);
}

export function liquidityScore(recentSales: number | null, depth: number | null): number | null {
  if (recentSales === null && depth === null) return null;

  let score: number;
  if (recentSales === null) {
    score = scoreDepth(depth ?? 0);
  } else if (depth === null) {
    score = scoreSales(recentSales);
  } else {
    score = 0.6 * scoreSales(recentSales) + 0.4 * scoreDepth(depth);
  }

  return Math.round(score * 1000) / 1000;
}
