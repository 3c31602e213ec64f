import { describe, expect, it } from 'vitest';
import {
  calculateFee,
  calculateProfit,
  commissionBps,
  passesThresholds,
  rankOpportunities,
} from '../../services/arbitrage/profit.js';
import type { Opportunity } from '../../services/arbitrage/types.js';

function opportunity(overrides: Partial<Opportunity>): Opportunity {
  return {
    kind: 'reference',
    itemId: 'x',
    title: 'Item',
    gameId: 'a8db',
    buyPrice: 1000,
    sellPrice: 1200,
    profit: 100,
    profitPercent: 10,
    commissionRate: 0.07,
    liquidityScore: null,
    ...overrides,
  };
}

describe('calculateFee', () => {
  it('charges the commission in whole cents', () => {
    expect(commissionBps(0.07)).toBe(700);
    expect(calculateFee(1500, 0.07)).toBe(105);
  });

  it('rounds half a cent up', () => {
    expect(calculateFee(1150, 0.07)).toBe(81);
  });

  it('is zero with no commission', () => {
    expect(calculateFee(1500, 0)).toBe(0);
  });
});

describe('calculateProfit', () => {
  it('subtracts buy price and fee from the sell price', () => {
    expect(calculateProfit(1000, 1500, 0.07)).toEqual({ fee: 105, profit: 395, profitPercent: 39.5 });
  });

  it('rounds the percentage to two decimals', () => {
    expect(calculateProfit(1200, 1389, 0.07)).toEqual({ fee: 97, profit: 92, profitPercent: 7.67 });
  });

  it('reports a loss as negative profit', () => {
    expect(calculateProfit(1100, 1150, 0.07)).toEqual({ fee: 81, profit: -31, profitPercent: -2.82 });
  });
});

describe('passesThresholds', () => {
  const thresholds = { minProfit: 10, minProfitPercent: 5, maxProfitPercent: 300 };

  it('accepts a profit inside every bound', () => {
    expect(passesThresholds({ fee: 105, profit: 395, profitPercent: 39.5 }, thresholds)).toBe(true);
  });

  it('rejects below the absolute minimum', () => {
    expect(passesThresholds({ fee: 7, profit: 9, profitPercent: 9 }, thresholds)).toBe(false);
  });

  it('rejects below the percentage minimum', () => {
    expect(passesThresholds({ fee: 70, profit: 40, profitPercent: 4 }, thresholds)).toBe(false);
  });

  it('rejects implausibly high margins', () => {
    expect(passesThresholds(calculateProfit(100, 1000, 0.07), thresholds)).toBe(false);
  });

  it('never accepts zero profit', () => {
    expect(passesThresholds({ fee: 0, profit: 0, profitPercent: 0 }, { ...thresholds, minProfit: 0, minProfitPercent: 0 })).toBe(
      false,
    );
  });
});

describe('rankOpportunities', () => {
  it('orders by percentage, then profit, then item id', () => {
    const ranked = rankOpportunities([
      opportunity({ itemId: 'low', profitPercent: 5, profit: 500 }),
      opportunity({ itemId: 'b', profitPercent: 20, profit: 200 }),
      opportunity({ itemId: 'a', profitPercent: 20, profit: 200 }),
      opportunity({ itemId: 'big', profitPercent: 20, profit: 400 }),
      opportunity({ itemId: 'top', profitPercent: 35, profit: 50 }),
    ]);

    expect(ranked.map((o) => o.itemId)).toEqual(['top', 'big', 'a', 'b', 'low']);
  });

  it('breaks a full tie by kind', () => {
    const ranked = rankOpportunities([
      opportunity({ kind: 'reference', itemId: 'a' }),
      opportunity({ kind: 'intramarket', itemId: 'a' }),
    ]);

    expect(ranked.map((o) => o.kind)).toEqual(['intramarket', 'reference']);
  });

  it('does not reorder its input', () => {
    const input = [opportunity({ itemId: 'b', profitPercent: 1 }), opportunity({ itemId: 'a', profitPercent: 2 })];
    rankOpportunities(input);
    expect(input.map((o) => o.itemId)).toEqual(['b', 'a']);
  });
});
