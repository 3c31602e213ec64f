import { describe, expect, it, vi } from 'vitest';
import type { Opportunity, ScanSummary } from '../../services/arbitrage/types.js';
import {
  formatOpportunityMessage,
  formatUsd,
  TelegramOpportunityNotifier,
} from '../../services/notifications/opportunity-alerts.js';
import { TelegramClient, type TelegramFetch } from '../../services/notifications/telegram.js';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const summary: ScanSummary = {
  tierKey: 'csgo:medium',
  gameName: 'CS2',
  level: 'medium',
  listingsScanned: 120,
  opportunityCount: 3,
  durationMs: 4200,
};

const opportunities: Opportunity[] = [
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
    liquidityScore: 0.5,
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

describe('formatUsd', () => {
  it('formats cents as dollars', () => {
    expect(formatUsd(1505)).toBe('$15.05');
    expect(formatUsd(7)).toBe('$0.07');
    expect(formatUsd(-250)).toBe('-$2.50');
  });
});

describe('formatOpportunityMessage', () => {
  it('lists the top opportunities under a tier header', () => {
    expect(formatOpportunityMessage(summary, opportunities, 2)).toBe(
      [
        '💹 <b>CS2 · medium</b>',
        '3 opportunities from 120 listings in 4.2s',
        '',
        '1. <b>AK-47 | Redline</b>',
        '   $10.00 → $15.00 (vs suggested)',
        '   Profit: <b>+$3.95 (+39.5%)</b> · liq 0.50',
        '2. <b>M4A4 | Howl</b>',
        '   $12.00 → $13.89 (same-title)',
        '   Profit: <b>+$0.92 (+7.7%)</b>',
      ].join('\n'),
    );
  });
});

describe('TelegramOpportunityNotifier', () => {
  it('sends one message per tier', async () => {
    const fetchFn = vi.fn<TelegramFetch>().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const notifier = new TelegramOpportunityNotifier(
      new TelegramClient({ botToken: 'test-token', chatId: 'test-chat' }, fetchFn),
      5,
    );

    await notifier.notify(summary, opportunities);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(fetchFn.mock.calls[0][1].body))).toMatchObject({
      text: formatOpportunityMessage(summary, opportunities, 5),
    });
  });

  it('stays quiet with nothing to report', async () => {
    const fetchFn = vi.fn<TelegramFetch>();
    const notifier = new TelegramOpportunityNotifier(
      new TelegramClient({ botToken: 'test-token', chatId: 'test-chat' }, fetchFn),
      5,
    );

    await notifier.notify({ ...summary, opportunityCount: 0 }, []);

    expect(fetchFn).not.toHaveBeenCalled();
  });
});
