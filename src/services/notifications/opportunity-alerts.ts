import pino from 'pino';
import type { Opportunity, OpportunityNotifier, ScanSummary } from '../arbitrage/types.js';
import { escapeHtml, type TelegramClient } from './telegram.js';

const log = pino({ name: 'opportunity-alerts' });

/** Cents to a dollar string, e.g. 1505 → "$15.05". */
export function formatUsd(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  return `${sign}$${(Math.abs(cents) / 100).toFixed(2)}`;
}

function formatLine(rank: number, opp: Opportunity): string {
  const kindLabel = opp.kind === 'intramarket' ? 'same-title' : 'vs suggested';
  const liquidity = opp.liquidityScore === null ? '' : ` · liq ${opp.liquidityScore.toFixed(2)}`;
  return [
    `${rank}. <b>${escapeHtml(opp.title)}</b>`,
    `   ${formatUsd(opp.buyPrice)} → ${formatUsd(opp.sellPrice)} (${kindLabel})`,
    `   Profit: <b>+${formatUsd(opp.profit)} (+${opp.profitPercent.toFixed(1)}%)</b>${liquidity}`,
  ].join('\n');
}

export function formatOpportunityMessage(
  summary: ScanSummary,
  opportunities: readonly Opportunity[],
  topN: number,
): string {
  const shown = opportunities.slice(0, topN);
  const header = [
    `💹 <b>${escapeHtml(summary.gameName)} · ${summary.level}</b>`,
    `${summary.opportunityCount} opportunities from ${summary.listingsScanned} listings in ${(summary.durationMs / 1000).toFixed(1)}s`,
  ];
  return [...header, '', ...shown.map((opp, i) => formatLine(i + 1, opp))].join('\n');
}

/** Posts the top opportunities of each completed tier to a Telegram chat. */
export class TelegramOpportunityNotifier implements OpportunityNotifier {
  constructor(
    private readonly telegram: TelegramClient,
    private readonly topN: number,
  ) {}

  async notify(summary: ScanSummary, opportunities: readonly Opportunity[]): Promise<void> {
    if (!this.telegram.isConfigured() || opportunities.length === 0) return;

    const sent = await this.telegram.sendMessage(formatOpportunityMessage(summary, opportunities, this.topN));
    if (sent) {
      log.info({ tierKey: summary.tierKey, opportunities: opportunities.length }, 'Opportunity alert sent');
    }
  }
}
