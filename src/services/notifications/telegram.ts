import pino from 'pino';

const log = pino({ name: 'telegram' });

export interface TelegramOptions {
  botToken?: string;
  chatId?: string;
}

export type TelegramFetch = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Minimal Telegram Bot API client. Delivery is best effort: failures are logged and
 * reported as `false`, never thrown.
 */
export class TelegramClient {
  private readonly fetchFn: TelegramFetch;

  constructor(
    private readonly options: TelegramOptions,
    fetchFn?: TelegramFetch,
  ) {
    this.fetchFn = fetchFn ?? ((url, init) => fetch(url, init));
  }

  isConfigured(): boolean {
    return !!(this.options.botToken && this.options.chatId);
  }

  /**
   * Send a message via Telegram Bot API.
   * Silently skips if Telegram is not configured.
   */
  async sendMessage(text: string, parseMode: 'HTML' | 'Markdown' = 'HTML'): Promise<boolean> {
    if (!this.isConfigured()) return false;

    try {
      const res = await this.fetchFn(`https://api.telegram.org/bot${this.options.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.options.chatId,
          text,
          parse_mode: parseMode,
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(10_000),
      });

      if (!res.ok) {
        const body = await res.text();
        log.warn({ status: res.status, body }, 'Telegram send failed');
        return false;
      }

      return true;
    } catch (err) {
      log.error({ err }, 'Telegram send error');
      return false;
    }
  }

  /** Send a system alert (warning or critical). */
  async sendAlert(severity: 'critical' | 'warning', title: string, details: string): Promise<void> {
    const emoji = severity === 'critical' ? '🚨' : '⚠️';
    await this.sendMessage(`${emoji} <b>${escapeHtml(title)}</b>\n${escapeHtml(details)}`);
  }
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
