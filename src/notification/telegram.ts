import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';

/**
 * Telegram Bot API sender
 * - queued, at most one message per `intervalMs`
 * - failures are logged only; a dead notifier never stops the bot
 */
export class TelegramNotifier {
  private readonly queue: string[] = [];
  private readonly log: Logger;
  private processing: Promise<void> | null = null;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    logger: Logger,
    private readonly intervalMs: number = 1000,
  ) {
    this.log = createChildLogger(logger, 'telegram');
  }

  send(text: string): void {
    this.queue.push(text);
    this.start();
  }

  /** resolves once every queued message has been attempted */
  async drain(): Promise<void> {
    while (this.processing) await this.processing;
  }

  private start(): void {
    if (this.processing) return;
    this.processing = this.processQueue()
      .catch((err: unknown) => this.log.warn({ err }, 'Telegram queue stopped'))
      .finally(() => {
        this.processing = null;
        if (this.queue.length > 0) this.start();
      });
  }

  private async processQueue(): Promise<void> {
    let msg = this.queue.shift();
    while (msg !== undefined) {
      try {
        await this.doSend(msg);
      } catch (err) {
        this.log.warn({ err }, 'Telegram send failed');
      }
      msg = this.queue.shift();
      if (msg !== undefined) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      this.log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
