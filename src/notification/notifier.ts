import type { AppConfig } from '../config.js';
import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { OrderSide } from '../types/index.js';
import { TelegramNotifier } from './telegram.js';

export interface ShutdownSummary {
  exitCode: number;
  totalTrades: number;
  uptimeSec: number;
}

/**
 * Event-level messages over TelegramNotifier.
 * Every call is a no-op when Telegram is disabled or misconfigured.
 */
export class Notifier {
  private readonly tg: TelegramNotifier | null;
  private readonly log: Logger;

  constructor(settings: AppConfig['telegram'], logger: Logger, intervalMs?: number) {
    this.log = createChildLogger(logger, 'notifier');
    if (settings.enabled && settings.botToken && settings.chatId) {
      this.tg = new TelegramNotifier(settings.botToken, settings.chatId, logger, intervalMs);
      this.log.info('Telegram notifier enabled');
    } else {
      this.tg = null;
      this.log.debug('Telegram notifier disabled');
    }
  }

  get enabled(): boolean {
    return this.tg !== null;
  }

  notifyStartup(market: string, dryRun: boolean, gridCount: number): void {
    this.send(
      `🤖 <b>Grid bot started</b>\n` +
      `Market: ${market}\n` +
      `Mode: ${dryRun ? 'DRY RUN' : 'LIVE'}\n` +
      `Levels: ${gridCount}`,
    );
  }

  notifyFill(side: OrderSide, price: number, quantity: number, market: string): void {
    const emoji = side === 'sell' ? '💰' : '📥';
    this.send(
      `${emoji} <b>${side.toUpperCase()} filled</b>\n` +
      `Market: ${market}\n` +
      `Price: ${price}\n` +
      `Quantity: ${quantity}`,
    );
  }

  notifyEmergencyStop(reason: string): void {
    this.send(`🚨 <b>Emergency stop</b>\nReason: ${reason}`);
  }

  notifyError(module: string, message: string): void {
    this.send(`⚠️ <b>Error</b> [${module}]\n${message}`);
  }

  notifyShutdown(summary: ShutdownSummary): void {
    this.send(
      `🛑 <b>Grid bot stopped</b>\n` +
      `Exit code: ${summary.exitCode}\n` +
      `Trades: ${summary.totalTrades}\n` +
      `Uptime: ${summary.uptimeSec}s`,
    );
  }

  /** wait for queued messages, used before process exit */
  async flush(): Promise<void> {
    if (this.tg) await this.tg.drain();
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      this.log.warn({ err }, 'Notifier send error');
    }
  }
}
