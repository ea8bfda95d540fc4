import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ExchangeClient } from '../exchange/exchange-client.js';
import { latchEmergency, observePrice, recordFailure } from '../state/bot-state.js';
import type { BotStateStore } from '../state/bot-state.js';
import type { BotState, SafetyTrigger, SafetyVerdict, Ticker } from '../types/index.js';

export interface SafetyLimits {
  market: string;
  maxConsecutiveFailures: number;
  maxDailyLoss: number;
  /** fraction, 0.5 = 50% */
  maxPriceDeviation: number;
  /** aggregate open sell quantity, base currency */
  maxPosition: number;
}

export interface SafetyMonitorDeps {
  exchange: Pick<ExchangeClient, 'getTicker'>;
  store: BotStateStore;
  logger: Logger;
}

/** aggregate quantity of open sell orders */
export function openSellQuantity(state: BotState): number {
  return state.openOrders
    .filter((o) => o.side === 'sell')
    .reduce((sum, o) => sum + o.quantity, 0);
}

/**
 * Emergency-stop predicates, evaluated once per cycle in fixed order.
 * The first one that holds latches `emergencyStop` and is reported.
 *
 * The ticker is fetched after the already-stopped check. A failed fetch is
 * counted as a failure and the deviation check is skipped for the cycle. A
 * successful fetch leaves the failure streak alone: only a placed order
 * clears it.
 */
export class SafetyMonitor {
  private readonly log: Logger;

  constructor(
    private readonly limits: SafetyLimits,
    private readonly deps: SafetyMonitorDeps,
  ) {
    this.log = createChildLogger(deps.logger, 'safety-monitor');
  }

  async evaluate(): Promise<SafetyVerdict> {
    const { store } = this.deps;

    if (store.snapshot.emergencyStop) {
      return { tripped: true, trigger: 'ALREADY_STOPPED', detail: `latched: ${store.snapshot.emergencyReason ?? 'unknown'}` };
    }

    const ticker = await this.deps.exchange.getTicker(this.limits.market);
    if (!ticker.ok) {
      store.update(recordFailure);
      this.log.warn({ market: this.limits.market, error: ticker.error }, 'Ticker unavailable, deviation check skipped');
    }

    const s = store.snapshot;
    if (s.consecutiveFailures >= this.limits.maxConsecutiveFailures) {
      return this.trip('CONSECUTIVE_FAILURES', `${s.consecutiveFailures} consecutive failures (limit ${this.limits.maxConsecutiveFailures})`);
    }
    if (s.dailyPnl < -this.limits.maxDailyLoss) {
      return this.trip('DAILY_LOSS', `daily P&L ${s.dailyPnl} below -${this.limits.maxDailyLoss}`);
    }
    if (ticker.ok) {
      const deviation = this.checkDeviation(ticker.value, s.lastObservedPrice);
      if (deviation) return deviation;
    }
    const position = openSellQuantity(store.snapshot);
    if (position > this.limits.maxPosition) {
      return this.trip('MAX_POSITION', `open sell quantity ${position} above ${this.limits.maxPosition}`);
    }
    return { tripped: false };
  }

  private checkDeviation(ticker: Ticker, last: number): SafetyVerdict | null {
    const price = ticker.price;
    if (last > 0) {
      const change = Math.abs(price - last) / last;
      if (change > this.limits.maxPriceDeviation) {
        return this.trip(
          'PRICE_DEVIATION',
          `price moved ${(change * 100).toFixed(2)}% (${last} → ${price}), limit ${(this.limits.maxPriceDeviation * 100).toFixed(2)}%`,
        );
      }
    }
    if (price > 0) this.deps.store.update(observePrice(price));
    return null;
  }

  private trip(trigger: SafetyTrigger, detail: string): SafetyVerdict {
    this.deps.store.update(latchEmergency(trigger));
    this.log.error({ trigger, detail }, 'Emergency stop condition');
    return { tripped: true, trigger, detail };
  }
}
