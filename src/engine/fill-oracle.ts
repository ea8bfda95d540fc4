import type { ExchangeClient } from '../exchange/exchange-client.js';
import { ok } from '../types/index.js';
import type { OrderRecord, Result } from '../types/index.js';

/**
 * Decides which tracked orders filled since the last cycle.
 * Implementations make at most one exchange call per invocation.
 */
export interface FillOracle {
  detectFills(market: string, tracked: ReadonlyArray<OrderRecord>): Promise<Result<string[]>>;
}

/**
 * A tracked order missing from the exchange's open-order list has filled.
 * Exchange orders the bot does not track are ignored.
 */
export class ExchangeReconciliation implements FillOracle {
  constructor(private readonly exchange: ExchangeClient) {}

  async detectFills(market: string, tracked: ReadonlyArray<OrderRecord>): Promise<Result<string[]>> {
    const res = await this.exchange.getOpenOrders(market);
    if (!res.ok) return res;
    const stillOpen = new Set(res.value.map((o) => o.id));
    return ok(tracked.filter((o) => !stillOpen.has(o.id)).map((o) => o.id));
  }
}

/** receives the ids the simulation decided to fill */
export interface FillSink {
  markFilled(id: string): void;
}

/** Dry run: each tracked order fills with `probability` per cycle. */
export class SimulatedFill implements FillOracle {
  constructor(
    private readonly probability: number,
    private readonly random: () => number = Math.random,
    private readonly sink?: FillSink,
  ) {}

  async detectFills(_market: string, tracked: ReadonlyArray<OrderRecord>): Promise<Result<string[]>> {
    const filled: string[] = [];
    for (const order of tracked) {
      if (this.random() < this.probability) {
        filled.push(order.id);
        this.sink?.markFilled(order.id);
      }
    }
    return ok(filled);
  }
}
