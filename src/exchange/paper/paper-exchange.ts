import { randomUUID } from 'node:crypto';
import { createChildLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import { CANCEL_ALL } from '../exchange-client.js';
import type { ExchangeClient } from '../exchange-client.js';
import type { FillSink } from '../../engine/fill-oracle.js';
import { err, ok } from '../../types/index.js';
import type {
  Balances,
  ExchangeOrder,
  OrderSide,
  PlacedOrder,
  Result,
  Ticker,
} from '../../types/index.js';

export interface PaperExchangeOptions {
  /** reported by getBalances */
  balances: Balances;
  logger: Logger;
  idFactory?: () => string;
}

/**
 * Dry-run exchange. Private calls are served from an in-memory book and never
 * leave the process; the ticker is read through `market` so prices are real.
 */
export class PaperExchange implements ExchangeClient, FillSink {
  private readonly book = new Map<string, ExchangeOrder>();
  private readonly log: Logger;
  private readonly nextId: () => string;

  constructor(
    private readonly market: Pick<ExchangeClient, 'getTicker'>,
    private readonly options: PaperExchangeOptions,
  ) {
    this.log = createChildLogger(options.logger, 'paper-exchange');
    this.nextId = options.idFactory ?? (() => `dry-run-${randomUUID()}`);
  }

  getTicker(market: string): Promise<Result<Ticker>> {
    return this.market.getTicker(market);
  }

  async getBalances(): Promise<Result<Balances>> {
    return ok(this.options.balances);
  }

  async getOpenOrders(market: string): Promise<Result<ExchangeOrder[]>> {
    return ok([...this.book.values()].filter((o) => o.market === market));
  }

  async placeOrder(market: string, side: OrderSide, price: number, quantity: number): Promise<Result<PlacedOrder>> {
    if (!(price > 0) || !(quantity > 0)) return err('Price and quantity must be positive');
    const id = this.nextId();
    this.book.set(id, { id, side, price, quantity, market });
    this.log.info({ market, side, price, quantity, orderId: id }, '[DRY RUN] Order placed');
    return ok({ id });
  }

  async cancelOrder(id: string): Promise<Result<void>> {
    if (id === CANCEL_ALL) {
      this.log.info({ count: this.book.size }, '[DRY RUN] All orders cancelled');
      this.book.clear();
      return ok(undefined);
    }
    if (!this.book.delete(id)) return err(`Order not found: ${id}`);
    this.log.info({ orderId: id }, '[DRY RUN] Order cancelled');
    return ok(undefined);
  }

  markFilled(id: string): void {
    this.book.delete(id);
  }

  get openCount(): number {
    return this.book.size;
  }
}
