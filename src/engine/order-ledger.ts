import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { CANCEL_ALL } from '../exchange/exchange-client.js';
import type { ExchangeClient } from '../exchange/exchange-client.js';
import type { AuditLog } from '../safety/audit-log.js';
import type { CancellationToken } from '../safety/cancellation.js';
import type { Notifier } from '../notification/notifier.js';
import type { GridLevel } from '../strategy/grid-planner.js';
import {
  recordFailure,
  recordSuccess,
  recordTrades,
  withOpenOrders,
} from '../state/bot-state.js';
import type { BotStateStore } from '../state/bot-state.js';
import { oppositeSide } from '../types/index.js';
import type { OrderRecord, PendingRung, Result } from '../types/index.js';
import type { FillOracle } from './fill-oracle.js';

export interface LedgerSettings {
  market: string;
  /** replacement offset, fixed when the ladder is planned */
  spacing: number;
  /** quantity × price floor, quote currency */
  minNotional: number;
}

export interface LedgerDeps {
  exchange: ExchangeClient;
  oracle: FillOracle;
  store: BotStateStore;
  cancel: CancellationToken;
  logger: Logger;
  audit?: AuditLog;
  notifier?: Notifier;
  now?: () => number;
}

export interface LadderResult {
  placed: number;
  /** refused locally (notional floor, bad price); abandoned */
  skipped: number;
  /** rejected by the exchange; kept as pending rungs */
  failed: number;
}

export interface ReconcileResult extends LadderResult {
  filled: number;
  /** fill detection itself failed; nothing else ran */
  detectionFailed: boolean;
}

type SubmitOutcome = 'placed' | 'skipped' | 'failed';

const MODULE = 'order-ledger';

/**
 * Owns the bot's view of its resting orders.
 *
 * Open orders live in BotState; rungs waiting for an order (failed initial
 * placements, fill replacements) live here and are retried every cycle.
 * After the initial ladder: open + pending ≤ gridCount. Only a placed order
 * clears the failure streak.
 */
export class OrderLedger {
  private pending: PendingRung[] = [];
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly settings: LedgerSettings,
    private readonly deps: LedgerDeps,
  ) {
    this.log = createChildLogger(deps.logger, MODULE);
    this.now = deps.now ?? Date.now;
  }

  get openOrders(): ReadonlyArray<OrderRecord> {
    return this.deps.store.snapshot.openOrders;
  }

  get pendingRungs(): ReadonlyArray<PendingRung> {
    return this.pending;
  }

  get spacing(): number {
    return this.settings.spacing;
  }

  /** One sell per level, in order. Stops early once cancellation is requested. */
  async placeInitialLadder(levels: ReadonlyArray<GridLevel>, quantityPerLevel: number): Promise<LadderResult> {
    const result: LadderResult = { placed: 0, skipped: 0, failed: 0 };

    for (const level of levels) {
      if (this.deps.cancel.isCancelled) {
        this.log.warn({ remaining: levels.length - level.index }, 'Stop requested, initial ladder interrupted');
        break;
      }
      const rung: PendingRung = {
        side: 'sell',
        price: level.price,
        quantity: quantityPerLevel,
        market: this.settings.market,
        origin: 'initial',
      };
      const outcome = await this.submit(rung);
      result[outcome]++;
      if (outcome === 'failed') this.pending.push(rung);
    }

    this.log.info({ ...result, levels: levels.length }, 'Initial ladder placed');
    return result;
  }

  /**
   * One cycle: detect fills, queue their opposite-side replacements, then
   * try every pending rung. Repeating with unchanged exchange state changes
   * nothing.
   */
  async reconcile(): Promise<ReconcileResult> {
    const result: ReconcileResult = { filled: 0, placed: 0, skipped: 0, failed: 0, detectionFailed: false };
    const tracked = this.openOrders;
    if (tracked.length === 0 && this.pending.length === 0) return result;

    if (tracked.length > 0) {
      const fills = await this.deps.oracle.detectFills(this.settings.market, tracked);
      if (!fills.ok) {
        this.deps.store.update(recordFailure);
        this.log.warn({ market: this.settings.market, error: fills.error }, 'Fill detection failed');
        return { ...result, detectionFailed: true };
      }
      result.filled = this.applyFills(new Set(fills.value));
    }

    for (const rung of [...this.pending]) {
      if (this.deps.cancel.isCancelled) break;
      const outcome = await this.submit(rung);
      result[outcome]++;
      if (outcome !== 'failed') this.pending = this.pending.filter((p) => p !== rung);
    }

    if (result.filled > 0 || result.placed > 0) {
      this.log.info({ ...result, open: this.openOrders.length, pending: this.pending.length }, 'Reconciled');
    }
    return result;
  }

  /**
   * Best-effort cleanup. Never throws; the ledger is cleared only when the
   * exchange confirms.
   */
  async cancelAll(): Promise<Result<void>> {
    this.pending = [];
    const open = this.openOrders.length;
    if (open === 0) return { ok: true, value: undefined };

    const res = await this.deps.exchange.cancelOrder(CANCEL_ALL);
    if (res.ok) {
      this.deps.store.update(withOpenOrders([]));
      this.log.info({ market: this.settings.market, cancelled: open }, 'All orders cancelled');
      this.deps.audit?.info(MODULE, 'CANCEL_ALL', `${open} orders`);
    } else {
      this.log.error({ market: this.settings.market, open, error: res.error }, 'Cancel all failed, orders may remain open');
      this.deps.audit?.error(MODULE, 'CANCEL_ALL_FAILED', res.error);
    }
    return res;
  }

  // ── internals ─────────────────────────────────────────────────────

  private applyFills(filledIds: ReadonlySet<string>): number {
    const filled = this.openOrders.filter((o) => filledIds.has(o.id));
    if (filled.length === 0) return 0;

    this.deps.store.update(withOpenOrders(this.openOrders.filter((o) => !filledIds.has(o.id))));
    this.deps.store.update(recordTrades(filled.length));

    for (const order of filled) {
      const side = oppositeSide(order.side);
      const price = side === 'buy' ? order.price - this.settings.spacing : order.price + this.settings.spacing;
      this.pending.push({
        side,
        price,
        quantity: order.quantity,
        market: order.market,
        origin: 'refill',
        sourceOrderId: order.id,
      });
      this.log.info(
        { orderId: order.id, side: order.side, price: order.price, quantity: order.quantity, replacement: { side, price } },
        'Order filled',
      );
      this.deps.audit?.info(MODULE, 'FILL', `${order.side} ${order.quantity} @ ${order.price} (${order.id})`);
      this.deps.notifier?.notifyFill(order.side, order.price, order.quantity, order.market);
    }
    return filled.length;
  }

  private async submit(rung: PendingRung): Promise<SubmitOutcome> {
    const { side, price, quantity, market } = rung;

    if (!Number.isFinite(price) || price <= 0) {
      this.log.error({ market, side, price, quantity }, 'Invalid rung price, abandoned');
      this.deps.audit?.warn(MODULE, 'INVALID_PRICE', `${side} ${quantity} @ ${price}`);
      return 'skipped';
    }
    const notional = price * quantity;
    if (notional < this.settings.minNotional) {
      this.log.warn(
        { market, side, price, quantity, notional, minNotional: this.settings.minNotional },
        'Order below minimum notional, skipped',
      );
      this.deps.audit?.warn(MODULE, 'MIN_NOTIONAL_SKIP', `${side} ${quantity} @ ${price} = ${notional}`);
      return 'skipped';
    }

    const res = await this.deps.exchange.placeOrder(market, side, price, quantity);
    if (!res.ok) {
      this.deps.store.update(recordFailure);
      this.log.warn({ market, side, price, quantity, error: res.error }, 'Placement failed, rung kept');
      this.deps.audit?.error(MODULE, 'PLACE_FAILED', `${side} ${quantity} @ ${price}: ${res.error}`);
      return 'failed';
    }

    const record: OrderRecord = { id: res.value.id, side, price, quantity, market, placedAt: this.now() };
    this.deps.store.update(recordSuccess);
    this.deps.store.update(withOpenOrders([...this.openOrders, record]));
    this.deps.audit?.info(MODULE, 'ORDER_PLACED', `${side} ${quantity} @ ${price} (${record.id})`);
    return 'placed';
  }
}
