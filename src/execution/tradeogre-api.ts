import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ExchangeSettings } from '../config.js';
import { CANCEL_ALL } from '../exchange/exchange-client.js';
import type { ExchangeClient } from '../exchange/exchange-client.js';
import { basicAuthHeader } from '../exchange/tradeogre/auth.js';
import type { Credentials } from '../exchange/tradeogre/auth.js';
import { requestValidated } from '../exchange/tradeogre/client.js';
import type { RequestSpec, TransportOptions } from '../exchange/tradeogre/client.js';
import {
  PRIVATE_BALANCES,
  PRIVATE_ORDERS,
  PRIVATE_ORDER_BUY,
  PRIVATE_ORDER_SELL,
  PRIVATE_ORDER_CANCEL,
  publicTicker,
} from '../exchange/tradeogre/endpoints.js';
import {
  balancesSchema,
  openOrdersSchema,
  orderPlacedSchema,
  successSchema,
  tickerSchema,
} from '../exchange/tradeogre/schemas.js';
import type { OrderItem } from '../exchange/tradeogre/schemas.js';
import { err, ok, splitMarket } from '../types/index.js';
import type {
  Balances,
  CurrencyBalance,
  ExchangeOrder,
  OrderSide,
  PlacedOrder,
  Result,
  Ticker,
} from '../types/index.js';
import type { RateLimiter } from './rate-limiter.js';
import type { CancellationToken } from '../safety/cancellation.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isValidOrderId(id: string): boolean {
  return UUID_RE.test(id);
}

/** @returns an error message, or null when the order may be sent */
export function validateOrderParams(market: string, price: number, quantity: number): string | null {
  if (!splitMarket(market)) return 'Invalid market format';
  if (!Number.isFinite(quantity) || quantity <= 0) return 'Quantity must be positive';
  if (!Number.isFinite(price) || price <= 0) return 'Price must be positive';
  return null;
}

/** 8 decimal places, the exchange's precision */
export function formatDecimal(value: number): string {
  return value.toFixed(8);
}

export interface TradeOgreApiDeps {
  limiter: RateLimiter;
  logger: Logger;
  credentials: Credentials | null;
  cancel?: CancellationToken;
}

/**
 * TradeOgre v1 REST client
 *
 * Endpoints:
 *   GET  /ticker/{market}        bid / ask / last
 *   GET  /account/balances       balances
 *   POST /account/orders         open orders for a market
 *   POST /order/buy|sell         limit orders
 *   POST /order/cancel           cancel one order or "all"
 *
 * Inputs are validated before any network call; validation failures are
 * never retried. Retries and backoff live in exchange/tradeogre/client.ts.
 * Placement is retried only when the exchange cannot have received it.
 * Cancels run on a transport that ignores the stop token, so shutdown
 * cleanup keeps its retries.
 */
export class TradeOgreApi implements ExchangeClient {
  private readonly log: Logger;
  private readonly transport: TransportOptions;
  private readonly cleanupTransport: TransportOptions;
  private readonly authorization: string | null;

  constructor(settings: ExchangeSettings, deps: TradeOgreApiDeps) {
    this.log = createChildLogger(deps.logger, 'tradeogre-api');
    this.authorization = deps.credentials ? basicAuthHeader(deps.credentials) : null;
    this.cleanupTransport = {
      baseUrl: settings.baseUrl,
      timeoutMs: settings.requestTimeoutMs,
      maxRetries: settings.maxRetries,
      retryBaseMs: settings.retryBaseMs,
      log: this.log,
      limiter: deps.limiter,
    };
    this.transport = { ...this.cleanupTransport, cancel: deps.cancel };
  }

  async getTicker(market: string): Promise<Result<Ticker>> {
    if (!splitMarket(market)) return err('Invalid market format');
    const res = await requestValidated({ method: 'GET', path: publicTicker(market) }, tickerSchema, this.transport);
    if (!res.ok) {
      this.log.warn({ market, error: res.error }, 'getTicker failed');
      return res;
    }
    const t = res.value;
    return ok({ bid: t.bid, ask: t.ask, price: t.price, high: t.high, low: t.low, volume: t.volume });
  }

  async getBalances(): Promise<Result<Balances>> {
    const spec = this.privateSpec({ method: 'GET', path: PRIVATE_BALANCES });
    if (!spec.ok) return spec;
    const res = await requestValidated(spec.value, balancesSchema, this.transport);
    if (!res.ok) {
      this.log.warn({ error: res.error }, 'getBalances failed');
      return res;
    }

    const totals = res.value.balances ?? {};
    const available = res.value.available ?? {};
    const balances: Record<string, CurrencyBalance> = {};
    for (const currency of new Set([...Object.keys(totals), ...Object.keys(available)])) {
      const free = available[currency] ?? totals[currency] ?? 0;
      const total = totals[currency] ?? free;
      balances[currency] = { available: free, held: Math.max(total - free, 0) };
    }
    return ok(balances);
  }

  async getOpenOrders(market: string): Promise<Result<ExchangeOrder[]>> {
    if (!splitMarket(market)) return err('Invalid market format');
    const spec = this.privateSpec({ method: 'POST', path: PRIVATE_ORDERS, form: { market } });
    if (!spec.ok) return spec;
    const res = await requestValidated(spec.value, openOrdersSchema, this.transport);
    if (!res.ok) {
      this.log.warn({ market, error: res.error }, 'getOpenOrders failed');
      return res;
    }

    const items: OrderItem[] = Array.isArray(res.value)
      ? res.value
      : Object.entries(res.value).map(([uuid, o]) => ({ ...o, uuid: o.uuid ?? uuid }));
    return ok(
      items
        .filter((o) => o.market === market)
        .map((o) => ({ id: o.uuid, side: o.type, price: o.price, quantity: o.quantity, market: o.market })),
    );
  }

  async placeOrder(market: string, side: OrderSide, price: number, quantity: number): Promise<Result<PlacedOrder>> {
    const invalid = validateOrderParams(market, price, quantity);
    if (invalid) {
      this.log.warn({ market, side, price, quantity, error: invalid }, 'Order rejected before sending');
      return err(invalid);
    }
    const spec = this.privateSpec({
      method: 'POST',
      path: side === 'buy' ? PRIVATE_ORDER_BUY : PRIVATE_ORDER_SELL,
      form: { market, quantity: formatDecimal(quantity), price: formatDecimal(price) },
      retry: 'unsent',
    });
    if (!spec.ok) return spec;

    const res = await requestValidated(spec.value, orderPlacedSchema, this.transport);
    if (!res.ok) {
      this.log.warn({ market, side, price, quantity, error: res.error }, 'placeOrder failed');
      return res;
    }
    this.log.info({ market, side, price, quantity, orderId: res.value.uuid }, 'Order placed');
    return ok({ id: res.value.uuid });
  }

  async cancelOrder(id: string): Promise<Result<void>> {
    if (id !== CANCEL_ALL && !isValidOrderId(id)) return err('Invalid UUID format');
    const spec = this.privateSpec({ method: 'POST', path: PRIVATE_ORDER_CANCEL, form: { uuid: id } });
    if (!spec.ok) return spec;
    const res = await requestValidated(spec.value, successSchema, this.cleanupTransport);
    if (!res.ok) {
      this.log.warn({ uuid: id, error: res.error }, 'cancelOrder failed');
      return res;
    }
    this.log.info({ uuid: id }, 'Order cancelled');
    return ok(undefined);
  }

  // ── helpers ───────────────────────────────────────────────────────
  private privateSpec(spec: Omit<RequestSpec, 'authorization'>): Result<RequestSpec> {
    if (!this.authorization) return err('API key and secret required for this endpoint');
    return ok({ ...spec, authorization: this.authorization });
  }
}
