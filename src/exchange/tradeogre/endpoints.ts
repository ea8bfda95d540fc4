/**
 * TradeOgre REST endpoints, defined once.
 * Paths are relative to exchange.baseUrl (https://tradeogre.com/api/v1).
 */

export const TRADEOGRE_REST_BASE = 'https://tradeogre.com/api/v1';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET ticker for one market */
export function publicTicker(market: string): string {
  return `/ticker/${encodeURIComponent(market)}`;
}

// ─── PRIVATE (HTTP basic auth) ──────────────────────────────────────────

/** GET all balances */
export const PRIVATE_BALANCES = '/account/balances';

/** POST open orders, form: market */
export const PRIVATE_ORDERS = '/account/orders';

/** POST limit buy, form: market, quantity, price */
export const PRIVATE_ORDER_BUY = '/order/buy';

/** POST limit sell, form: market, quantity, price */
export const PRIVATE_ORDER_SELL = '/order/sell';

/** POST cancel, form: uuid (or "all") */
export const PRIVATE_ORDER_CANCEL = '/order/cancel';
