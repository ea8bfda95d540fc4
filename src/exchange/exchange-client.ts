import type {
  Balances,
  ExchangeOrder,
  OrderSide,
  PlacedOrder,
  Result,
  Ticker,
} from '../types/index.js';

/** cancelOrder target that removes every open order on the account */
export const CANCEL_ALL = 'all';

/**
 * Everything the grid core needs from an exchange.
 * Every call resolves to a Result; none rejects.
 */
export interface ExchangeClient {
  getTicker(market: string): Promise<Result<Ticker>>;
  getBalances(): Promise<Result<Balances>>;
  getOpenOrders(market: string): Promise<Result<ExchangeOrder[]>>;
  placeOrder(market: string, side: OrderSide, price: number, quantity: number): Promise<Result<PlacedOrder>>;
  /** `id` is an order id or CANCEL_ALL */
  cancelOrder(id: string): Promise<Result<void>>;
}
