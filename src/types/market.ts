import type { OrderSide } from './order.js';

export interface Ticker {
  readonly bid: number;
  readonly ask: number;
  readonly price: number;
  readonly high: number;
  readonly low: number;
  readonly volume: number;
}

export interface CurrencyBalance {
  readonly available: number;
  readonly held: number;
}

export type Balances = Readonly<Record<string, CurrencyBalance>>;

/** Open order as reported by the exchange. */
export interface ExchangeOrder {
  readonly id: string;
  readonly side: OrderSide;
  readonly price: number;
  readonly quantity: number;
  readonly market: string;
}

export interface PlacedOrder {
  readonly id: string;
}

/** BASE-QUOTE, e.g. AEGS-USDT */
export interface MarketPair {
  readonly base: string;
  readonly quote: string;
}

export function splitMarket(market: string): MarketPair | null {
  const parts = market.split('-');
  if (parts.length !== 2) return null;
  const [base, quote] = parts;
  if (!base || !quote) return null;
  if (!/^[A-Za-z0-9]+$/.test(base) || !/^[A-Za-z0-9]+$/.test(quote)) return null;
  return { base, quote };
}
