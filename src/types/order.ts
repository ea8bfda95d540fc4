export type OrderSide = 'buy' | 'sell';

/** An order this bot placed and believes to be resting on the book. */
export interface OrderRecord {
  readonly id: string;
  readonly side: OrderSide;
  readonly price: number;
  readonly quantity: number;
  readonly market: string;
  readonly placedAt: number;     // Unix ms
}

/**
 * A rung that still needs an order: an initial ladder level that failed to
 * place, or the opposite-side replacement of a filled order.
 */
export interface PendingRung {
  readonly side: OrderSide;
  readonly price: number;
  readonly quantity: number;
  readonly market: string;
  readonly origin: 'initial' | 'refill';
  readonly sourceOrderId?: string;
}

export function oppositeSide(side: OrderSide): OrderSide {
  return side === 'buy' ? 'sell' : 'buy';
}
