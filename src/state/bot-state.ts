import type { BotState, OrderRecord, SafetyTrigger } from '../types/index.js';

export type BotStateReducer = (state: BotState) => BotState;

export function initialBotState(startTime: number): BotState {
  return {
    startTime,
    totalTrades: 0,
    consecutiveFailures: 0,
    dailyPnl: 0,
    lastObservedPrice: 0,
    emergencyStop: false,
    emergencyReason: null,
    openOrders: [],
  };
}

// ── Reducers ────────────────────────────────────────────────────────

export const recordFailure: BotStateReducer = (s) => ({
  ...s,
  consecutiveFailures: s.consecutiveFailures + 1,
});

export const recordSuccess: BotStateReducer = (s) =>
  s.consecutiveFailures === 0 ? s : { ...s, consecutiveFailures: 0 };

export function recordTrades(count: number): BotStateReducer {
  return (s) => ({ ...s, totalTrades: s.totalTrades + count });
}

export function observePrice(price: number): BotStateReducer {
  return (s) => ({ ...s, lastObservedPrice: price });
}

export function withOpenOrders(orders: ReadonlyArray<OrderRecord>): BotStateReducer {
  return (s) => ({ ...s, openOrders: orders });
}

/** daily P&L is fed from outside; nothing in the bot computes it */
export function withDailyPnl(pnl: number): BotStateReducer {
  return (s) => ({ ...s, dailyPnl: pnl });
}

/** first reason wins; the flag never clears */
export function latchEmergency(reason: SafetyTrigger | 'MANUAL'): BotStateReducer {
  return (s) => (s.emergencyStop ? s : { ...s, emergencyStop: true, emergencyReason: reason });
}

// ── Store ───────────────────────────────────────────────────────────

/**
 * Single owner of the current BotState snapshot.
 * Readers get an immutable snapshot; writers pass a reducer.
 */
export class BotStateStore {
  private current: BotState;

  constructor(initial: BotState) {
    this.current = initial;
  }

  get snapshot(): BotState {
    return this.current;
  }

  update(reducer: BotStateReducer): BotState {
    this.current = reducer(this.current);
    return this.current;
  }
}
