import type { OrderRecord } from './order.js';
import type { SafetyTrigger } from './risk.js';

/** Process-lifetime aggregate. Never mutated; reducers return new snapshots. */
export interface BotState {
  readonly startTime: number;
  readonly totalTrades: number;
  readonly consecutiveFailures: number;
  readonly dailyPnl: number;
  readonly lastObservedPrice: number;
  readonly emergencyStop: boolean;
  readonly emergencyReason: SafetyTrigger | 'MANUAL' | null;
  readonly openOrders: ReadonlyArray<OrderRecord>;
}
