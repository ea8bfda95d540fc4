import type { ControllerState } from './risk.js';
import type { SafetyTrigger } from './risk.js';

export type ExitCode = 0 | 1 | 2;

export interface RunStats {
  readonly uptimeSec: number;
  readonly totalTrades: number;
  readonly openOrders: number;
  readonly pendingRungs: number;
  readonly consecutiveFailures: number;
  readonly emergencyReason: SafetyTrigger | 'MANUAL' | null;
}

export interface RunOutcome {
  readonly exitCode: ExitCode;
  readonly finalState: ControllerState;
  readonly stats: RunStats;
}

/** one periodic status line */
export interface StatusSnapshot {
  readonly market: string;
  readonly state: ControllerState;
  readonly lastPrice: number;
  readonly openOrders: number;
  readonly pendingRungs: number;
  readonly totalTrades: number;
  readonly consecutiveFailures: number;
  readonly uptimeSec: number;
}
