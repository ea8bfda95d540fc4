export type { OrderSide, OrderRecord, PendingRung } from './order.js';
export { oppositeSide } from './order.js';
export type {
  Ticker,
  CurrencyBalance,
  Balances,
  ExchangeOrder,
  PlacedOrder,
  MarketPair,
} from './market.js';
export { splitMarket } from './market.js';
export type { Result } from './result.js';
export { ok, err } from './result.js';
export type { ControllerState, SafetyTrigger, SafetyVerdict } from './risk.js';
export type { BotState } from './state.js';
export type { ExitCode, RunStats, RunOutcome, StatusSnapshot } from './report.js';
