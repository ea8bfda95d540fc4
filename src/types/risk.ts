export type ControllerState =
  | 'INIT'               // credentials + connectivity
  | 'VALIDATING'         // market, bounds, balances
  | 'PLACING_GRID'       // initial ladder
  | 'MONITORING'         // safety check → reconcile → sleep
  | 'STOPPING'           // stop requested, cleanup
  | 'EMERGENCY_STOPPED'  // safety predicate tripped, cleanup
  | 'TERMINATED';

export type SafetyTrigger =
  | 'ALREADY_STOPPED'
  | 'CONSECUTIVE_FAILURES'
  | 'DAILY_LOSS'
  | 'PRICE_DEVIATION'
  | 'MAX_POSITION';

export type SafetyVerdict =
  | { readonly tripped: false }
  | { readonly tripped: true; readonly trigger: SafetyTrigger; readonly detail: string };
