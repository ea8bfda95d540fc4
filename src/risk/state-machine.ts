import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ControllerState } from '../types/index.js';

type StateTransition = [ControllerState, ControllerState];

/** allowed controller transitions */
const VALID_TRANSITIONS: StateTransition[] = [
  ['INIT', 'VALIDATING'],
  ['VALIDATING', 'PLACING_GRID'],
  ['PLACING_GRID', 'MONITORING'],
  ['MONITORING', 'STOPPING'],
  ['MONITORING', 'EMERGENCY_STOPPED'],
  ['STOPPING', 'TERMINATED'],
  ['EMERGENCY_STOPPED', 'TERMINATED'],
  // startup failures
  ['INIT', 'TERMINATED'],
  ['VALIDATING', 'TERMINATED'],
  ['PLACING_GRID', 'TERMINATED'],
  // stop requested before monitoring began
  ['VALIDATING', 'STOPPING'],
  ['PLACING_GRID', 'STOPPING'],
];

export interface TransitionRecord {
  from: ControllerState;
  to: ControllerState;
  at: number;
}

/**
 * Controller state machine.
 * An invalid transition throws; it is a programming error.
 */
export class ControllerStateMachine {
  private state: ControllerState = 'INIT';
  private stateEnteredAt: number;
  private history: TransitionRecord[] = [];
  private readonly log: Logger;

  constructor(logger: Logger, private readonly now: () => number = Date.now) {
    this.log = createChildLogger(logger, 'state-machine');
    this.stateEnteredAt = now();
  }

  get current(): ControllerState {
    return this.state;
  }

  get stateAge(): number {
    return this.now() - this.stateEnteredAt;
  }

  transition(to: ControllerState): void {
    if (!this.canTransition(to)) {
      const msg = `Invalid state transition: ${this.state} → ${to}`;
      this.log.error({ from: this.state, to }, msg);
      throw new Error(msg);
    }

    this.log.info({ from: this.state, to }, 'State transition');
    this.history.push({ from: this.state, to, at: this.now() });
    this.state = to;
    this.stateEnteredAt = this.now();
  }

  canTransition(to: ControllerState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return this.state === 'TERMINATED';
  }

  getHistory(): ReadonlyArray<TransitionRecord> {
    return this.history;
  }
}
