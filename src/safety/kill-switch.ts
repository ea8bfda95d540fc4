import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { Notifier } from '../notification/notifier.js';
import { latchEmergency } from '../state/bot-state.js';
import type { BotStateStore } from '../state/bot-state.js';
import type { SafetyTrigger } from '../types/index.js';
import type { AuditLog } from './audit-log.js';

/**
 * Kill switch
 * - latches emergencyStop (no new orders from the next check on)
 * - records the reason in the audit trail and notifies
 * Safety predicates and the keyboard both come through here.
 */
export class KillSwitch {
  private activated = false;
  private activatedAt: number | null = null;
  private readonly log: Logger;

  constructor(
    private readonly store: BotStateStore,
    logger: Logger,
    private readonly audit?: AuditLog,
    private readonly notifier?: Notifier,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createChildLogger(logger, 'kill-switch');
  }

  activate(reason: SafetyTrigger | 'MANUAL', detail: string): void {
    if (this.activated) {
      this.log.warn({ reason }, 'Kill switch already activated');
      return;
    }
    this.activated = true;
    this.activatedAt = this.now();

    this.store.update(latchEmergency(reason));
    this.log.error({ reason, detail }, 'KILL SWITCH ACTIVATED');
    this.audit?.critical('kill-switch', 'ACTIVATED', `${reason}: ${detail}`);
    this.notifier?.notifyEmergencyStop(`${reason}: ${detail}`);
  }

  isActivated(): boolean {
    return this.activated;
  }

  getActivatedAt(): number | null {
    return this.activatedAt;
  }
}
