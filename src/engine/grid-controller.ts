import type { TradingParameters } from '../config.js';
import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ExchangeClient } from '../exchange/exchange-client.js';
import type { Notifier } from '../notification/notifier.js';
import { formatStatusLine } from '../report/formatter.js';
import { SafetyMonitor } from '../risk/safety-monitor.js';
import { ControllerStateMachine } from '../risk/state-machine.js';
import type { AuditLog } from '../safety/audit-log.js';
import type { CancellationToken } from '../safety/cancellation.js';
import type { KillSwitch } from '../safety/kill-switch.js';
import { observePrice, recordFailure } from '../state/bot-state.js';
import type { BotStateStore } from '../state/bot-state.js';
import { generateGrid, gridSpacing } from '../strategy/grid-planner.js';
import { splitMarket } from '../types/index.js';
import type {
  ControllerState,
  ExitCode,
  RunOutcome,
  RunStats,
  Ticker,
} from '../types/index.js';
import type { FillOracle } from './fill-oracle.js';
import { OrderLedger } from './order-ledger.js';

/** a spread wider than this only warns */
const WIDE_SPREAD = 0.5;

export interface ControllerDeps {
  exchange: ExchangeClient;
  oracle: FillOracle;
  store: BotStateStore;
  cancel: CancellationToken;
  killSwitch: KillSwitch;
  logger: Logger;
  /** live trading refuses to start without them */
  hasCredentials: boolean;
  audit?: AuditLog;
  notifier?: Notifier;
  now?: () => number;
}

interface GridPlan {
  lower: number;
  upper: number;
}

type Phase<T> = { next: 'continue'; value: T } | { next: 'stop' } | { next: 'fail'; reason: string };

const MODULE = 'controller';

/**
 * Grid bot lifecycle
 *
 *   INIT → VALIDATING → PLACING_GRID → MONITORING → STOPPING → TERMINATED
 *                                          └→ EMERGENCY_STOPPED → TERMINATED
 *
 * Startup failures go straight to TERMINATED (exit 1). A stop request ends in
 * exit 0, an emergency stop in exit 2. Open orders are cancelled on the way
 * out of MONITORING either way.
 */
export class GridController {
  private readonly fsm: ControllerStateMachine;
  private readonly monitor: SafetyMonitor;
  private readonly log: Logger;
  private readonly now: () => number;
  private ledger: OrderLedger | null = null;

  constructor(
    private readonly params: TradingParameters,
    private readonly deps: ControllerDeps,
  ) {
    this.log = createChildLogger(deps.logger, MODULE);
    this.now = deps.now ?? Date.now;
    this.fsm = new ControllerStateMachine(deps.logger, this.now);
    this.monitor = new SafetyMonitor(
      {
        market: params.market,
        maxConsecutiveFailures: params.maxConsecutiveFailures,
        maxDailyLoss: params.maxDailyLoss,
        maxPriceDeviation: params.maxPriceDeviation,
        maxPosition: params.maxPosition,
      },
      { exchange: deps.exchange, store: deps.store, logger: deps.logger },
    );
  }

  get state(): ControllerState {
    return this.fsm.current;
  }

  /** Runs to TERMINATED. Never rejects. */
  async run(): Promise<RunOutcome> {
    try {
      return await this.execute();
    } catch (err) {
      this.log.fatal({ err, state: this.fsm.current }, 'Controller crashed');
      this.deps.audit?.critical(MODULE, 'CRASH', String(err));
      this.deps.notifier?.notifyError(MODULE, `Controller crashed: ${String(err)}`);
      await this.cleanup();
      return this.finish(1);
    }
  }

  // ── lifecycle ─────────────────────────────────────────────────────

  private async execute(): Promise<RunOutcome> {
    const init = await this.initialize();
    if (init.next === 'fail') return this.abort(init.reason);
    if (init.next === 'stop') {
      this.fsm.transition('TERMINATED');
      return this.finish(0);
    }
    this.fsm.transition('VALIDATING');

    const plan = await this.validate(init.value);
    if (plan.next === 'fail') return this.abort(plan.reason);
    if (plan.next === 'stop') return this.stop();
    this.fsm.transition('PLACING_GRID');

    const placed = await this.placeGrid(plan.value);
    if (placed.next === 'fail') return this.abort(placed.reason);
    if (placed.next === 'stop') return this.stop();
    this.fsm.transition('MONITORING');
    this.deps.audit?.info(MODULE, 'MONITORING', `${this.deps.store.snapshot.openOrders.length} orders open`);
    this.deps.notifier?.notifyStartup(this.params.market, this.params.dryRun, this.params.gridCount);

    const exit = await this.monitorLoop(placed.value);
    return exit === 'emergency' ? this.emergency() : this.stop();
  }

  /** credentials and connectivity */
  private async initialize(): Promise<Phase<Ticker>> {
    const { market, dryRun } = this.params;
    if (!dryRun && !this.deps.hasCredentials) {
      return { next: 'fail', reason: 'API key and secret required for live trading' };
    }
    this.log.info({ market, dryRun }, 'Testing exchange connectivity');
    const ticker = await this.deps.exchange.getTicker(market);
    if (!ticker.ok) return { next: 'fail', reason: `Connectivity test failed: ${ticker.error}` };
    if (this.deps.cancel.isCancelled) return { next: 'stop' };
    return { next: 'continue', value: ticker.value };
  }

  /** ticker sanity, bounds, balance */
  private async validate(ticker: Ticker): Promise<Phase<GridPlan>> {
    const { market, buffer, upperBound, totalQuantity, gridCount, minNotional } = this.params;
    if (this.deps.cancel.isCancelled) return { next: 'stop' };

    if (!(ticker.bid > 0) || !(ticker.ask > 0) || !(ticker.price > 0)) {
      return { next: 'fail', reason: `Invalid ticker: bid=${ticker.bid} ask=${ticker.ask} price=${ticker.price}` };
    }
    const spread = (ticker.ask - ticker.bid) / ticker.bid;
    if (spread > WIDE_SPREAD) {
      this.log.warn({ market, bid: ticker.bid, ask: ticker.ask, spread }, 'Wide spread');
    }

    const lower = ticker.ask + buffer;
    if (!(upperBound > lower)) {
      return { next: 'fail', reason: `Upper bound ${upperBound} must be above ask + buffer (${lower})` };
    }

    const pair = splitMarket(market);
    if (!pair) return { next: 'fail', reason: `Invalid market format: ${market}` };
    const balances = await this.deps.exchange.getBalances();
    if (!balances.ok) return { next: 'fail', reason: `Could not read balances: ${balances.error}` };
    const available = balances.value[pair.base]?.available ?? 0;
    if (available < totalQuantity) {
      return {
        next: 'fail',
        reason: `Insufficient ${pair.base} balance: ${available} available, ${totalQuantity} required`,
      };
    }

    const perLevel = totalQuantity / gridCount;
    if (perLevel * lower < minNotional) {
      const recommended = (minNotional / lower) * gridCount;
      this.log.warn(
        { perLevel, lowestNotional: perLevel * lower, minNotional, recommendedTotalQuantity: recommended },
        'Lowest rungs are below the minimum notional and will be skipped',
      );
    }

    this.deps.store.update(observePrice(ticker.price));
    this.log.info({ market, bid: ticker.bid, ask: ticker.ask, available, lower, upper: upperBound }, 'Preconditions ok');
    if (this.deps.cancel.isCancelled) return { next: 'stop' };
    return { next: 'continue', value: { lower, upper: upperBound } };
  }

  private async placeGrid(plan: GridPlan): Promise<Phase<OrderLedger>> {
    const { market, gridCount, totalQuantity, minNotional } = this.params;
    const levels = generateGrid(plan.lower, plan.upper, gridCount);
    if (levels.length === 0) {
      return { next: 'fail', reason: `Grid generation failed for ${plan.lower}..${plan.upper} x${gridCount}` };
    }

    const ledger = new OrderLedger(
      { market, spacing: gridSpacing(plan.lower, plan.upper, gridCount), minNotional },
      {
        exchange: this.deps.exchange,
        oracle: this.deps.oracle,
        store: this.deps.store,
        cancel: this.deps.cancel,
        logger: this.deps.logger,
        audit: this.deps.audit,
        notifier: this.deps.notifier,
        now: this.now,
      },
    );
    this.ledger = ledger;

    const result = await ledger.placeInitialLadder(levels, totalQuantity / gridCount);
    this.deps.audit?.info(MODULE, 'LADDER', JSON.stringify({ ...result, levels: levels.length }));
    if (this.deps.cancel.isCancelled) return { next: 'stop' };
    if (result.placed === 0) return { next: 'fail', reason: 'No grid orders could be placed' };
    return { next: 'continue', value: ledger };
  }

  private async monitorLoop(ledger: OrderLedger): Promise<'stopped' | 'emergency'> {
    const pulseMs = this.params.pulseIntervalSec * 1000;
    const statusMs = this.params.statusEverySec * 1000;
    let lastStatus = this.now();

    for (;;) {
      if (this.deps.cancel.isCancelled) {
        this.log.info({ reason: this.deps.cancel.reason }, 'Stop requested');
        return 'stopped';
      }

      let tripped = false;
      try {
        const verdict = await this.monitor.evaluate();
        if (verdict.tripped) {
          this.deps.killSwitch.activate(verdict.trigger, verdict.detail);
          tripped = true;
        } else {
          await ledger.reconcile();
          if (this.now() - lastStatus >= statusMs) {
            this.logStatus(ledger);
            lastStatus = this.now();
          }
        }
      } catch (err) {
        this.deps.store.update(recordFailure);
        this.log.error({ err }, 'Monitoring cycle failed');
      }
      if (tripped) return 'emergency';

      await this.deps.cancel.sleep(pulseMs);
    }
  }

  // ── exits ─────────────────────────────────────────────────────────

  private abort(reason: string): RunOutcome {
    this.log.error({ state: this.fsm.current, reason }, 'Startup failed');
    this.deps.audit?.error(MODULE, 'STARTUP_FAILED', reason);
    this.fsm.transition('TERMINATED');
    return this.finish(1);
  }

  private async stop(): Promise<RunOutcome> {
    this.fsm.transition('STOPPING');
    await this.cleanup();
    this.fsm.transition('TERMINATED');
    return this.finish(0);
  }

  private async emergency(): Promise<RunOutcome> {
    this.fsm.transition('EMERGENCY_STOPPED');
    await this.cleanup();
    this.fsm.transition('TERMINATED');
    return this.finish(2);
  }

  private async cleanup(): Promise<void> {
    if (!this.ledger) return;
    this.log.info({ open: this.ledger.openOrders.length }, 'Cancelling open orders');
    await this.ledger.cancelAll();
  }

  private finish(exitCode: ExitCode): RunOutcome {
    const stats = this.stats();
    this.log.info({ exitCode, finalState: this.fsm.current, ...stats }, 'Run finished');
    this.deps.audit?.info(MODULE, 'SHUTDOWN', JSON.stringify({ exitCode, ...stats }));
    this.deps.notifier?.notifyShutdown({ exitCode, totalTrades: stats.totalTrades, uptimeSec: stats.uptimeSec });
    return { exitCode, finalState: this.fsm.current, stats };
  }

  private stats(): RunStats {
    const s = this.deps.store.snapshot;
    return {
      uptimeSec: Math.floor((this.now() - s.startTime) / 1000),
      totalTrades: s.totalTrades,
      openOrders: s.openOrders.length,
      pendingRungs: this.ledger?.pendingRungs.length ?? 0,
      consecutiveFailures: s.consecutiveFailures,
      emergencyReason: s.emergencyReason,
    };
  }

  private logStatus(ledger: OrderLedger): void {
    const s = this.deps.store.snapshot;
    this.log.info(
      formatStatusLine({
        market: this.params.market,
        state: this.fsm.current,
        lastPrice: s.lastObservedPrice,
        openOrders: s.openOrders.length,
        pendingRungs: ledger.pendingRungs.length,
        totalTrades: s.totalTrades,
        consecutiveFailures: s.consecutiveFailures,
        uptimeSec: Math.floor((this.now() - s.startTime) / 1000),
      }),
    );
  }
}
