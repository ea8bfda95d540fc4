import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { openDatabase } from './db/database.js';
import type { Db } from './db/database.js';
import { ExchangeReconciliation, SimulatedFill } from './engine/fill-oracle.js';
import type { FillOracle } from './engine/fill-oracle.js';
import { GridController } from './engine/grid-controller.js';
import type { ExchangeClient } from './exchange/exchange-client.js';
import { PaperExchange } from './exchange/paper/paper-exchange.js';
import type { Credentials } from './exchange/tradeogre/auth.js';
import { RateLimiter } from './execution/rate-limiter.js';
import { TradeOgreApi } from './execution/tradeogre-api.js';
import { Notifier } from './notification/notifier.js';
import { AuditLog } from './safety/audit-log.js';
import { CancellationToken } from './safety/cancellation.js';
import { KillSwitch } from './safety/kill-switch.js';
import { BotStateStore, initialBotState } from './state/bot-state.js';
import { splitMarket } from './types/index.js';
import type { Balances } from './types/index.js';

/**
 * Everything one bot run shares, built once by the entry point.
 * Nothing here is a module-level singleton.
 */
export interface BotContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly store: BotStateStore;
  readonly cancel: CancellationToken;
  readonly limiter: RateLimiter;
  /** real TradeOgre client; in dry run only its ticker is used */
  readonly api: TradeOgreApi;
  /** what the controller trades against: `api`, or a PaperExchange in dry run */
  readonly exchange: ExchangeClient;
  readonly oracle: FillOracle;
  readonly audit: AuditLog;
  readonly notifier: Notifier;
  readonly killSwitch: KillSwitch;
  readonly hasCredentials: boolean;
  readonly now: () => number;
  close(): void;
}

export interface ContextOptions {
  logger: Logger;
  credentials: Credentials | null;
  /** defaults to openDatabase(config.db.path) */
  db?: Db;
  /** dry-run fill source */
  random?: () => number;
  now?: () => number;
}

/** balances the paper exchange reports: exactly the configured quantity of base */
export function paperBalances(market: string, totalQuantity: number): Balances {
  const pair = splitMarket(market);
  if (!pair) return {};
  return {
    [pair.base]: { available: totalQuantity, held: 0 },
    [pair.quote]: { available: 0, held: 0 },
  };
}

export function createContext(config: AppConfig, options: ContextOptions): BotContext {
  const { logger, credentials } = options;
  const now = options.now ?? Date.now;
  const trading = config.trading;

  const db = options.db ?? openDatabase(config.db.path);
  const audit = new AuditLog(db, trading.market, now);
  const store = new BotStateStore(initialBotState(now()));
  const cancel = new CancellationToken();
  const notifier = new Notifier(config.telegram, logger);
  const killSwitch = new KillSwitch(store, logger, audit, notifier, now);

  const limiter = new RateLimiter(config.exchange.callsPerMinute, {
    now,
    onThrottle: (waitMs) => logger.debug({ module: 'rate-limiter', waitMs }, 'Rate limit reached, waiting'),
  });
  const api = new TradeOgreApi(config.exchange, { limiter, logger, credentials, cancel });

  let exchange: ExchangeClient;
  let oracle: FillOracle;
  if (trading.dryRun) {
    const paper = new PaperExchange(api, {
      balances: paperBalances(trading.market, trading.totalQuantity),
      logger,
    });
    exchange = paper;
    oracle = new SimulatedFill(trading.paperFillProbability, options.random, paper);
    logger.warn({ market: trading.market }, 'DRY RUN: orders are simulated, no private endpoint is called');
  } else {
    exchange = api;
    oracle = new ExchangeReconciliation(api);
  }

  return {
    config,
    logger,
    store,
    cancel,
    limiter,
    api,
    exchange,
    oracle,
    audit,
    notifier,
    killSwitch,
    hasCredentials: credentials !== null,
    now,
    close: () => db.close(),
  };
}

export function createController(ctx: BotContext): GridController {
  return new GridController(ctx.config.trading, {
    exchange: ctx.exchange,
    oracle: ctx.oracle,
    store: ctx.store,
    cancel: ctx.cancel,
    killSwitch: ctx.killSwitch,
    logger: ctx.logger,
    hasCredentials: ctx.hasCredentials,
    audit: ctx.audit,
    notifier: ctx.notifier,
    now: ctx.now,
  });
}
