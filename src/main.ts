#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { ConfigError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createContext, createController } from './context.js';
import type { BotContext } from './context.js';
import { loadCredentials } from './exchange/tradeogre/auth.js';
import type { Credentials } from './exchange/tradeogre/auth.js';
import { createChildLogger, createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { formatFinalReport } from './report/formatter.js';

const USAGE = `
Usage:
  ogre-grid [--config <file>] [--dry-run]

Options:
  --config <file>   JSON config (default: $GRID_CONFIG or ./config.json)
  --dry-run         force dry run regardless of config
  --help            show this message

Keys (TTY): [k] kill switch  [q] stop
`;

// ── CLI ──
function parseCli(): { configPath?: string; dryRun: boolean; help: boolean } {
  const { values } = parseArgs({
    options: {
      config: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });
  return { configPath: values.config, dryRun: values['dry-run'] ?? false, help: values.help ?? false };
}

function readConfig(configPath: string | undefined, forceDryRun: boolean): AppConfig | null {
  try {
    const config = loadConfig({ configPath });
    if (forceDryRun) return { ...config, trading: { ...config.trading, dryRun: true } };
    return config;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return null;
    }
    throw e;
  }
}

function readCredentials(config: AppConfig, log: Logger): Credentials | null {
  const res = loadCredentials(config.credentialsFile, log);
  if (res.ok) return res.value;
  if (config.trading.dryRun) {
    log.info({ file: config.credentialsFile }, 'No credentials loaded; dry run needs none');
  } else {
    log.error({ file: config.credentialsFile, error: res.error }, 'Credentials unavailable');
  }
  return null;
}

// ── signals & keyboard ──
function wireControls(ctx: BotContext, log: Logger): () => void {
  let signalled = false;
  const onSignal = (signal: string): void => {
    if (signalled) {
      log.warn({ signal }, 'Already stopping, cleanup in progress');
      return;
    }
    signalled = true;
    log.info({ signal }, 'Stop requested');
    ctx.cancel.cancel(signal);
  };
  const onSigint = (): void => onSignal('SIGINT');
  const onSigterm = (): void => onSignal('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  const onKey = (data: Buffer): void => {
    const key = data.toString();
    if (key === 'k' || key === 'K') {
      log.warn('Manual kill switch triggered');
      ctx.killSwitch.activate('MANUAL', 'Manual kill (keyboard)');
    }
    if (key === 'q' || key === '\u0003') {
      onSignal('keyboard');
    }
  };
  const tty = process.stdin.isTTY;
  if (tty) {
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('data', onKey);
    console.log('');
    console.log(`  Market: ${ctx.config.trading.market}${ctx.config.trading.dryRun ? ' (DRY RUN)' : ''}`);
    console.log('  Keys: [k] Kill switch  [q] Stop');
    console.log('');
  }

  return () => {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (tty) {
      process.stdin.off('data', onKey);
      process.stdin.setRawMode(false);
      process.stdin.pause();
    }
  };
}

async function main(): Promise<number> {
  const cli = parseCli();
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  const config = readConfig(cli.configPath, cli.dryRun);
  if (!config) return 1;

  const logger = createLogger(config.log.level);
  const log = createChildLogger(logger, 'main');
  log.info({ market: config.trading.market, dryRun: config.trading.dryRun, version: '0.1.0' }, 'Starting grid bot');

  const credentials = readCredentials(config, log);
  const ctx = createContext(config, { logger, credentials });
  ctx.audit.info('main', 'BOT_STARTED', `dryRun=${config.trading.dryRun}`);

  const release = wireControls(ctx, log);
  try {
    const outcome = await createController(ctx).run();
    console.log(formatFinalReport(config.trading.market, outcome));
    await ctx.notifier.flush();
    return outcome.exitCode;
  } finally {
    release();
    ctx.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
