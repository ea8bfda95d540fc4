import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { TRADEOGRE_REST_BASE } from './exchange/tradeogre/endpoints.js';
import { splitMarket } from './types/index.js';

// ── Schema ──────────────────────────────────────────────────────────

export const tradingSchema = z.object({
  /** BASE-QUOTE, e.g. AEGS-USDT */
  market: z.string().refine((m) => splitMarket(m) !== null, {
    message: "market must be in format 'BASE-QUOTE'",
  }),
  /** base currency to deploy across the whole ladder */
  totalQuantity: z.number().positive(),
  /** lowest rung = ask + buffer */
  buffer: z.number().positive(),
  upperBound: z.number().positive(),
  gridCount: z.number().int().min(2),
  pulseIntervalSec: z.number().positive().default(5),
  maxConsecutiveFailures: z.number().int().positive().default(5),
  /** 0.5 = 50% move between two observations */
  maxPriceDeviation: z.number().positive().default(0.5),
  maxDailyLoss: z.number().positive().default(100),
  /** aggregate open sell quantity ceiling (base currency) */
  maxPosition: z.number().positive().default(1000),
  dryRun: z.boolean().default(true),
  /** quantity × price floor, quote currency */
  minNotional: z.number().nonnegative().default(1),
  statusEverySec: z.number().positive().default(60),
  /** dry run: chance a resting order fills in one pulse */
  paperFillProbability: z.number().min(0).max(1).default(0.01),
});

export const exchangeSchema = z.object({
  baseUrl: z.string().url().default(TRADEOGRE_REST_BASE),
  callsPerMinute: z.number().int().positive().default(60),
  maxRetries: z.number().int().nonnegative().default(3),
  retryBaseMs: z.number().int().nonnegative().default(1000),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export const configSchema = z.object({
  trading: tradingSchema,
  exchange: exchangeSchema.default({}),
  /** two lines: key, secret */
  credentialsFile: z.string().default('./api.key'),
  log: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }).default({}),
  db: z.object({
    path: z.string().default('./data/audit.db'),
  }).default({}),
  telegram: z.object({
    enabled: z.boolean().default(false),
    botToken: z.string().default(''),
    chatId: z.string().default(''),
  }).default({}),
});

export type TradingParameters = z.infer<typeof tradingSchema>;
export type ExchangeSettings = z.infer<typeof exchangeSchema>;
export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Loading ─────────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const existing = raw[key];
  if (isRecord(existing)) return existing;
  const created: RawConfig = {};
  raw[key] = created;
  return created;
}

function setNum(target: RawConfig, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') target[key] = Number(value);
}

function setBool(target: RawConfig, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') target[key] = value === 'true';
}

function setStr(target: RawConfig, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') target[key] = value;
}

/**
 * Environment overrides on top of the JSON file.
 * Only the knobs an operator flips between runs are exposed.
 */
function applyEnv(raw: RawConfig, env: NodeJS.ProcessEnv): void {
  const trading = section(raw, 'trading');
  setStr(trading, 'market', env['GRID_MARKET']);
  setNum(trading, 'totalQuantity', env['GRID_TOTAL_QUANTITY']);
  setNum(trading, 'buffer', env['GRID_BUFFER']);
  setNum(trading, 'upperBound', env['GRID_UPPER_BOUND']);
  setNum(trading, 'gridCount', env['GRID_COUNT']);
  setBool(trading, 'dryRun', env['GRID_DRY_RUN']);

  const exchange = section(raw, 'exchange');
  setStr(exchange, 'baseUrl', env['EXCHANGE_BASE_URL']);
  setNum(exchange, 'callsPerMinute', env['EXCHANGE_CALLS_PER_MINUTE']);

  setStr(raw, 'credentialsFile', env['CREDENTIALS_FILE']);
  setStr(section(raw, 'log'), 'level', env['LOG_LEVEL']);
  setStr(section(raw, 'db'), 'path', env['DB_PATH']);

  const telegram = section(raw, 'telegram');
  setBool(telegram, 'enabled', env['TELEGRAM_ENABLED']);
  setStr(telegram, 'botToken', env['TELEGRAM_BOT_TOKEN']);
  setStr(telegram, 'chatId', env['TELEGRAM_CHAT_ID']);
}

/**
 * Validate an already-parsed config object (file contents merged with env).
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw);
  if (result.success) return result.data;
  const issues = result.error.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
  throw new ConfigError(`Invalid configuration: ${issues}`);
}

export interface LoadConfigOptions {
  /** explicit path (--config); falls back to GRID_CONFIG, then ./config.json */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  dotenv.config();
  const env = options.env ?? process.env;
  const file = path.resolve(options.configPath ?? env['GRID_CONFIG'] ?? 'config.json');

  let raw: RawConfig = {};
  if (existsSync(file)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file ${file} must contain a JSON object`);
      }
      raw = parsed;
    } catch (e) {
      if (e instanceof ConfigError) throw e;
      throw new ConfigError(`Could not read config file ${file}: ${String(e)}`);
    }
  } else if (options.configPath) {
    throw new ConfigError(`Config file not found: ${file}`);
  }

  applyEnv(raw, env);
  return parseConfig(raw);
}
