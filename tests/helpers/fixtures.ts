import { createLogger } from '../../src/logger.js';
import type { TradingParameters } from '../../src/config.js';

export const silentLogger = createLogger('silent');

export function makeParams(overrides: Partial<TradingParameters> = {}): TradingParameters {
  return {
    market: 'AEGS-USDT',
    totalQuantity: 9000,
    buffer: 0.00001,
    upperBound: 0.003,
    gridCount: 3,
    pulseIntervalSec: 0.001,
    maxConsecutiveFailures: 5,
    maxPriceDeviation: 0.5,
    maxDailyLoss: 100,
    maxPosition: 10_000,
    dryRun: false,
    minNotional: 1,
    statusEverySec: 60,
    paperFillProbability: 0.01,
    ...overrides,
  };
}
