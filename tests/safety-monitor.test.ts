import { describe, it, expect } from 'vitest';
import { SafetyMonitor, openSellQuantity } from '../src/risk/safety-monitor.js';
import type { SafetyLimits } from '../src/risk/safety-monitor.js';
import {
  BotStateStore,
  initialBotState,
  latchEmergency,
  observePrice,
  recordFailure,
  withDailyPnl,
  withOpenOrders,
} from '../src/state/bot-state.js';
import { err, ok } from '../src/types/index.js';
import type { OrderRecord } from '../src/types/index.js';
import { FakeExchange } from './helpers/fake-exchange.js';
import { silentLogger } from './helpers/fixtures.js';

const LIMITS: SafetyLimits = {
  market: 'AEGS-USDT',
  maxConsecutiveFailures: 3,
  maxDailyLoss: 100,
  maxPriceDeviation: 0.5,
  maxPosition: 5000,
};

function sell(id: string, quantity: number): OrderRecord {
  return { id, side: 'sell', price: 0.002, quantity, market: 'AEGS-USDT', placedAt: 0 };
}

function setup() {
  const exchange = new FakeExchange();
  const store = new BotStateStore(initialBotState(0));
  const monitor = new SafetyMonitor(LIMITS, { exchange, store, logger: silentLogger });
  return { exchange, store, monitor };
}

function tickerAt(price: number) {
  return ok({ bid: price, ask: price, price, high: price, low: price, volume: 1 });
}

describe('SafetyMonitor', () => {
  it('passes when no predicate holds and seeds the last price', async () => {
    const { store, monitor } = setup();

    const verdict = await monitor.evaluate();

    expect(verdict).toEqual({ tripped: false });
    expect(store.snapshot.lastObservedPrice).toBe(0.0006);
    expect(store.snapshot.emergencyStop).toBe(false);
  });

  it('reports ALREADY_STOPPED without calling the exchange', async () => {
    const { exchange, store, monitor } = setup();
    store.update(latchEmergency('MANUAL'));

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('ALREADY_STOPPED');
    expect(exchange.tickerCalls).toBe(0);
  });

  it('keeps the failure streak across a successful ticker fetch', async () => {
    const { store, monitor } = setup();
    store.update(recordFailure);
    store.update(recordFailure);

    const verdict = await monitor.evaluate();

    expect(verdict).toEqual({ tripped: false });
    expect(store.snapshot.consecutiveFailures).toBe(2);
  });

  it('trips on accumulated failures even when the ticker answers', async () => {
    const { store, monitor } = setup();
    store.update(recordFailure);
    store.update(recordFailure);
    store.update(recordFailure);

    const verdict = await monitor.evaluate();

    expect(verdict).toEqual({
      tripped: true,
      trigger: 'CONSECUTIVE_FAILURES',
      detail: '3 consecutive failures (limit 3)',
    });
    expect(store.snapshot.consecutiveFailures).toBe(3);
  });

  it('counts a ticker failure towards the consecutive-failure limit', async () => {
    const { exchange, store, monitor } = setup();
    store.update(recordFailure);
    store.update(recordFailure);
    exchange.tickerSequence = [err('Request timeout after 4 attempts')];

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('CONSECUTIVE_FAILURES');
    expect(store.snapshot.consecutiveFailures).toBe(3);
    expect(store.snapshot.emergencyStop).toBe(true);
    expect(store.snapshot.emergencyReason).toBe('CONSECUTIVE_FAILURES');
  });

  it('skips the deviation check when the ticker is unavailable', async () => {
    const { exchange, store, monitor } = setup();
    store.update(observePrice(0.001));
    exchange.tickerSequence = [err('HTTP 503 after 4 attempts')];

    const verdict = await monitor.evaluate();

    expect(verdict).toEqual({ tripped: false });
    expect(store.snapshot.lastObservedPrice).toBe(0.001);
    expect(store.snapshot.consecutiveFailures).toBe(1);
  });

  it('trips on a daily loss beyond the limit', async () => {
    const { store, monitor } = setup();
    store.update(withDailyPnl(-100.01));

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('DAILY_LOSS');
  });

  it('does not trip on a loss exactly at the limit', async () => {
    const { store, monitor } = setup();
    store.update(withDailyPnl(-100));
    expect(await monitor.evaluate()).toEqual({ tripped: false });
  });

  it('trips on a price move above the deviation threshold', async () => {
    const { exchange, store, monitor } = setup();
    store.update(observePrice(0.001));
    exchange.tickerSequence = [tickerAt(0.0016)];

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('PRICE_DEVIATION');
    expect(store.snapshot.lastObservedPrice).toBe(0.001);
  });

  it('updates the last price after a passing observation', async () => {
    const { exchange, store, monitor } = setup();
    store.update(observePrice(0.001));
    exchange.tickerSequence = [tickerAt(0.0014)];

    expect(await monitor.evaluate()).toEqual({ tripped: false });
    expect(store.snapshot.lastObservedPrice).toBe(0.0014);
  });

  it('trips when open sell quantity exceeds the position ceiling', async () => {
    const { store, monitor } = setup();
    store.update(withOpenOrders([sell('a', 3000), sell('b', 2001)]));

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('MAX_POSITION');
  });

  it('reports the first predicate in order when several hold', async () => {
    const { exchange, store, monitor } = setup();
    store.update(withDailyPnl(-500));
    store.update(observePrice(0.001));
    store.update(withOpenOrders([sell('a', 9000)]));
    exchange.tickerSequence = [tickerAt(0.01)];

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('DAILY_LOSS');
  });

  it('prefers the failure trigger over the deviation trigger', async () => {
    const { exchange, store, monitor } = setup();
    for (let i = 0; i < 5; i++) store.update(recordFailure);
    store.update(observePrice(0.001));
    exchange.tickerSequence = [tickerAt(0.01)];

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('CONSECUTIVE_FAILURES');
    expect(store.snapshot.emergencyReason).toBe('CONSECUTIVE_FAILURES');
    expect(store.snapshot.lastObservedPrice).toBe(0.001);
  });

  it('prefers the deviation trigger over the position trigger', async () => {
    const { exchange, store, monitor } = setup();
    store.update(observePrice(0.001));
    store.update(withOpenOrders([sell('a', 9000)]));
    exchange.tickerSequence = [tickerAt(0.01)];

    const verdict = await monitor.evaluate();

    expect(verdict.tripped && verdict.trigger).toBe('PRICE_DEVIATION');
  });
});

describe('openSellQuantity', () => {
  it('sums only sell orders', () => {
    const state = {
      ...initialBotState(0),
      openOrders: [
        sell('a', 100),
        { id: 'b', side: 'buy' as const, price: 0.001, quantity: 500, market: 'AEGS-USDT', placedAt: 0 },
        sell('c', 250),
      ],
    };
    expect(openSellQuantity(state)).toBe(350);
  });
});
