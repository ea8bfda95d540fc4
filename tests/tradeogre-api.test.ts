import { describe, it, expect, vi, beforeEach } from 'vitest';

const { requestMock } = vi.hoisted(() => ({ requestMock: vi.fn() }));
vi.mock('undici', () => ({ request: requestMock }));

const { TradeOgreApi, isValidOrderId, validateOrderParams, formatDecimal } = await import(
  '../src/execution/tradeogre-api.js'
);
const { RateLimiter } = await import('../src/execution/rate-limiter.js');
const { CancellationToken } = await import('../src/safety/cancellation.js');
const { silentLogger } = await import('./helpers/fixtures.js');

const SETTINGS = {
  baseUrl: 'https://tradeogre.com/api/v1',
  callsPerMinute: 1000,
  maxRetries: 2,
  retryBaseMs: 0,
  requestTimeoutMs: 1000,
};
const CREDENTIALS = { key: 'test-key', secret: 'test-secret' };
const ORDER_ID = '0a1b2c3d-4e5f-6a7b-8c9d-0e1f2a3b4c5d';

function reply(statusCode: number, body: unknown) {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return { statusCode, body: { text: async () => text } };
}

function makeApi(credentials: typeof CREDENTIALS | null = CREDENTIALS) {
  return new TradeOgreApi(SETTINGS, { limiter: new RateLimiter(1000), logger: silentLogger, credentials });
}

function lastCall(): { url: string; opts: { method: string; headers: Record<string, string>; body?: string } } {
  const call = requestMock.mock.calls[requestMock.mock.calls.length - 1];
  return { url: call?.[0], opts: call?.[1] };
}

beforeEach(() => {
  requestMock.mockReset();
});

describe('TradeOgreApi.getTicker', () => {
  it('parses decimal strings into numbers', async () => {
    requestMock.mockResolvedValueOnce(reply(200, {
      success: true, initialprice: '0.00050000', price: '0.00060000', high: '0.00070000',
      low: '0.00050000', volume: '1234.5', bid: '0.00059000', ask: '0.00061000',
    }));

    const res = await makeApi().getTicker('AEGS-USDT');

    expect(res).toEqual({
      ok: true,
      value: { bid: 0.00059, ask: 0.00061, price: 0.0006, high: 0.0007, low: 0.0005, volume: 1234.5 },
    });
    const { url, opts } = lastCall();
    expect(url).toBe('https://tradeogre.com/api/v1/ticker/AEGS-USDT');
    expect(opts.method).toBe('GET');
    expect(opts.headers['Authorization']).toBeUndefined();
  });

  it('rejects a malformed market without a network call', async () => {
    const res = await makeApi().getTicker('AEGSUSDT');
    expect(res).toEqual({ ok: false, error: 'Invalid market format' });
    expect(requestMock).not.toHaveBeenCalled();
  });

  it('reports a response that fails validation', async () => {
    requestMock.mockResolvedValueOnce(reply(200, { success: true, price: 'abc' }));
    const res = await makeApi().getTicker('AEGS-USDT');
    expect(res.ok).toBe(false);
    expect(!res.ok && res.error.startsWith('Response validation failed')).toBe(true);
  });
});

describe('TradeOgreApi retry', () => {
  it('retries 5xx and succeeds', async () => {
    requestMock
      .mockResolvedValueOnce(reply(502, 'bad gateway'))
      .mockResolvedValueOnce(reply(200, { success: true, balances: { AEGS: '1' } }));

    const res = await makeApi().getBalances();

    expect(res).toEqual({ ok: true, value: { AEGS: { available: 1, held: 0 } } });
    expect(requestMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    requestMock.mockResolvedValue(reply(429, 'slow down'));

    const res = await makeApi().getBalances();

    expect(res).toEqual({ ok: false, error: 'HTTP 429 after 3 attempts' });
    expect(requestMock).toHaveBeenCalledTimes(3);
  });

  it('retries connection errors', async () => {
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    requestMock.mockRejectedValue(reset);

    const res = await makeApi().getBalances();

    expect(res).toEqual({ ok: false, error: 'Connection error (ECONNRESET) after 3 attempts' });
  });

  it('does not retry auth errors', async () => {
    requestMock.mockResolvedValue(reply(401, 'unauthorized'));

    const res = await makeApi().getBalances();

    expect(res).toEqual({ ok: false, error: 'Auth error: HTTP 401' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry other 4xx', async () => {
    requestMock.mockResolvedValue(reply(404, 'not found'));
    const res = await makeApi().getBalances();
    expect(res).toEqual({ ok: false, error: 'HTTP 404: not found' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it('abandons the backoff once cancelled', async () => {
    const cancel = new CancellationToken();
    cancel.cancel('SIGINT');
    requestMock.mockResolvedValue(reply(503, 'unavailable'));
    const api = new TradeOgreApi(
      { ...SETTINGS, retryBaseMs: 10_000 },
      { limiter: new RateLimiter(1000), logger: silentLogger, credentials: CREDENTIALS, cancel },
    );

    const res = await api.getBalances();

    expect(res).toEqual({ ok: false, error: 'HTTP 503 (retry abandoned: stop requested)' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it('keeps cleanup cancels retrying after a stop request', async () => {
    const cancel = new CancellationToken();
    cancel.cancel('SIGINT');
    requestMock
      .mockResolvedValueOnce(reply(503, 'unavailable'))
      .mockResolvedValueOnce(reply(200, { success: true }));
    const api = new TradeOgreApi(SETTINGS, {
      limiter: new RateLimiter(1000),
      logger: silentLogger,
      credentials: CREDENTIALS,
      cancel,
    });

    const res = await api.cancelOrder('all');

    expect(res).toEqual({ ok: true, value: undefined });
    expect(requestMock).toHaveBeenCalledTimes(2);
  });

  it('turns success:false into a failure', async () => {
    requestMock.mockResolvedValue(reply(200, { success: false, error: 'Insufficient funds' }));
    const res = await makeApi().placeOrder('AEGS-USDT', 'buy', 0.001, 100);
    expect(res).toEqual({ ok: false, error: 'Insufficient funds' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });
});

describe('TradeOgreApi order placement', () => {
  it('does not resend an order after a timeout', async () => {
    const timeout = Object.assign(new Error('Headers Timeout Error'), { code: 'UND_ERR_HEADERS_TIMEOUT' });
    requestMock
      .mockRejectedValueOnce(timeout)
      .mockResolvedValueOnce(reply(200, { success: true, uuid: ORDER_ID }));

    const res = await makeApi().placeOrder('AEGS-USDT', 'sell', 0.002, 3000);

    expect(res).toEqual({ ok: false, error: 'Request timeout (outcome unknown, not retried)' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it('does not resend an order after a 5xx', async () => {
    requestMock
      .mockResolvedValueOnce(reply(502, 'bad gateway'))
      .mockResolvedValueOnce(reply(200, { success: true, uuid: ORDER_ID }));

    const res = await makeApi().placeOrder('AEGS-USDT', 'sell', 0.002, 3000);

    expect(res).toEqual({ ok: false, error: 'HTTP 502: bad gateway' });
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it('resends an order the exchange never received', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    requestMock
      .mockRejectedValueOnce(refused)
      .mockResolvedValueOnce(reply(429, 'slow down'))
      .mockResolvedValueOnce(reply(200, { success: true, uuid: ORDER_ID }));

    const res = await makeApi().placeOrder('AEGS-USDT', 'sell', 0.002, 3000);

    expect(res).toEqual({ ok: true, value: { id: ORDER_ID } });
    expect(requestMock).toHaveBeenCalledTimes(3);
  });
});

describe('TradeOgreApi private endpoints', () => {
  it('sends basic auth and the form for a limit sell', async () => {
    requestMock.mockResolvedValueOnce(reply(200, { success: true, uuid: ORDER_ID }));

    await makeApi().placeOrder('AEGS-USDT', 'sell', 0.0018, 3000);

    const { url, opts } = lastCall();
    expect(url).toBe('https://tradeogre.com/api/v1/order/sell');
    expect(opts.method).toBe('POST');
    expect(opts.headers['Authorization']).toBe('Basic dGVzdC1rZXk6dGVzdC1zZWNyZXQ=');
    expect(opts.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(opts.body).toBe('market=AEGS-USDT&quantity=3000.00000000&price=0.00180000');
  });

  it('refuses private calls without credentials', async () => {
    const res = await makeApi(null).getBalances();
    expect(res).toEqual({ ok: false, error: 'API key and secret required for this endpoint' });
    expect(requestMock).not.toHaveBeenCalled();
  });

  it('validates order parameters before sending', async () => {
    const api = makeApi();
    expect(await api.placeOrder('AEGS-USDT', 'buy', 0, 10)).toEqual({ ok: false, error: 'Price must be positive' });
    expect(await api.placeOrder('AEGS-USDT', 'buy', 0.001, -1)).toEqual({ ok: false, error: 'Quantity must be positive' });
    expect(await api.placeOrder('AEGS_USDT', 'buy', 0.001, 1)).toEqual({ ok: false, error: 'Invalid market format' });
    expect(requestMock).not.toHaveBeenCalled();
  });

  it('merges balance totals with available amounts', async () => {
    requestMock.mockResolvedValueOnce(reply(200, {
      success: true,
      balances: { AEGS: '9000.5', USDT: '12' },
      available: { AEGS: '6000.5' },
    }));

    const res = await makeApi().getBalances();

    expect(res).toEqual({
      ok: true,
      value: {
        AEGS: { available: 6000.5, held: 3000 },
        USDT: { available: 12, held: 0 },
      },
    });
  });

  it('normalises open orders keyed by uuid and keeps only the market asked for', async () => {
    requestMock.mockResolvedValueOnce(reply(200, {
      [ORDER_ID]: { type: 'sell', price: '0.00200000', quantity: '3000', market: 'AEGS-USDT', date: 1700000000 },
      'ffffffff-0000-0000-0000-000000000000': { type: 'buy', price: '1', quantity: '1', market: 'BTC-USDT' },
    }));

    const res = await makeApi().getOpenOrders('AEGS-USDT');

    expect(res).toEqual({
      ok: true,
      value: [{ id: ORDER_ID, side: 'sell', price: 0.002, quantity: 3000, market: 'AEGS-USDT' }],
    });
    expect(lastCall().opts.body).toBe('market=AEGS-USDT');
  });

  it('accepts open orders as an array', async () => {
    requestMock.mockResolvedValueOnce(reply(200, [
      { uuid: ORDER_ID, type: 'buy', price: '0.0019', quantity: '3000', market: 'AEGS-USDT' },
    ]));

    const res = await makeApi().getOpenOrders('AEGS-USDT');

    expect(res.ok && res.value.map((o) => o.id)).toEqual([ORDER_ID]);
  });

  it('cancels by uuid or all, and rejects anything else locally', async () => {
    requestMock.mockResolvedValue(reply(200, { success: true }));
    const api = makeApi();

    expect(await api.cancelOrder(ORDER_ID)).toEqual({ ok: true, value: undefined });
    expect(lastCall().opts.body).toBe(`uuid=${ORDER_ID}`);
    expect(await api.cancelOrder('all')).toEqual({ ok: true, value: undefined });
    expect(lastCall().opts.body).toBe('uuid=all');
    expect(await api.cancelOrder('not-a-uuid')).toEqual({ ok: false, error: 'Invalid UUID format' });
    expect(requestMock).toHaveBeenCalledTimes(2);
  });
});

describe('order helpers', () => {
  it('recognises order ids', () => {
    expect(isValidOrderId(ORDER_ID)).toBe(true);
    expect(isValidOrderId(ORDER_ID.toUpperCase())).toBe(true);
    expect(isValidOrderId('dry-run-1')).toBe(false);
  });

  it('validates parameters', () => {
    expect(validateOrderParams('AEGS-USDT', 0.001, 10)).toBeNull();
    expect(validateOrderParams('AEGS-USDT', Number.NaN, 10)).toBe('Price must be positive');
  });

  it('formats to 8 decimals', () => {
    expect(formatDecimal(0.00061)).toBe('0.00061000');
    expect(formatDecimal(3000)).toBe('3000.00000000');
  });
});
