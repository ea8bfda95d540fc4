import { request as undiciRequest } from 'undici';
import type { z } from 'zod';
import type { Logger } from '../../logger.js';
import type { RateLimiter } from '../../execution/rate-limiter.js';
import type { CancellationToken } from '../../safety/cancellation.js';
import { err, ok } from '../../types/index.js';
import type { Result } from '../../types/index.js';

const USER_AGENT = 'ogre-grid/0.1';

export interface TransportOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
  log: Logger;
  /** paced before every attempt, retries included */
  limiter: RateLimiter;
  /** cuts a backoff short; left out for cleanup calls */
  cancel?: CancellationToken;
}

/**
 * `idempotent` retries any transient failure. `unsent` retries only failures
 * where the exchange cannot have acted: refused or unresolved connections and
 * 429. Order placement uses `unsent`.
 */
export type RetryPolicy = 'idempotent' | 'unsent';

export interface RequestSpec {
  method: 'GET' | 'POST';
  path: string;
  form?: Record<string, string>;
  authorization?: string;
  retry?: RetryPolicy;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isAuthError(status: number): boolean {
  return status === 401 || status === 403;
}

function errorCode(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

/** the connection was never established, so the request was not received */
function neverSent(e: unknown): boolean {
  const code = errorCode(e);
  return code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'UND_ERR_CONNECT_TIMEOUT';
}

function describeFailure(e: unknown): string {
  const code = errorCode(e);
  if (
    (e instanceof Error && e.name === 'TimeoutError') ||
    code === 'UND_ERR_HEADERS_TIMEOUT' ||
    code === 'UND_ERR_BODY_TIMEOUT' ||
    code === 'UND_ERR_CONNECT_TIMEOUT'
  ) {
    return 'Request timeout';
  }
  if (code === 'ECONNRESET' || code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'UND_ERR_SOCKET') {
    return `Connection error (${code})`;
  }
  return `Request failed: ${e instanceof Error ? e.message : String(e)}`;
}

function truncate(text: string, max: number = 200): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function buildUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

async function backoff(ms: number, cancel: CancellationToken | undefined): Promise<boolean> {
  if (cancel) return cancel.sleep(ms);
  await new Promise((r) => setTimeout(r, ms));
  return true;
}

/**
 * One logical call. Under the `idempotent` policy timeouts, connection errors,
 * 429 and 5xx are retried with exponential backoff (retryBaseMs * 2^n); under
 * `unsent` only refused connections and 429 are. 401/403 and other 4xx never
 * are. A `{ success: false, error }` body is a failure.
 */
export async function request(spec: RequestSpec, opts: TransportOptions): Promise<Result<unknown>> {
  const url = buildUrl(opts.baseUrl, spec.path);
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
  };
  if (spec.authorization) headers['Authorization'] = spec.authorization;

  let body: string | undefined;
  if (spec.form) {
    body = new URLSearchParams(spec.form).toString();
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
  }

  const idempotent = (spec.retry ?? 'idempotent') === 'idempotent';
  let lastError = 'Request failed';
  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = opts.retryBaseMs * Math.pow(2, attempt - 1);
      opts.log.warn({ path: spec.path, attempt, delay, lastError }, 'Retryable failure, backing off');
      const completed = await backoff(delay, opts.cancel);
      if (!completed) {
        return err(`${lastError} (retry abandoned: stop requested)`);
      }
    }

    await opts.limiter.waitIfNeeded();

    let statusCode: number;
    let text: string;
    try {
      const res = await undiciRequest(url, {
        method: spec.method,
        headers,
        body,
        bodyTimeout: opts.timeoutMs,
        headersTimeout: opts.timeoutMs,
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (e) {
      lastError = describeFailure(e);
      if (idempotent || neverSent(e)) continue;
      opts.log.error({ path: spec.path, error: lastError }, 'Request outcome unknown, not retried');
      return err(`${lastError} (outcome unknown, not retried)`);
    }

    if (isAuthError(statusCode)) {
      opts.log.error({ statusCode, path: spec.path }, 'Auth error, check API key file');
      return err(`Auth error: HTTP ${statusCode}`);
    }
    if (isRetryableStatus(statusCode)) {
      lastError = `HTTP ${statusCode}`;
      if (idempotent || statusCode === 429) continue;
      return err(`${lastError}: ${truncate(text)}`);
    }
    if (statusCode !== 200) {
      return err(`HTTP ${statusCode}: ${truncate(text)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return err(`Invalid JSON response: ${truncate(text)}`);
    }

    if (json && typeof json === 'object' && 'success' in json && json.success === false) {
      const message = 'error' in json && typeof json.error === 'string' ? json.error : 'Unknown API error';
      return err(message);
    }

    opts.log.debug({ method: spec.method, path: spec.path }, 'Request ok');
    return ok(json);
  }

  return err(`${lastError} after ${opts.maxRetries + 1} attempts`);
}

/**
 * request + zod validation. Validation failures are logged with the raw body
 * and returned as failures; they are not retried.
 */
export async function requestValidated<T>(
  spec: RequestSpec,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: TransportOptions,
): Promise<Result<T>> {
  const raw = await request(spec, opts);
  if (!raw.ok) return raw;
  const parsed = schema.safeParse(raw.value);
  if (parsed.success) return ok(parsed.data);
  opts.log.warn(
    { path: spec.path, raw: truncate(JSON.stringify(raw.value), 500) },
    'Response validation failed; raw dump',
  );
  return err(`Response validation failed: ${parsed.error.message}`);
}
