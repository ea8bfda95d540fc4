const WINDOW_MS = 60_000;

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onThrottle?: (waitMs: number) => void;
}

/**
 * Sliding-window rate limiter: at most `callsPerMinute` calls in any
 * trailing 60 s window.
 */
export class RateLimiter {
  private readonly calls: number[] = [];
  private readonly maxCalls: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onThrottle: ((waitMs: number) => void) | undefined;

  constructor(callsPerMinute: number = 60, options: RateLimiterOptions = {}) {
    if (!Number.isInteger(callsPerMinute) || callsPerMinute < 1) {
      throw new Error(`callsPerMinute must be a positive integer, got ${callsPerMinute}`);
    }
    this.maxCalls = callsPerMinute;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.onThrottle = options.onThrottle;
  }

  /**
   * Call immediately before every outbound request.
   * Returns at once while under the ceiling, otherwise sleeps until the
   * oldest call leaves the window.
   */
  async waitIfNeeded(): Promise<void> {
    this.prune(this.now());

    const oldest = this.calls[0];
    if (this.calls.length >= this.maxCalls && oldest !== undefined) {
      const waitMs = WINDOW_MS - (this.now() - oldest);
      if (waitMs > 0) {
        this.onThrottle?.(waitMs);
        await this.sleep(waitMs);
      }
      this.prune(this.now());
    }

    this.calls.push(this.now());
  }

  /** calls currently inside the window */
  get inWindow(): number {
    this.prune(this.now());
    return this.calls.length;
  }

  private prune(now: number): void {
    while (this.calls.length > 0) {
      const first = this.calls[0];
      if (first === undefined || now - first < WINDOW_MS) break;
      this.calls.shift();
    }
    while (this.calls.length > this.maxCalls) {
      this.calls.shift();
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
