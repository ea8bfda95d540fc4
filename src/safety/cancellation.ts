/**
 * Cooperative stop flag.
 * Checked at the top of every loop iteration, before every placement and
 * between retry attempts. `sleep` wakes early once cancelled.
 */
export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | null = null;
  private readonly waiters = new Set<() => void>();

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  cancel(reason: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    for (const wake of this.waiters) wake();
    this.waiters.clear();
  }

  /**
   * Resolves after `ms`, or immediately on cancellation.
   * @returns false if woken by cancellation
   */
  sleep(ms: number): Promise<boolean> {
    if (this.cancelled) return Promise.resolve(false);
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(true);
      }, ms);
      this.waiters.add(wake);
    });
  }
}
