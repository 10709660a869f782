/**
 * Single-value holder with change notification.
 *
 * Writers overwrite; readers wait for a version newer than the one they last
 * saw. There is no queue, so a slow reader simply misses intermediate values.
 */
export class LatestSlot<T> {
  private current: T | undefined;
  private currentVersion = 0;
  private readonly waiters = new Set<() => void>();
  private closed = false;

  /**
   * Replaces the value and wakes every waiting reader. O(1) plus wakeups.
   */
  set(value: T): void {
    if (this.closed) {
      return;
    }
    this.current = value;
    this.currentVersion++;
    this.wakeAll();
  }

  get(): T | undefined {
    return this.current;
  }

  /** Bumped on every set(); 0 means nothing was ever written. */
  get version(): number {
    return this.currentVersion;
  }

  /**
   * Resolves once the version moves past `sinceVersion`, the slot closes or
   * `signal` aborts. An aborted wait leaves nothing behind in the slot.
   */
  waitForChange(sinceVersion: number, signal?: AbortSignal): Promise<void> {
    if (this.closed || this.currentVersion > sinceVersion || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        this.waiters.delete(wake);
        resolve();
      };
      const wake = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.current = undefined;
    this.wakeAll();
  }

  isClosed(): boolean {
    return this.closed;
  }

  get waiting(): number {
    return this.waiters.size;
  }

  private wakeAll(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }
}
