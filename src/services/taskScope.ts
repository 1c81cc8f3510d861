/**
 * Owns a group of concurrent tasks. `cancel()` raises the cooperative token
 * that tasks poll; `abort()` additionally fires the signal handed to every
 * task so in-flight requests are torn down.
 */
export class TaskScope {
  private readonly cancellation = new AbortController();
  private readonly teardown = new AbortController();
  private readonly running = new Set<Promise<void>>();
  private readonly failures: unknown[] = [];

  get cancelled(): boolean {
    return this.cancellation.signal.aborted;
  }

  get aborted(): boolean {
    return this.teardown.signal.aborted;
  }

  get size(): number {
    return this.running.size;
  }

  /** Errors thrown by tasks, in the order they settled. */
  get errors(): ReadonlyArray<unknown> {
    return this.failures;
  }

  spawn(task: (signal: AbortSignal) => Promise<void>): boolean {
    if (this.cancelled) {
      return false;
    }
    const signal = this.teardown.signal;
    const tracked: Promise<void> = Promise.resolve()
      .then(() => task(signal))
      .then(undefined, (error: unknown) => {
        this.failures.push(error);
      })
      .finally(() => {
        this.running.delete(tracked);
      });
    this.running.add(tracked);
    return true;
  }

  cancel(): void {
    this.cancellation.abort();
  }

  abort(): void {
    this.cancellation.abort();
    this.teardown.abort();
  }

  async join(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  /** Resolves `true` when every task settled within `timeoutMs`. */
  async joinWithin(timeoutMs: number): Promise<boolean> {
    let handle: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      handle = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.join().then(() => true), expired]);
    } finally {
      clearTimeout(handle);
    }
  }
}
