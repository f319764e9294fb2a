/**
 * Counting semaphore bounding how many async tasks run at once.
 */
export class Semaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error('Semaphore permits must be a positive integer');
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /** Hands the permit straight to the oldest waiter, if any. */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.permits++;
  }

  available(): number {
    return this.permits;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep input order. The first rejection is rethrown at once and no
 * queued call starts after it; calls already running are left to the caller
 * to cancel.
 */
export function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const semaphore = new Semaphore(concurrency);
  const state: { failure?: { error: unknown } } = {};

  return Promise.all(
    items.map((item, index) =>
      semaphore.runExclusive(async () => {
        if (state.failure) throw state.failure.error;
        try {
          return await fn(item, index);
        } catch (error) {
          state.failure ??= { error };
          throw error;
        }
      })
    )
  );
}
