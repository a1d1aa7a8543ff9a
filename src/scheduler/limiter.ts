import os from "node:os";
import pLimit from "p-limit";

/** Host parallelism, never below 1. */
export function resolveParallelism(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Fixed-capacity permit pool. A task holds its permit for as long as the promise
 * it returns is pending, and gives it back on every exit path.
 */
export class ConcurrencyLimiter {
  readonly capacity: number;
  private readonly limit: ReturnType<typeof pLimit>;
  private peakActive = 0;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.limit = pLimit(this.capacity);
  }

  get pending(): number {
    return this.limit.pendingCount;
  }

  /** Highest number of permits held at the same time. */
  get peak(): number {
    return this.peakActive;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(() => {
      this.peakActive = Math.max(this.peakActive, this.limit.activeCount);
      return task();
    });
  }

  /** Drops tasks still waiting for a permit. Their promises never settle. */
  clearQueue(): void {
    this.limit.clearQueue();
  }
}
