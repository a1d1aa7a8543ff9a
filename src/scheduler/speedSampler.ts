import { setTimeout as delay } from "node:timers/promises";
import { ByteCounter } from "../download";
import { ProgressObserver } from "../observability";

export const DEFAULT_SPEED_INTERVAL_MS = 1_000;

export interface SpeedSamplerOptions {
  intervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
  /** Called with every rate handed to the observer. */
  onRate?: (bytesPerSecond: number) => void;
}

/** Bytes per second over an interval, rounded down. */
export function computeRate(bytes: number, elapsedMs: number): number {
  return Math.floor((bytes * 1000) / Math.max(1, elapsedMs));
}

/**
 * Periodically drains the byte counter into a throughput figure on the progress
 * display. Stops on the first tick after the observer dies.
 */
export class SpeedSampler {
  private readonly counter: ByteCounter;
  private readonly observer: ProgressObserver;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly onRate?: (bytesPerSecond: number) => void;
  private drained = 0;
  private lastRate = 0;

  constructor(counter: ByteCounter, observer: ProgressObserver, options: SpeedSamplerOptions = {}) {
    this.counter = counter;
    this.observer = observer;
    this.intervalMs = options.intervalMs ?? DEFAULT_SPEED_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.onRate = options.onRate;
  }

  /** Every byte drained so far, including the discarded first sample. */
  get totalBytes(): number {
    return this.drained;
  }

  get rate(): number {
    return this.lastRate;
  }

  async run(): Promise<void> {
    // whatever accrued while tasks were being arranged is not steady-state traffic
    this.take();
    if (!this.observer.alive) {
      return;
    }

    while (true) {
      const startedAt = this.now();
      await this.sleep(this.intervalMs);
      const elapsedMs = this.now() - startedAt;
      const bytes = this.take();

      if (!this.observer.alive) {
        return;
      }
      this.lastRate = computeRate(bytes, elapsedMs);
      this.observer.setSpeed(this.lastRate);
      this.onRate?.(this.lastRate);
    }
  }

  private take(): number {
    const bytes = this.counter.drain();
    this.drained += bytes;
    return bytes;
  }
}
