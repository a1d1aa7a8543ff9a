import { AggregateStatus } from "../types";
import { formatBytes, formatElapsed } from "./format";

const BAR_WIDTH = 30;
const CLEAR_LINE = "\r\x1b[2K";

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export interface ProgressDisplayOptions {
  stream?: ProgressStream;
  /** Redraw interval for the elapsed clock. */
  tickMs?: number;
  now?: () => number;
}

/**
 * Non-owning view of a {@link ProgressDisplay}. Dies when the display finishes;
 * `setSpeed` on a dead observer does nothing.
 */
export interface ProgressObserver {
  readonly alive: boolean;
  setSpeed(bytesPerSecond: number): void;
}

export function renderBar(position: number, length: number, width = BAR_WIDTH): string {
  const ratio = length === 0 ? 1 : Math.min(1, position / length);
  const filled = Math.floor(ratio * width);
  if (filled >= width) {
    return "#".repeat(width);
  }
  return `${"#".repeat(filled)}>${"-".repeat(width - filled - 1)}`;
}

export function formatStatus(status: AggregateStatus): string {
  return `[done:${status.done} existed:${status.existed} failed:${status.failed}]`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `[${formatBytes(bytesPerSecond)}/S]`;
}

export class ProgressDisplay {
  private readonly total: number;
  private readonly stream: ProgressStream;
  private readonly tickMs: number;
  private readonly now: () => number;
  private readonly startedAt: number;
  private status: AggregateStatus = { done: 0, existed: 0, failed: 0 };
  private speed = 0;
  private current = 0;
  private ticker: NodeJS.Timeout | undefined;
  private done = false;

  constructor(total: number, options: ProgressDisplayOptions = {}) {
    this.total = total;
    this.stream = options.stream ?? process.stderr;
    this.tickMs = options.tickMs ?? 1_000;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  get interactive(): boolean {
    return this.stream.isTTY === true;
  }

  start(): void {
    if (this.done || this.ticker) {
      return;
    }
    if (this.interactive) {
      this.ticker = setInterval(() => this.redraw(), this.tickMs);
      this.ticker.unref();
    }
    this.redraw();
  }

  setStatus(status: AggregateStatus): void {
    this.status = { ...status };
    this.redraw();
  }

  inc(delta = 1): void {
    this.current = Math.min(this.total, this.current + delta);
    this.redraw();
  }

  /** Prints a diagnostic line above the bar. */
  println(line: string): void {
    if (!this.interactive) {
      this.stream.write(`${line}\n`);
      return;
    }
    this.stream.write(`${CLEAR_LINE}${line}\n`);
    this.redraw();
  }

  observe(): ProgressObserver {
    const display = this;
    return {
      get alive(): boolean {
        return !display.done;
      },
      setSpeed(bytesPerSecond: number): void {
        if (display.done) {
          return;
        }
        display.speed = bytesPerSecond;
        display.redraw();
      },
    };
  }

  renderLine(): string {
    return [
      `[${formatElapsed(this.now() - this.startedAt)}]`,
      formatSpeed(this.speed),
      `[${renderBar(this.current, this.total)}]`,
      formatStatus(this.status),
      `${this.current}/${this.total}`,
    ].join(" ");
  }

  /** Leaves the last rendered line in place. */
  finish(): void {
    if (this.done) {
      return;
    }
    this.redraw();
    this.done = true;
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = undefined;
    }
    if (this.interactive) {
      this.stream.write("\n");
    }
  }

  private redraw(): void {
    if (this.done || !this.interactive) {
      return;
    }
    this.stream.write(`${CLEAR_LINE}${this.renderLine()}`);
  }
}
