import { InvariantViolationError } from "../core/errors";

/**
 * Bytes written by in-flight transfers since the last drain.
 *
 * Transfers only `add`; the speed sampler is the only caller of `drain`.
 * Once the owner closes the counter, further adds are ignored.
 */
export class ByteCounter {
  private value = 0;
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  /** Current value, without resetting it. */
  peek(): number {
    return this.value;
  }

  add(bytes: number): void {
    if (this.isClosed) {
      return;
    }
    const next = this.value + bytes;
    if (!Number.isSafeInteger(next)) {
      throw new InvariantViolationError(`byte counter overflow: ${this.value} + ${bytes}`);
    }
    this.value = next;
  }

  /** Returns the accumulated bytes and resets the counter to zero. */
  drain(): number {
    const drained = this.value;
    this.value = 0;
    return drained;
  }

  close(): void {
    this.isClosed = true;
    this.value = 0;
  }
}
