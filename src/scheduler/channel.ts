interface Waiter<T> {
  resolve(value: T): void;
  reject(error: unknown): void;
}

/**
 * Unbounded single-consumer channel. Messages are received in the order they
 * were sent; after `fail`, every pending and future `receive` rejects.
 */
export class Channel<T extends object> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private failure: { error: unknown } | undefined;

  send(value: T): void {
    if (this.failure) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
      return;
    }
    this.buffer.push(value);
  }

  receive(): Promise<T> {
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve(value);
      }
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  fail(error: unknown): void {
    if (this.failure) {
      return;
    }
    this.failure = { error };
    this.buffer.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }
}
