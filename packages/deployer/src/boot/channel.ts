interface Waiter<T> {
  resolve: (item: T | null) => void;
  reject: (err: Error) => void;
}

/**
 * Pull-based queue between a push producer (a socket) and a single consumer.
 *
 * `next()` resolves with the next item, with `null` once the producer ended
 * the stream, or rejects once it failed. Items queued before an end or a
 * failure are still delivered first. `close()` ends the stream from the
 * consumer side and settles any pending `next()` with `null`.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: Error | null = null;
  private onClose?: () => void;

  constructor(onClose?: () => void) {
    this.onClose = onClose;
  }

  get closed(): boolean {
    return this.ended;
  }

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(null);
  }

  fail(err: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  next(): Promise<T | null> {
    const item = this.queue.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    const wasOpen = !this.ended;
    this.queue = [];
    this.end();
    if (wasOpen) this.onClose?.();
  }
}
