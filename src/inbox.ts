interface Waiter<T> {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout;
}

/** Single-consumer queue; `next` resolves with null on timeout or close. */
export class Inbox<T> {
  private readonly items: T[] = [];
  private waiter?: Waiter<T>;
  private closed = false;

  get size() {
    return this.items.length;
  }

  push(item: T) {
    if (this.closed) return;
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      clearTimeout(timer);
      this.waiter = undefined;
      resolve(item);
      return;
    }
    this.items.push(item);
  }

  next(timeoutMs: number): Promise<T | null> {
    const queued = this.items.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error('Inbox already has a pending reader'));

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(null);
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  close() {
    this.closed = true;
    this.items.length = 0;
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      clearTimeout(timer);
      this.waiter = undefined;
      resolve(null);
    }
  }
}
