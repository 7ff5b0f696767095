type Waiter<T> = (item: T | undefined) => void;

/**
 * FIFO of pending work with a bounded-wait pull, so a consumer can wake up
 * periodically and check whether it should stop.
 */
export class TaskQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  pull(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  /** Drops everything still queued and returns how many items were dropped. */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  /** Wakes every pending pull with `undefined`. */
  release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(undefined);
  }

  get size(): number {
    return this.items.length;
  }
}

/** One producer pushes, one consumer drains everything pending without waiting. */
export class StatusChannel<T> {
  private buffer: T[] = [];

  push(message: T): void {
    this.buffer.push(message);
  }

  drain(): T[] {
    const messages = this.buffer;
    this.buffer = [];
    return messages;
  }

  get pending(): number {
    return this.buffer.length;
  }
}
