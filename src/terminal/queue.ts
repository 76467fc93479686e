interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Unbounded FIFO between one producer and one consumer.
 * `get` waits at most `timeoutMs` for an item and resolves with
 * `undefined` when none arrived.
 */
export class HandoffQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  put(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  get(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (timeoutMs <= 0) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      // An infinite wait only ends through put() or interrupt()
      if (Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Remove and return the head item without waiting, if it passes `accept`
   */
  takeIf(accept: (item: T) => boolean): T | undefined {
    const head = this.items[0];
    if (this.items.length === 0 || !accept(head)) {
      return undefined;
    }
    return this.items.shift();
  }

  /**
   * Release every pending get() with `undefined`
   */
  interrupt(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }
}
