type Waiter<T> = {
  resolve: (item: T | undefined) => void;
  timer?: NodeJS.Timeout;
};

/**
 * FIFO queue between the transport callbacks (producers) and the automation
 * loop (single consumer). `pop` waits up to `timeoutMs` for an item and
 * resolves `undefined` when none arrives.
 */
export class MessageQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  tryPop(): T | undefined {
    return this.items.shift();
  }

  pop(timeoutMs = 0): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (timeoutMs <= 0) return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve };
      waiter.timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      }, timeoutMs);
      // don't keep the process alive just for an idle consumer
      waiter.timer.unref();
      this.waiters.push(waiter);
    });
  }

  get size(): number {
    return this.items.length;
  }
}
