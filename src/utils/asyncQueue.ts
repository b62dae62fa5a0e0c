interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout;
  cleanup: () => void;
}

/**
 * Unbounded FIFO with a bounded-wait `poll`. Any number of producers may
 * push; reads are meant for a single consumer loop that re-checks its
 * cancellation state every time `poll` returns.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /** Resolves with the next item, or undefined after `timeoutMs` or on abort. */
  poll(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => {
      const onAbort = () => {
        waiter.cleanup();
        this.removeWaiter(waiter);
        resolve(undefined);
      };
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          waiter.cleanup();
          this.removeWaiter(waiter);
          resolve(undefined);
        }, timeoutMs),
        cleanup: () => {
          clearTimeout(waiter.timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  clear(): void {
    this.items.length = 0;
  }

  private removeWaiter(waiter: Waiter<T>) {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }
}
