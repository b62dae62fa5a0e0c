/**
 * A value that is set exactly once and can be awaited with a timeout.
 * Later `set` calls are ignored.
 */
export class OneShot<T> {
  private settled = false;
  private resolveValue: (value: T) => void = () => undefined;
  private readonly promise = new Promise<T>((resolve) => {
    this.resolveValue = resolve;
  });

  get isSet(): boolean {
    return this.settled;
  }

  set(value: T): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    this.resolveValue(value);
    return true;
  }

  /** Resolves with the value, or undefined if it is not set within `timeoutMs`. */
  async wait(timeoutMs: number): Promise<T | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), Math.max(0, timeoutMs));
      timer.unref?.();
    });
    try {
      return await Promise.race([this.promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
