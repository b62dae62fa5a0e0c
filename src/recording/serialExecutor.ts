/**
 * Runs tasks one at a time in submission order. A task that rejects does not
 * stall the ones queued behind it.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  get pending(): number {
    return this.queued;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.queued += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.queued -= 1;
      },
      () => {
        this.queued -= 1;
      }
    );
    return result;
  }
}
