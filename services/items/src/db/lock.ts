/**
 * Exclusive lock built on a promise chain.
 * Callers queue in arrival order; a rejected task does not block the ones after it.
 */
export class StoreLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get waiting(): number {
    return this.pending;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
