/**
 * FIFO exclusive lock for async callbacks.
 *
 * Callers queue behind the tail promise; a rejected callback still releases
 * the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(() => fn());
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
