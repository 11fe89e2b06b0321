/**
 * Promise-chained mutual exclusion.
 *
 * Callers queue in FIFO order; each critical section starts only after the
 * previous one settled, whether it resolved or threw.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a critical section is running or queued */
  get locked(): boolean {
    return this.pending > 0;
  }

  withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return run;
  }
}
