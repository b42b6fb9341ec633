/**
 * Runs async tasks one at a time, in submission order. A task starts only
 * after the previous one settled, so a read-then-write sequence inside a task
 * never interleaves with another task's. A rejected task does not stall the
 * queue; its rejection is returned to its own caller only.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Tasks submitted and not yet settled, including the running one. */
  get size(): number {
    return this.pending;
  }
}
