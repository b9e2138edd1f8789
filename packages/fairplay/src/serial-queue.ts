/**
 * FIFO task queue with a concurrency of one.
 *
 * A task starts only after the previous one settled, whatever its outcome. A
 * rejected task rejects the promise returned by its own `enqueue` call and
 * does not affect later tasks.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.settle(),
      () => this.settle()
    );
    return run;
  }

  /** Number of tasks queued or running */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task enqueued so far has settled */
  onIdle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
