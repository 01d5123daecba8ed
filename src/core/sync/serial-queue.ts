/**
 * Single-writer queue.
 *
 * Tasks run one at a time in submission order. A failing task rejects only its
 * own caller; the queue moves on to the next task.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Run a task once every previously submitted task has settled
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.waiting += 1;
    const result = this.tail.then(() => {
      this.waiting -= 1;
      return task();
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Number of tasks submitted but not yet started
   */
  get depth(): number {
    return this.waiting;
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  async drain(): Promise<void> {
    await this.tail;
  }
}
