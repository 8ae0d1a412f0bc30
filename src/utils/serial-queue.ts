/**
 * Runs tasks one at a time in submission order. Each task sees the state left
 * by the previous one, so a read-modify-write inside a task is atomic with
 * respect to every other task on the same queue, even across `await`s.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; },
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }
}
