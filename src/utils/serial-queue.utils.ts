/**
 * Runs tasks one at a time in submission order. A failing task does not
 * stall the queue; its rejection is returned to the caller only.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; }
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
