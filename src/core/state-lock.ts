/**
 * StateLock - single-writer discipline for the mind's shared state.
 *
 * Every read-modify-write of the belief store, self-concept, emotions and
 * cycle counter runs as a task on this lock. Tasks run one at a time, in
 * submission order, so an ingestion (violation check + weave) or a cycle
 * is never interleaved with another mutation, including peer merges.
 */
export class StateLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task. Resolves/rejects with the task's own outcome.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // The chain only tracks ordering; outcomes reach the caller through `result`.
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /**
   * Number of queued or running tasks.
   */
  size(): number {
    return this.pending;
  }

  /**
   * Resolves once everything queued so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
