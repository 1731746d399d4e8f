/**
 * Runs async tasks one at a time, in submission order.
 * A task starts only after the previous one has settled, so a read-modify-write inside one task
 * never interleaves with another.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.queued += 1;
    const result = this.tail.then(() => task());
    // The chain continues whether the task resolved or rejected; the caller gets the rejection.
    this.tail = result.then(
      () => this.settled(),
      () => this.settled()
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  /** Tasks submitted and not yet settled. */
  size(): number {
    return this.queued;
  }

  private settled(): void {
    this.queued -= 1;
  }
}
