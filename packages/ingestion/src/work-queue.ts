/**
 * Shared URL source for the worker pool. Wraps the enumerator so that any
 * number of workers can `take()` concurrently; each URL is handed out once.
 *
 * An enumerator failure ends the queue for every worker and is kept in
 * `failure` for the runner to rethrow once the pool has drained.
 */
export class WorkQueue {
  private exhausted = false;
  private taken = 0;
  private error: unknown;

  constructor(
    private readonly iterator: AsyncIterator<string, void, undefined>,
    private readonly signal: AbortSignal,
  ) {}

  get takenCount(): number {
    return this.taken;
  }

  get failure(): unknown {
    return this.error;
  }

  async take(): Promise<string | undefined> {
    if (this.exhausted || this.signal.aborted) return undefined;

    let next: IteratorResult<string, void>;
    try {
      next = await this.iterator.next();
    } catch (error) {
      this.exhausted = true;
      this.error ??= error;
      return undefined;
    }

    if (next.done) {
      this.exhausted = true;
      return undefined;
    }
    // Pulled while the run was being stopped: never dispatched.
    if (this.signal.aborted) return undefined;

    this.taken += 1;
    return next.value;
  }
}
