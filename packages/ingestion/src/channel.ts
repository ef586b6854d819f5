interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Bounded multi-producer, single-consumer channel.
 *
 * `send` resolves once the value is buffered (waiting while the buffer is full)
 * and resolves `false` when the channel was closed first. The consumer reads
 * with `for await`; iteration ends after `close()` once the buffer is drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private waitingReceiver: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  send(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);

    if (this.waitingReceiver) {
      const receive = this.waitingReceiver;
      this.waitingReceiver = null;
      receive({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  /**
   * Stop accepting values. Buffered values stay readable; senders blocked on a
   * full buffer are released with `false`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const pending of this.pendingSends.splice(0)) {
      pending.resolve(false);
    }

    if (this.waitingReceiver && this.buffer.length === 0) {
      const receive = this.waitingReceiver;
      this.waitingReceiver = null;
      receive({ value: undefined, done: true });
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      this.admitPendingSend();
      return Promise.resolve(value === undefined ? { value: undefined, done: true } : { value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waitingReceiver = resolve;
    });
  }

  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (!pending) return;
    this.buffer.push(pending.value);
    pending.resolve(true);
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
