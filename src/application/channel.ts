/**
 * Unbounded single-consumer queue used as a buffer's intake.
 *
 * `send` never drops while the channel is open. The consumer polls with
 * `tryReceive()` and parks on `ready()` when there is nothing to do;
 * `wake()` releases a parked consumer without delivering a value, which
 * is how timers and the exit signal get its attention.
 */
export class Channel<T extends object> {
  private readonly queue: T[] = [];
  private head = 0;
  private closed = false;
  private waiter: (() => void) | null = null;

  /** Enqueues a value. Returns false once the channel is closed. */
  send(value: T): boolean {
    if (this.closed) return false;
    this.queue.push(value);
    this.wake();
    return true;
  }

  /** Dequeues the oldest value, in send order. */
  tryReceive(): T | undefined {
    const value = this.queue[this.head];
    if (value === undefined) return undefined;
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return value;
  }

  /** Stops accepting values. Already-queued values stay receivable. */
  close(): void {
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.queue.length - this.head;
  }

  /** Resolves on the next send, close or wake; immediately if values are queued or the channel is closed. */
  ready(): Promise<void> {
    if (this.length > 0 || this.closed) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
