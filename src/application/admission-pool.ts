import type { Logger } from 'pino';

/**
 * Counting semaphore bounding how many background tasks run at once.
 *
 * `run()` resolves as soon as the task has been admitted, not when it
 * finishes; callers that submit while the pool is saturated wait for a
 * slot. Admission order is FIFO but nothing relies on it.
 */
export class AdmissionPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly limit: number,
    private readonly log: Logger,
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`AdmissionPool limit must be a positive integer, got ${limit}`);
    }
  }

  async run(task: () => Promise<unknown>): Promise<void> {
    await this.acquire();

    void task()
      .catch((err: unknown) => {
        this.log.error({ err }, 'Background task failed');
      })
      .finally(() => {
        this.release();
      });
  }

  /** Resolves once nothing is running or waiting for a slot. */
  idle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get inFlight(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next();
      return;
    }

    this.active--;
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
