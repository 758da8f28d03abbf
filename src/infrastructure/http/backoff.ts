export interface BackoffOptions {
  /** First retry interval, ms. */
  initialInterval: number;
  multiplier: number;
  /** Jitter: the interval is drawn from [i * (1 - f), i * (1 + f)]. */
  randomizationFactor: number;
  /** Cap on a single interval, ms. */
  maxInterval: number;
  /** Give up once elapsed time plus the next interval exceeds this; 0 = never. */
  maxElapsedTime: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialInterval: 500,
  multiplier: 1.5,
  randomizationFactor: 0.5,
  maxInterval: 60_000,
  maxElapsedTime: 10_000,
};

/**
 * Exponential backoff schedule. Elapsed time is measured from
 * construction; use a fresh instance per batch.
 */
export class ExponentialBackoff {
  private readonly options: BackoffOptions;
  private current: number;
  private readonly startedAt: number;

  constructor(
    options: Partial<BackoffOptions> = {},
    private readonly now: () => number = Date.now,
    private readonly random: () => number = Math.random,
  ) {
    this.options = { ...DEFAULT_BACKOFF, ...options };
    this.current = this.options.initialInterval;
    this.startedAt = this.now();
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }

  /** Next wait in ms, or null when retrying should stop. */
  next(): number | null {
    const elapsed = this.elapsed();
    const interval = this.randomize(this.current);

    this.current = Math.min(this.current * this.options.multiplier, this.options.maxInterval);

    const { maxElapsedTime } = this.options;
    if (maxElapsedTime > 0 && elapsed + interval > maxElapsedTime) {
      return null;
    }
    return interval;
  }

  private randomize(interval: number): number {
    const delta = this.options.randomizationFactor * interval;
    const min = interval - delta;
    const max = interval + delta;
    return min + this.random() * (max - min);
  }
}
