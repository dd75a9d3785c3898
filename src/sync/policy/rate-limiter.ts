import { setTimeout as sleep } from "timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => sleep(ms),
};

export interface RateLimiter {
  /** Resolves once the caller may send its next request. */
  acquire(): Promise<void>;
}

/**
 * Keeps at least `minIntervalMs` between consecutive requests to one service.
 * Callers queue in order; nothing is dropped.
 */
export class IntervalRateLimiter implements RateLimiter {
  private nextAt = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  acquire(): Promise<void> {
    const turn = this.queue.then(async () => {
      const wait = this.nextAt - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
      this.nextAt = this.clock.now() + this.minIntervalMs;
    });
    this.queue = turn.catch(() => undefined);
    return turn;
  }
}
