import { delay, type Sleep } from './retry';

export type Clock = {
  now: () => number;
  sleep: Sleep;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: delay,
};

/**
 * Keeps at least `minIntervalMs` between network-affecting actions
 * (navigations, "next page" clicks). Call `wait()` right before each one.
 */
export class RateLimiter {
  private lastActionAt: number | null = null;

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  async wait(): Promise<void> {
    if (this.lastActionAt !== null) {
      const elapsed = this.clock.now() - this.lastActionAt;
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastActionAt = this.clock.now();
  }
}
