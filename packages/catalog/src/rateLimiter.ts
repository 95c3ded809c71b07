/**
 * Rate Limiter
 *
 * Spaces catalog calls at least `minIntervalMs` apart. One instance is shared
 * by every pipeline running in the same process; slots are reserved
 * synchronously so concurrent callers never get the same start time.
 */

import { sleep } from '@chaptify/utils';

export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Wait for the next free slot. Returns the time waited in milliseconds.
   */
  async acquire(): Promise<number> {
    const current = this.now();
    const startAt = Math.max(current, this.nextSlot);
    this.nextSlot = startAt + this.minIntervalMs;

    const wait = startAt - current;
    await sleep(wait);
    return wait;
  }
}
