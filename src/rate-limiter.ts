/**
 * NotionRAG: Sliding-Window Rate Limiter
 *
 * Shared by every request the Notion client issues. At most `limit`
 * acquisitions fall inside any rolling window of `windowMs`.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { sleep } from "./utils.js";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly limit: number = 3,
    readonly windowMs: number = 1000,
    private clock: Clock = systemClock
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Resolves once the caller holds a slot. Callers are served in arrival order.
   */
  acquire(): Promise<void> {
    const slot = this.tail.then(() => this.takeSlot());
    // Keep the chain alive even if a slot wait rejects
    this.tail = slot.catch(() => undefined);
    return slot;
  }

  /** Timestamps currently inside the window, oldest first */
  inFlight(): number[] {
    this.evict(this.clock.now());
    return [...this.timestamps];
  }

  private async takeSlot(): Promise<void> {
    let current = this.clock.now();
    this.evict(current);

    while (this.timestamps.length >= this.limit) {
      const wait = this.windowMs - (current - this.timestamps[0]);
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
      current = this.clock.now();
      this.evict(current);
    }

    this.timestamps.push(current);
  }

  private evict(current: number): void {
    while (this.timestamps.length > 0 && current - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }
}
