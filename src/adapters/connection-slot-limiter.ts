import type { ConcurrencyLimiter, SlotLease } from "../interfaces/concurrency-limiter.js";

/**
 * Counting limiter for admitted connections.
 *
 * The count is only ever decremented through a lease, and each lease
 * decrements at most once, so a connection closed on several paths cannot
 * free a slot it does not own.
 */
export class ConnectionSlotLimiter implements ConcurrencyLimiter {
  private held = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get active(): number {
    return this.held;
  }

  tryAcquire(): SlotLease | null {
    if (this.held >= this.capacity) return null;
    this.held++;

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.held = Math.max(0, this.held - 1);
      },
      get released() {
        return released;
      },
    };
  }
}
