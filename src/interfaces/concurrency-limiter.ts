/**
 * Concurrency limiter interface.
 * Bounds how many units of work (e.g., admitted socket connections) are live at once.
 */
export interface ConcurrencyLimiter {
  /**
   * Claim a slot.
   * Returns a lease, or null if every slot is taken.
   */
  tryAcquire(): SlotLease | null;

  /** Slots currently held. */
  readonly active: number;

  /** Maximum number of slots. */
  readonly capacity: number;
}

/** One held slot. `release()` frees it; later calls are no-ops. */
export interface SlotLease {
  release(): void;
  readonly released: boolean;
}
