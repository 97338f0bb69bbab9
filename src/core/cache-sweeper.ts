import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

export interface SweepableCache {
  sweep(now?: number): number;
  readonly size: number;
}

export interface CacheSweeperDeps {
  cache: SweepableCache;
  intervalMs: number;
  logger?: Logger;
  /** Clock the cache was stamped with. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * Periodically drops expired correlation entries. Tool calls that are
 * auto-approved never produce a permission request, so their cached ids are
 * only ever removed here.
 */
export class CacheSweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private deps: CacheSweeperDeps) {
    this.logger = deps.logger ?? noopLogger;
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweepNow(), this.deps.intervalMs);
    this.timer.unref();
    this.logger.debug?.("Cache sweeper started", { intervalMs: this.deps.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Run one sweep immediately. Returns the number of entries removed. */
  sweepNow(): number {
    const removed = this.deps.cache.sweep(this.now());
    if (removed > 0) {
      this.logger.debug?.(`Cache sweep removed ${removed} stale entries`, {
        remaining: this.deps.cache.size,
      });
    }
    return removed;
  }
}
