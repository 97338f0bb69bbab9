/**
 * Tool-use id correlation cache.
 *
 * PermissionRequest events arrive without a tool_use_id; the PreToolUse event
 * for the same call carried one. Ids are queued per (session, tool, input) as
 * PreToolUse events arrive and consumed FIFO by matching permission requests,
 * so identical calls issued back to back are matched in call order.
 *
 * Entry lifecycle: cached → consumed (pop) | expired (sweep) | purged (session end).
 */

import { canonicalStringify, type JsonObject } from "../utils/canonical-json.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CachedToolUseId {
  toolUseId: string;
  cachedAt: number;
}

/** The event fields a correlation key is derived from. HookEvent satisfies this. */
export interface CorrelationSubject {
  sessionId: string;
  tool?: string;
  toolInput?: JsonObject;
}

interface KeyQueue {
  sessionId: string;
  entries: CachedToolUseId[];
}

export interface ToolUseIdCacheOptions {
  /** Age at which an unconsumed entry is dropped by sweep(). */
  ttlMs: number;
}

/** Deterministic key: identical arguments built in any key order map to the same string. */
export function correlationKey(subject: CorrelationSubject): string {
  return canonicalStringify([subject.sessionId, subject.tool ?? "unknown", subject.toolInput ?? {}]);
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export class ToolUseIdCache {
  private queues = new Map<string, KeyQueue>();
  private readonly ttlMs: number;

  constructor(options: ToolUseIdCacheOptions) {
    this.ttlMs = options.ttlMs;
  }

  /** Append an id at the tail of its key's queue. */
  push(subject: CorrelationSubject, toolUseId: string, now = Date.now()): void {
    const key = correlationKey(subject);
    const queue = this.queues.get(key);
    const entry = { toolUseId, cachedAt: now };
    if (queue) {
      queue.entries.push(entry);
    } else {
      this.queues.set(key, { sessionId: subject.sessionId, entries: [entry] });
    }
  }

  /** Remove and return the oldest id for the subject's key. Drained keys are deleted. */
  pop(subject: CorrelationSubject): string | undefined {
    const key = correlationKey(subject);
    const queue = this.queues.get(key);
    if (!queue) return undefined;

    const entry = queue.entries.shift();
    if (queue.entries.length === 0) this.queues.delete(key);
    return entry?.toolUseId;
  }

  /** Drop every key belonging to the session. Returns the number of entries removed. */
  purgeSession(sessionId: string): number {
    let removed = 0;
    for (const [key, queue] of this.queues) {
      if (queue.sessionId !== sessionId) continue;
      removed += queue.entries.length;
      this.queues.delete(key);
    }
    return removed;
  }

  /** Drop entries aged `ttlMs` or more. Returns the number of entries removed. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, queue] of this.queues) {
      const fresh = queue.entries.filter((entry) => now - entry.cachedAt < this.ttlMs);
      removed += queue.entries.length - fresh.length;
      if (fresh.length === 0) {
        this.queues.delete(key);
      } else {
        queue.entries = fresh;
      }
    }
    return removed;
  }

  clear(): void {
    this.queues.clear();
  }

  /** Total cached ids across all keys. */
  get size(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.entries.length;
    return total;
  }

  get keyCount(): number {
    return this.queues.size;
  }
}
