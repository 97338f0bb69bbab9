import type { HookEvent } from "../types/hook-event.js";

/** A permission request held open until a decision or cancellation. */
export interface PendingPermission<C> {
  readonly sessionId: string;
  readonly toolUseId: string;
  readonly connection: C;
  readonly event: HookEvent;
  readonly receivedAt: number;
}

/**
 * Pending permission requests keyed by tool-use id.
 *
 * Every removal hands the entry to the caller, which becomes the only owner of
 * its connection; an id can therefore be taken at most once.
 */
export class PendingPermissionTable<C> {
  private entries = new Map<string, PendingPermission<C>>();

  /**
   * Add an entry. An existing entry under the same id is removed and
   * returned so the caller can close its connection.
   */
  insert(entry: PendingPermission<C>): PendingPermission<C> | undefined {
    const replaced = this.entries.get(entry.toolUseId);
    // Delete first so the new entry moves to the end of insertion order.
    this.entries.delete(entry.toolUseId);
    this.entries.set(entry.toolUseId, entry);
    return replaced;
  }

  take(toolUseId: string): PendingPermission<C> | undefined {
    const entry = this.entries.get(toolUseId);
    if (entry) this.entries.delete(toolUseId);
    return entry;
  }

  /** Remove the session's most recent request (latest receivedAt, then latest inserted). */
  takeLatestForSession(sessionId: string): PendingPermission<C> | undefined {
    const entry = this.latestForSession(sessionId);
    if (entry) this.entries.delete(entry.toolUseId);
    return entry;
  }

  takeAllForSession(sessionId: string): PendingPermission<C>[] {
    const taken: PendingPermission<C>[] = [];
    for (const [toolUseId, entry] of this.entries) {
      if (entry.sessionId !== sessionId) continue;
      this.entries.delete(toolUseId);
      taken.push(entry);
    }
    return taken;
  }

  takeAll(): PendingPermission<C>[] {
    const taken = [...this.entries.values()];
    this.entries.clear();
    return taken;
  }

  latestForSession(sessionId: string): PendingPermission<C> | undefined {
    let latest: PendingPermission<C> | undefined;
    for (const entry of this.entries.values()) {
      if (entry.sessionId !== sessionId) continue;
      if (!latest || entry.receivedAt >= latest.receivedAt) latest = entry;
    }
    return latest;
  }

  hasSession(sessionId: string): boolean {
    for (const entry of this.entries.values()) {
      if (entry.sessionId === sessionId) return true;
    }
    return false;
  }

  get size(): number {
    return this.entries.size;
  }
}
