import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";
import type { HookEvent } from "../types/hook-event.js";

/** The responder operations the reconciler drives. HookSocketServer implements it. */
export interface PendingPermissionControl {
  hasPendingPermission(sessionId: string): boolean;
  cancelPendingPermission(toolUseId: string): boolean;
  cancelPendingPermissions(sessionId: string): string[];
}

/**
 * Drops held permission requests that were settled somewhere else, e.g. the
 * user answered in the assistant's own terminal. The hook script then sees
 * EOF without a decision and lets the assistant carry on.
 *
 * - PostToolUse for a held id: the tool already ran.
 * - Stop or UserPromptSubmit while a request is held: the turn moved on.
 */
export class PermissionReconciler {
  private readonly logger: Logger;

  constructor(
    private readonly control: PendingPermissionControl,
    logger?: Logger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  /** Returns the ids of the requests it cancelled. */
  reconcile(event: HookEvent): string[] {
    if (event.event === "PostToolUse" && event.toolUseId) {
      if (!this.control.cancelPendingPermission(event.toolUseId)) return [];
      this.logger.debug?.("Permission resolved outside the relay", {
        sessionId: event.sessionId.slice(0, 8),
        toolUseId: event.toolUseId.slice(0, 12),
      });
      return [event.toolUseId];
    }

    if (
      (event.event === "Stop" || event.event === "UserPromptSubmit") &&
      this.control.hasPendingPermission(event.sessionId)
    ) {
      const cancelled = this.control.cancelPendingPermissions(event.sessionId);
      this.logger.debug?.("Session moved on with permissions pending", {
        sessionId: event.sessionId.slice(0, 8),
        event: event.event,
        cancelled: cancelled.length,
      });
      return cancelled;
    }

    return [];
  }
}
