/**
 * Shared test fixtures for hook events.
 *
 * Factories return a complete HookEvent; callers spread overrides on top.
 */

import type { HookEvent } from "../types/hook-event.js";
import { AWAITING_APPROVAL_STATUS } from "../types/hook-event.js";

export function hookEvent(overrides: Partial<HookEvent> = {}): HookEvent {
  return {
    sessionId: "sess-1",
    cwd: "/tmp/project",
    event: "Notification",
    status: "idle",
    ...overrides,
  };
}

export function preToolUse(overrides: Partial<HookEvent> = {}): HookEvent {
  return hookEvent({
    event: "PreToolUse",
    status: "running_tool",
    tool: "Bash",
    toolInput: { command: "ls" },
    ...overrides,
  });
}

export function permissionRequest(overrides: Partial<HookEvent> = {}): HookEvent {
  return hookEvent({
    event: "PermissionRequest",
    status: AWAITING_APPROVAL_STATUS,
    tool: "Bash",
    toolInput: { command: "ls" },
    ...overrides,
  });
}
