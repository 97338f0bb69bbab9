import type { JsonObject } from "../utils/canonical-json.js";

/** Hook event names the emitter sends in the `event` field. */
export const HOOK_EVENT_NAMES = [
  "PreToolUse",
  "PostToolUse",
  "PermissionRequest",
  "UserPromptSubmit",
  "Notification",
  "Stop",
  "SubagentStop",
  "SessionStart",
  "SessionEnd",
  "PreCompact",
] as const;

export type HookEventName = (typeof HOOK_EVENT_NAMES)[number];

/** Event name as received. Names a newer emitter adds are passed through untouched. */
export type HookEventKind = HookEventName | (string & {});

export function isKnownHookEvent(name: string): name is HookEventName {
  return HOOK_EVENT_NAMES.some((known) => known === name);
}

/** Status string carried by a permission request that holds its connection open. */
export const AWAITING_APPROVAL_STATUS = "waiting_for_approval";

/** One lifecycle occurrence reported by the assistant's hook script. */
export interface HookEvent {
  readonly sessionId: string;
  readonly cwd: string;
  readonly event: HookEventKind;
  readonly status: string;
  readonly pid?: number;
  readonly tty?: string;
  readonly tool?: string;
  readonly toolInput?: JsonObject;
  readonly toolUseId?: string;
  readonly notificationType?: string;
  readonly message?: string;
}

/** Wire shape of a hook event (snake_case, as the emitter writes it). */
export interface HookEventPayload {
  session_id: string;
  cwd: string;
  event: HookEventKind;
  status: string;
  pid?: number;
  tty?: string;
  tool?: string;
  tool_input?: JsonObject;
  tool_use_id?: string;
  notification_type?: string;
  message?: string;
}

export const PERMISSION_DECISIONS = ["allow", "deny", "ask"] as const;

export type PermissionDecision = (typeof PERMISSION_DECISIONS)[number];

/** Body written back over a held permission connection. */
export interface HookResponse {
  decision: PermissionDecision;
  reason: string | null;
}

export function isPermissionDecision(value: unknown): value is PermissionDecision {
  return typeof value === "string" && PERMISSION_DECISIONS.some((d) => d === value);
}

/** True for a permission request that waits for a human decision. */
export function expectsResponse(event: HookEvent): boolean {
  return event.event === "PermissionRequest" && event.status === AWAITING_APPROVAL_STATUS;
}

/** Copy of `event` carrying a resolved tool-use id. */
export function withToolUseId(event: HookEvent, toolUseId: string): HookEvent {
  return { ...event, toolUseId };
}
