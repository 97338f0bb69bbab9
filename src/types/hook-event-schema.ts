import { z } from "zod";
import { PayloadError } from "../errors.js";
import type { JsonObject, JsonValue } from "../utils/canonical-json.js";
import {
  type HookEvent,
  type HookEventPayload,
  type HookResponse,
  type PermissionDecision,
} from "./hook-event.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

// Optional fields may be omitted or sent as null; both decode to absent.
export const hookEventPayloadSchema = z.object({
  session_id: z.string().min(1),
  cwd: z.string().default(""),
  event: z.string().min(1),
  status: z.string(),
  pid: z.number().int().nullish(),
  tty: z.string().nullish(),
  tool: z.string().nullish(),
  tool_input: jsonObjectSchema.nullish(),
  tool_use_id: z.string().min(1).nullish(),
  notification_type: z.string().nullish(),
  message: z.string().nullish(),
});

const PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}…` : text;
}

/**
 * Decode one connection's payload into a HookEvent.
 * Throws PayloadError on invalid JSON or a payload that fails the schema.
 */
export function decodeHookEvent(data: Buffer | string): HookEvent {
  const text = typeof data === "string" ? data : data.toString("utf-8");

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PayloadError(`Invalid JSON: ${preview(text)}`, { cause: err });
  }

  const result = hookEventPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new PayloadError(`Invalid hook event (${issues}): ${preview(text)}`, {
      cause: result.error,
    });
  }

  const p = result.data;
  return {
    sessionId: p.session_id,
    cwd: p.cwd,
    event: p.event,
    status: p.status,
    pid: p.pid ?? undefined,
    tty: p.tty ?? undefined,
    tool: p.tool ?? undefined,
    toolInput: p.tool_input ?? undefined,
    toolUseId: p.tool_use_id ?? undefined,
    notificationType: p.notification_type ?? undefined,
    message: p.message ?? undefined,
  };
}

/** Inverse of decodeHookEvent; absent fields are omitted. */
export function encodeHookEvent(event: HookEvent): HookEventPayload {
  const payload: HookEventPayload = {
    session_id: event.sessionId,
    cwd: event.cwd,
    event: event.event,
    status: event.status,
  };
  if (event.pid !== undefined) payload.pid = event.pid;
  if (event.tty !== undefined) payload.tty = event.tty;
  if (event.tool !== undefined) payload.tool = event.tool;
  if (event.toolInput !== undefined) payload.tool_input = event.toolInput;
  if (event.toolUseId !== undefined) payload.tool_use_id = event.toolUseId;
  if (event.notificationType !== undefined) payload.notification_type = event.notificationType;
  if (event.message !== undefined) payload.message = event.message;
  return payload;
}

/** Serialize a decision body; `reason` is always present, null when absent. */
export function encodeHookResponse(decision: PermissionDecision, reason?: string): string {
  const response: HookResponse = { decision, reason: reason ?? null };
  return JSON.stringify(response);
}
