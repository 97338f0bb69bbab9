import type { JsonObject } from "../utils/canonical-json.js";
import type { HookEvent } from "./hook-event.js";

/** What a session is doing, as far as one hook event tells. */
export type SessionPhase =
  | { kind: "idle" }
  | { kind: "processing" }
  | { kind: "waiting_for_input" }
  | {
      kind: "waiting_for_approval";
      toolName: string;
      toolUseId?: string;
      toolInput?: JsonObject;
    }
  | { kind: "compacting" }
  | { kind: "ended" };

export type SessionPhaseKind = SessionPhase["kind"];

export function sessionPhaseOf(event: HookEvent): SessionPhase {
  if (event.event === "SessionEnd") return { kind: "ended" };
  if (event.event === "PreCompact") return { kind: "compacting" };

  switch (event.status) {
    case "waiting_for_approval":
      return {
        kind: "waiting_for_approval",
        toolName: event.tool ?? "unknown",
        toolUseId: event.toolUseId,
        toolInput: event.toolInput,
      };
    case "waiting_for_input":
      return { kind: "waiting_for_input" };
    case "running_tool":
    case "processing":
    case "starting":
      return { kind: "processing" };
    case "compacting":
      return { kind: "compacting" };
    default:
      return { kind: "idle" };
  }
}
