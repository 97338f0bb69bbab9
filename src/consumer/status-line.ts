import type { HookEvent } from "../types/hook-event.js";
import type { SessionPhase } from "../types/session-phase.js";

function describePhase(phase: SessionPhase): string {
  if (phase.kind === "waiting_for_approval") return `waiting for approval (${phase.toolName})`;
  return phase.kind.replaceAll("_", " ");
}

/** One terminal line per hook event: `HH:MM:SS session event [tool] → phase ["message"]`. */
export function formatStatusLine(event: HookEvent, phase: SessionPhase, at = new Date()): string {
  const parts = [at.toTimeString().slice(0, 8), event.sessionId.slice(0, 8), event.event];
  if (event.tool) parts.push(event.tool);
  parts.push(`→ ${describePhase(phase)}`);
  if (event.message) parts.push(JSON.stringify(event.message));
  return parts.join(" ");
}
