import { describe, expect, it } from "vitest";
import { hookEvent } from "../testing/fixtures.js";
import { sessionPhaseOf } from "./session-phase.js";

describe("sessionPhaseOf", () => {
  it("maps SessionEnd to ended regardless of status", () => {
    expect(sessionPhaseOf(hookEvent({ event: "SessionEnd", status: "processing" }))).toEqual({
      kind: "ended",
    });
  });

  it("maps PreCompact to compacting regardless of status", () => {
    expect(sessionPhaseOf(hookEvent({ event: "PreCompact", status: "idle" }))).toEqual({
      kind: "compacting",
    });
  });

  it("carries tool details for a permission request", () => {
    const phase = sessionPhaseOf(
      hookEvent({
        event: "PermissionRequest",
        status: "waiting_for_approval",
        tool: "Bash",
        toolInput: { command: "ls" },
        toolUseId: "toolu_1",
      }),
    );
    expect(phase).toEqual({
      kind: "waiting_for_approval",
      toolName: "Bash",
      toolUseId: "toolu_1",
      toolInput: { command: "ls" },
    });
  });

  it("falls back to an unknown tool name", () => {
    const phase = sessionPhaseOf(
      hookEvent({ event: "PermissionRequest", status: "waiting_for_approval" }),
    );
    expect(phase).toEqual({
      kind: "waiting_for_approval",
      toolName: "unknown",
      toolUseId: undefined,
      toolInput: undefined,
    });
  });

  it.each([
    ["running_tool", "processing"],
    ["processing", "processing"],
    ["starting", "processing"],
    ["waiting_for_input", "waiting_for_input"],
    ["compacting", "compacting"],
    ["ended", "idle"],
    ["something_new", "idle"],
  ])("status %s → %s", (status, kind) => {
    expect(sessionPhaseOf(hookEvent({ event: "Notification", status })).kind).toBe(kind);
  });
});
