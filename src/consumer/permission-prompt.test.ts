import { PassThrough, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { permissionRequest } from "../testing/fixtures.js";
import { PermissionPrompt, type PermissionResponder } from "./permission-prompt.js";

function captureOutput() {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

describe("PermissionPrompt", () => {
  let input: PassThrough;
  let output: ReturnType<typeof captureOutput>;
  let respond: Mock<PermissionResponder["respondToPermission"]>;
  let prompt: PermissionPrompt;

  beforeEach(() => {
    input = new PassThrough();
    output = captureOutput();
    respond = vi.fn<PermissionResponder["respondToPermission"]>().mockResolvedValue(true);
    prompt = new PermissionPrompt({ respondToPermission: respond }, { input, output: output.stream });
  });

  afterEach(() => {
    prompt.close();
  });

  it("renders the tool, session and input, then asks", async () => {
    prompt.showRequest(
      permissionRequest({ sessionId: "abcdef123456", toolUseId: "t1", toolInput: { cmd: "ls" } }),
    );

    await vi.waitFor(() =>
      expect(output.text()).toBe(
        '\n[permission] Bash (session abcdef12)\n{\n  "cmd": "ls"\n}\n[a]llow / [d]eny / as[k] > ',
      ),
    );
  });

  it.each([
    ["a", "allow"],
    ["allow", "allow"],
    ["D", "deny"],
    [" k ", "ask"],
  ])("answers %j with %s", async (line, decision) => {
    prompt.showRequest(permissionRequest({ toolUseId: "t1" }));

    input.write(`${line}\n`);

    await vi.waitFor(() => expect(respond).toHaveBeenCalledWith("t1", decision));
    await vi.waitFor(() => expect(output.text()).toContain(`  ${decision} → Bash\n`));
  });

  it("asks again after an unrecognised answer", async () => {
    prompt.showRequest(permissionRequest({ toolUseId: "t1" }));

    input.write("maybe\n");

    await vi.waitFor(() =>
      expect(output.text().endsWith('  unrecognised answer: "maybe"\n[a]llow / [d]eny / as[k] > ')).toBe(
        true,
      ),
    );
    expect(respond).not.toHaveBeenCalled();
    expect(prompt.outstanding).toBe(1);
  });

  it("asks queued requests one at a time", async () => {
    prompt.showRequest(permissionRequest({ toolUseId: "t1", tool: "Bash" }));
    prompt.showRequest(permissionRequest({ toolUseId: "t2", tool: "Write" }));
    expect(prompt.outstanding).toBe(2);
    expect(output.text()).not.toContain("Write");

    input.write("d\n");
    await vi.waitFor(() => expect(output.text()).toContain("[permission] Write"));

    input.write("k\n");
    await vi.waitFor(() => expect(respond).toHaveBeenCalledTimes(2));
    expect(respond.mock.calls).toEqual([
      ["t1", "deny"],
      ["t2", "ask"],
    ]);
  });

  it("reports a decision that could not be delivered", async () => {
    respond.mockResolvedValue(false);
    prompt.showRequest(permissionRequest({ toolUseId: "t1" }));

    input.write("a\n");

    await vi.waitFor(() =>
      expect(output.text()).toContain("  could not deliver allow (request gone)\n"),
    );
  });

  it("moves on when the current request is resolved elsewhere", () => {
    prompt.showRequest(permissionRequest({ toolUseId: "t1", tool: "Bash" }));
    prompt.showRequest(permissionRequest({ toolUseId: "t2", tool: "Write" }));

    prompt.removeRequest("t1");

    expect(output.text()).toContain("  resolved elsewhere: t1\n");
    expect(output.text()).toContain("[permission] Write");
    expect(prompt.outstanding).toBe(1);
  });

  it("drops every request of a session", () => {
    prompt.showRequest(permissionRequest({ sessionId: "s1", toolUseId: "t1" }));
    prompt.showRequest(permissionRequest({ sessionId: "s2", toolUseId: "t2" }));
    prompt.showRequest(permissionRequest({ sessionId: "s1", toolUseId: "t3" }));

    prompt.removeSession("s1");

    expect(prompt.outstanding).toBe(1);
    expect(output.text()).toContain("(session s2)");
  });

  it("skips requests without a tool_use_id", () => {
    prompt.showRequest(permissionRequest());

    expect(prompt.outstanding).toBe(0);
    expect(output.text()).toBe("");
  });

  it("shows a repeated tool_use_id once", () => {
    prompt.showRequest(permissionRequest({ toolUseId: "t1" }));
    prompt.showRequest(permissionRequest({ toolUseId: "t1" }));

    expect(prompt.outstanding).toBe(1);
  });
});
