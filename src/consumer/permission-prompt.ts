import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";
import type { HookEvent, PermissionDecision } from "../types/hook-event.js";
import type { JsonObject } from "../utils/canonical-json.js";

export interface PermissionResponder {
  respondToPermission(
    toolUseId: string,
    decision: PermissionDecision,
    reason?: string,
  ): Promise<boolean>;
}

export interface PermissionPromptOptions {
  input: Readable;
  output: Writable;
  logger?: Logger;
}

interface PromptRequest {
  sessionId: string;
  toolUseId: string;
  toolName: string;
  toolInput?: JsonObject;
}

const ANSWERS = new Map<string, PermissionDecision>([
  ["a", "allow"],
  ["allow", "allow"],
  ["d", "deny"],
  ["deny", "deny"],
  ["k", "ask"],
  ["ask", "ask"],
]);

const INPUT_PREVIEW_LIMIT = 500;

function previewInput(input: JsonObject | undefined): string {
  const text = JSON.stringify(input ?? {}, null, 2);
  return text.length > INPUT_PREVIEW_LIMIT ? `${text.slice(0, INPUT_PREVIEW_LIMIT)}…` : text;
}

/**
 * Line-based permission prompt for the terminal.
 * Held requests are asked one at a time, oldest first.
 */
export class PermissionPrompt {
  private readonly rl: Interface;
  private readonly output: Writable;
  private readonly logger: Logger;
  private readonly queue: PromptRequest[] = [];
  private current: PromptRequest | null = null;

  constructor(
    private readonly responder: PermissionResponder,
    options: PermissionPromptOptions,
  ) {
    this.output = options.output;
    this.logger = options.logger ?? noopLogger;
    this.rl = createInterface({ input: options.input, terminal: false });
    this.rl.on("line", (line) => this.answer(line));
  }

  /** Queue a held request. Events without a tool_use_id cannot be answered and are skipped, as are repeats. */
  showRequest(event: HookEvent): void {
    const toolUseId = event.toolUseId;
    if (!toolUseId) return;
    if (this.current?.toolUseId === toolUseId || this.queue.some((r) => r.toolUseId === toolUseId)) {
      return;
    }
    this.queue.push({
      sessionId: event.sessionId,
      toolUseId,
      toolName: event.tool ?? "unknown",
      toolInput: event.toolInput,
    });
    if (!this.current) this.next();
  }

  /** Withdraw a request settled elsewhere. */
  removeRequest(toolUseId: string): void {
    if (this.current?.toolUseId === toolUseId) {
      this.output.write(`  resolved elsewhere: ${toolUseId}\n`);
      this.current = null;
      this.next();
      return;
    }
    const index = this.queue.findIndex((r) => r.toolUseId === toolUseId);
    if (index !== -1) this.queue.splice(index, 1);
  }

  removeSession(sessionId: string): void {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      if (this.queue[i]?.sessionId === sessionId) this.queue.splice(i, 1);
    }
    if (this.current?.sessionId === sessionId) this.removeRequest(this.current.toolUseId);
  }

  /** Requests shown or waiting. */
  get outstanding(): number {
    return this.queue.length + (this.current ? 1 : 0);
  }

  close(): void {
    this.rl.close();
  }

  private next(): void {
    const request = this.queue.shift();
    this.current = request ?? null;
    if (!request) return;
    this.output.write(
      `\n[permission] ${request.toolName} (session ${request.sessionId.slice(0, 8)})\n` +
        `${previewInput(request.toolInput)}\n`,
    );
    this.ask();
  }

  private ask(): void {
    this.output.write("[a]llow / [d]eny / as[k] > ");
  }

  private answer(line: string): void {
    const request = this.current;
    if (!request) return;

    const decision = ANSWERS.get(line.trim().toLowerCase());
    if (!decision) {
      this.output.write(`  unrecognised answer: ${JSON.stringify(line.trim())}\n`);
      this.ask();
      return;
    }

    this.current = null;
    void this.responder
      .respondToPermission(request.toolUseId, decision)
      .then((delivered) => {
        this.output.write(
          delivered
            ? `  ${decision} → ${request.toolName}\n`
            : `  could not deliver ${decision} (request gone)\n`,
        );
      })
      .catch((err: unknown) => {
        this.logger.error("Permission response failed", { toolUseId: request.toolUseId, error: err });
      })
      .finally(() => {
        if (!this.current) this.next();
      });
  }
}
