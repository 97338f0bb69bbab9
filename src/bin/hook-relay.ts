#!/usr/bin/env node
import { StructuredLogger } from "../adapters/structured-logger.js";
import { PermissionPrompt } from "../consumer/permission-prompt.js";
import { formatStatusLine } from "../consumer/status-line.js";
import { openHookEventChannel } from "../core/event-channel.js";
import { PermissionReconciler } from "../core/permission-reconciler.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError } from "../errors.js";
import { HookSocketServer } from "../server/hook-socket-server.js";
import { expectsResponse } from "../types/hook-event.js";
import { sessionPhaseOf } from "../types/session-phase.js";
import { HELP_TEXT, parseArgs } from "./cli-args.js";

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2), process.env);
  if (parsed.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}\nRun with --help for usage.`);
    process.exitCode = 1;
    return;
  }

  const { config, logLevel } = parsed.options;
  const logger = new StructuredLogger({ component: "hook-relay", level: logLevel });

  let server: HookSocketServer;
  try {
    server = new HookSocketServer({ config, logger: logger.child("hook-server") });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const prompt = new PermissionPrompt(server, {
    input: process.stdin,
    output: process.stdout,
    logger: logger.child("prompt"),
  });
  const reconciler = new PermissionReconciler(server, logger.child("reconciler"));

  server.on("permissionDeliveryFailed", ({ sessionId, toolUseId }) => {
    logger.warn("Permission decision was not delivered", {
      sessionId: sessionId.slice(0, 8),
      toolUseId: toolUseId.slice(0, 12),
    });
  });

  if (!(await server.start())) {
    prompt.close();
    process.exitCode = 1;
    return;
  }

  const channel = openHookEventChannel(server);
  registerSignalHandlers(
    async () => {
      channel.close();
      prompt.close();
      await server.stop();
    },
    { logger },
  );

  console.log(`\n  hook-relay listening on ${server.socketPath}\n  Press Ctrl+C to stop\n`);

  for await (const event of channel) {
    console.log(formatStatusLine(event, sessionPhaseOf(event)));

    for (const toolUseId of reconciler.reconcile(event)) prompt.removeRequest(toolUseId);
    if (event.event === "SessionEnd") prompt.removeSession(event.sessionId);
    if (expectsResponse(event) && event.toolUseId) prompt.showRequest(event);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
