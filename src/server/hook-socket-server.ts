/**
 * Unix-socket hook server.
 *
 * The assistant's hook script connects once per lifecycle event, writes one
 * JSON payload and waits. Most connections are closed as soon as the payload
 * is decoded; a permission request is held open until a decision is written
 * back (respondToPermission*), it is cancelled, or the server stops.
 *
 * All table mutations run synchronously on the event loop, and an entry is
 * taken out of the pending table before its reply is written, so a held
 * connection is answered at most once.
 */

import { chmod, unlink } from "node:fs/promises";
import { createServer, type Server, type Socket } from "node:net";
import { ConnectionSlotLimiter } from "../adapters/connection-slot-limiter.js";
import { noopLogger } from "../adapters/noop-logger.js";
import { CacheSweeper } from "../core/cache-sweeper.js";
import {
  type PendingPermission,
  PendingPermissionTable,
} from "../core/pending-permission-table.js";
import { ToolUseIdCache } from "../core/tool-use-id-cache.js";
import { TypedEventEmitter } from "../core/typed-emitter.js";
import { errnoCode, errorMessage, PayloadError, TransportError, toHookRelayError } from "../errors.js";
import type { ConcurrencyLimiter } from "../interfaces/concurrency-limiter.js";
import type { Logger } from "../interfaces/logger.js";
import type { RelayConfig, ResolvedConfig } from "../types/config.js";
import { resolveConfig } from "../types/config.js";
import {
  expectsResponse,
  type HookEvent,
  isKnownHookEvent,
  isPermissionDecision,
  type PermissionDecision,
  withToolUseId,
} from "../types/hook-event.js";
import { decodeHookEvent, encodeHookResponse } from "../types/hook-event-schema.js";
import type { JsonObject } from "../utils/canonical-json.js";
import { HookConnection } from "./hook-connection.js";

export interface PermissionDeliveryFailure {
  sessionId: string;
  toolUseId: string;
}

export interface HookSocketServerEvents {
  /** Every decoded event, in the order payloads complete. */
  event: HookEvent;
  /** A decision could not be written to the held connection. */
  permissionDeliveryFailed: PermissionDeliveryFailure;
}

/** What a UI needs to render the most recent held request of a session. */
export interface PendingPermissionInfo {
  toolName?: string;
  toolUseId: string;
  toolInput?: JsonObject;
}

export interface HookSocketServerOptions {
  config?: RelayConfig;
  logger?: Logger;
  /** Defaults to a ConnectionSlotLimiter sized by maxConcurrentConnections. */
  limiter?: ConcurrencyLimiter;
  now?: () => number;
}

type HeldPermission = PendingPermission<HookConnection>;

function shortId(id: string, length: number): string {
  return id.length > length ? id.slice(0, length) : id;
}

async function removeSocketFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }
}

export class HookSocketServer extends TypedEventEmitter<HookSocketServerEvents> {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly limiter: ConcurrencyLimiter;
  private readonly cache: ToolUseIdCache;
  private readonly pending = new PendingPermissionTable<HookConnection>();
  private readonly sweeper: CacheSweeper;
  private readonly inFlight = new Set<HookConnection>();
  private readonly now: () => number;
  private server: Server | null = null;
  private starting: Promise<boolean> | null = null;

  /** Throws ConfigError when `options.config` is invalid. */
  constructor(options: HookSocketServerOptions = {}) {
    const logger = options.logger ?? noopLogger;
    super((event, error) => {
      logger.error(`Listener for "${event}" threw`, { error });
    });
    this.logger = logger;
    this.config = resolveConfig(options.config);
    this.limiter =
      options.limiter ?? new ConnectionSlotLimiter(this.config.maxConcurrentConnections);
    this.now = options.now ?? Date.now;
    this.cache = new ToolUseIdCache({ ttlMs: this.config.cacheEntryTtlMs });
    this.sweeper = new CacheSweeper({
      cache: this.cache,
      intervalMs: this.config.cacheSweepIntervalMs,
      logger,
      now: this.now,
    });
  }

  // ── Lifecycle ──

  /** Bind the socket. Resolves false (and logs) when it cannot. */
  start(): Promise<boolean> {
    if (this.server) return Promise.resolve(true);
    if (!this.starting) {
      this.starting = this.listen().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async listen(): Promise<boolean> {
    const { socketPath, socketMode } = this.config;
    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    try {
      await removeSocketFile(socketPath);
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(socketPath, () => {
          server.off("error", reject);
          resolve();
        });
      });
      await chmod(socketPath, socketMode);
    } catch (err) {
      server.close();
      const error = new TransportError(
        `Failed to listen on ${socketPath}: ${errorMessage(err)}`,
        { cause: err },
      );
      this.logger.error("Hook socket server failed to start", { error, socketPath });
      return false;
    }

    server.on("error", (err) => {
      this.logger.error("Hook socket server error", { error: err });
    });
    this.server = server;
    this.sweeper.start();
    this.logger.info("Hook socket server listening", {
      socketPath,
      maxConnections: this.limiter.capacity,
    });
    return true;
  }

  /** Close the listener, every held and in-flight connection, and remove the socket file. */
  async stop(): Promise<void> {
    if (this.starting) await this.starting;
    const server = this.server;
    if (!server) return;
    this.server = null;

    this.sweeper.stop();
    for (const entry of this.pending.takeAll()) entry.connection.close();
    for (const conn of this.inFlight) conn.close();
    this.inFlight.clear();
    this.cache.clear();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    try {
      await removeSocketFile(this.config.socketPath);
    } catch (err) {
      this.logger.warn("Failed to remove socket file", {
        socketPath: this.config.socketPath,
        error: err,
      });
    }
    this.logger.info("Hook socket server stopped");
  }

  get socketPath(): string {
    return this.config.socketPath;
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  get activeConnections(): number {
    return this.limiter.active;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Tool-use ids cached from PreToolUse events and not yet consumed. */
  get cachedToolUseIds(): number {
    return this.cache.size;
  }

  // ── Connection handling ──

  private accept(socket: Socket): void {
    const lease = this.limiter.tryAcquire();
    if (!lease) {
      this.logger.warn("Rate limit reached, rejecting hook connection", {
        active: this.limiter.active,
        capacity: this.limiter.capacity,
      });
      socket.on("error", (err) => {
        this.logger.debug?.("Rejected hook connection error", { error: err });
      });
      socket.destroy();
      return;
    }

    const conn = new HookConnection(socket, lease, this.logger);
    this.inFlight.add(conn);
    void this.handle(conn)
      .catch((err: unknown) => {
        this.logger.error("Hook connection handler failed", { error: toHookRelayError(err) });
        conn.close();
      })
      .finally(() => this.inFlight.delete(conn));
  }

  private async handle(conn: HookConnection): Promise<void> {
    const outcome = await conn.read({
      timeoutMs: this.config.readTimeoutMs,
      quietMs: this.config.readQuietMs,
      maxBytes: this.config.maxPayloadBytes,
    });
    // stop() closed it mid-read
    if (conn.isClosed) return;

    if (!outcome.ok) {
      if (outcome.reason === "timeout") {
        this.logger.warn("Hook connection timed out before sending data", {
          timeoutMs: this.config.readTimeoutMs,
        });
      } else if (outcome.reason === "too_large") {
        this.logger.error("Malformed hook payload", {
          error: new PayloadError(
            `Payload exceeds ${this.config.maxPayloadBytes} bytes`,
          ),
        });
      } else {
        this.logger.debug?.("Hook connection closed without data", {
          reason: outcome.reason,
          error: outcome.error,
        });
      }
      conn.close();
      return;
    }

    let event: HookEvent;
    try {
      event = decodeHookEvent(outcome.data);
    } catch (err) {
      this.logger.error("Malformed hook payload", { error: toHookRelayError(err) });
      conn.close();
      return;
    }

    this.dispatch(event, conn);
  }

  private dispatch(event: HookEvent, conn: HookConnection): void {
    const session = shortId(event.sessionId, 8);

    if (!isKnownHookEvent(event.event)) {
      this.logger.debug?.("Forwarding unrecognised hook event", {
        sessionId: session,
        event: event.event,
      });
    }

    if (event.event === "PreToolUse" && event.toolUseId) {
      this.cache.push(event, event.toolUseId, this.now());
      this.logger.debug?.("Cached tool_use_id", {
        sessionId: session,
        tool: event.tool,
        toolUseId: shortId(event.toolUseId, 12),
      });
    }

    if (event.event === "SessionEnd") {
      const purged = this.cache.purgeSession(event.sessionId);
      const cancelled = this.cancelPendingPermissions(event.sessionId);
      this.logger.debug?.("Session ended", {
        sessionId: session,
        purgedCacheEntries: purged,
        cancelledPermissions: cancelled.length,
      });
    }

    if (!expectsResponse(event)) {
      conn.close();
      this.emit("event", event);
      return;
    }

    const toolUseId = event.toolUseId ?? this.cache.pop(event);
    if (!toolUseId) {
      this.logger.warn("Permission request has no tool_use_id and no cached match", {
        sessionId: session,
        tool: event.tool,
      });
      conn.close();
      this.emit("event", event);
      return;
    }

    const held = withToolUseId(event, toolUseId);
    const replaced = this.pending.insert({
      sessionId: event.sessionId,
      toolUseId,
      connection: conn,
      event: held,
      receivedAt: this.now(),
    });
    if (replaced) {
      this.logger.warn("Replacing pending permission with the same tool_use_id", {
        sessionId: session,
        toolUseId: shortId(toolUseId, 12),
      });
      replaced.connection.close();
    }
    this.logger.debug?.("Holding permission request", {
      sessionId: session,
      tool: event.tool,
      toolUseId: shortId(toolUseId, 12),
    });
    this.emit("event", held);
  }

  // ── Responder ──

  /** Answer the request held under `toolUseId`. Resolves true iff the reply was written. */
  async respondToPermission(
    toolUseId: string,
    decision: PermissionDecision,
    reason?: string,
  ): Promise<boolean> {
    if (!this.acceptsDecision(decision)) return false;
    const entry = this.pending.take(toolUseId);
    if (!entry) {
      this.logger.debug?.("No pending permission for tool_use_id", {
        toolUseId: shortId(toolUseId, 12),
      });
      return false;
    }
    return this.deliver(entry, decision, reason);
  }

  /** Answer the session's most recently received request. */
  async respondToPermissionBySession(
    sessionId: string,
    decision: PermissionDecision,
    reason?: string,
  ): Promise<boolean> {
    if (!this.acceptsDecision(decision)) return false;
    const entry = this.pending.takeLatestForSession(sessionId);
    if (!entry) {
      this.logger.debug?.("No pending permission for session", {
        sessionId: shortId(sessionId, 8),
      });
      return false;
    }
    return this.deliver(entry, decision, reason);
  }

  /** Close the held connection without a reply. Returns whether one was held. */
  cancelPendingPermission(toolUseId: string): boolean {
    const entry = this.pending.take(toolUseId);
    if (!entry) return false;
    entry.connection.close();
    this.logger.debug?.("Cancelled pending permission", {
      sessionId: shortId(entry.sessionId, 8),
      toolUseId: shortId(toolUseId, 12),
    });
    return true;
  }

  /** Close every held connection of the session without a reply. Returns their ids. */
  cancelPendingPermissions(sessionId: string): string[] {
    const entries = this.pending.takeAllForSession(sessionId);
    for (const entry of entries) entry.connection.close();
    if (entries.length > 0) {
      this.logger.debug?.("Cancelled pending permissions for session", {
        sessionId: shortId(sessionId, 8),
        count: entries.length,
      });
    }
    return entries.map((entry) => entry.toolUseId);
  }

  hasPendingPermission(sessionId: string): boolean {
    return this.pending.hasSession(sessionId);
  }

  getPendingPermission(sessionId: string): PendingPermissionInfo | undefined {
    const entry = this.pending.latestForSession(sessionId);
    if (!entry) return undefined;
    return {
      toolName: entry.event.tool,
      toolUseId: entry.toolUseId,
      toolInput: entry.event.toolInput,
    };
  }

  // Callers outside TypeScript can pass anything.
  private acceptsDecision(decision: unknown): decision is PermissionDecision {
    if (isPermissionDecision(decision)) return true;
    this.logger.warn("Ignoring invalid permission decision", { decision: String(decision) });
    return false;
  }

  private async deliver(
    entry: HeldPermission,
    decision: PermissionDecision,
    reason: string | undefined,
  ): Promise<boolean> {
    const ctx = {
      sessionId: shortId(entry.sessionId, 8),
      toolUseId: shortId(entry.toolUseId, 12),
      decision,
    };

    let delivered = true;
    try {
      await entry.connection.write(encodeHookResponse(decision, reason));
    } catch (err) {
      delivered = false;
      this.logger.error("Failed to deliver permission decision", { ...ctx, error: err });
    }
    entry.connection.close();

    if (delivered) {
      this.logger.info("Permission decision delivered", ctx);
    } else {
      this.emit("permissionDeliveryFailed", {
        sessionId: entry.sessionId,
        toolUseId: entry.toolUseId,
      });
    }
    return delivered;
  }
}
