/**
 * hook-relay public API barrel.
 *
 * Re-exports the server, its tables, the consumer helpers and the ambient
 * types (logger, errors, config) that make up the package surface.
 * @module
 */

export { ConnectionSlotLimiter } from "./adapters/connection-slot-limiter.js";
// Adapters
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { relayConfigSchema } from "./config/config-schema.js";
// Consumer
export type { PermissionPromptOptions, PermissionResponder } from "./consumer/permission-prompt.js";
export { PermissionPrompt } from "./consumer/permission-prompt.js";
export { formatStatusLine } from "./consumer/status-line.js";
// Core
export type { CacheSweeperDeps, SweepableCache } from "./core/cache-sweeper.js";
export { CacheSweeper } from "./core/cache-sweeper.js";
export { EventChannel, openHookEventChannel } from "./core/event-channel.js";
export type { PendingPermission } from "./core/pending-permission-table.js";
export { PendingPermissionTable } from "./core/pending-permission-table.js";
export type { PendingPermissionControl } from "./core/permission-reconciler.js";
export { PermissionReconciler } from "./core/permission-reconciler.js";
export type {
  CachedToolUseId,
  CorrelationSubject,
  ToolUseIdCacheOptions,
} from "./core/tool-use-id-cache.js";
export { correlationKey, ToolUseIdCache } from "./core/tool-use-id-cache.js";
export type { ListenerErrorHandler } from "./core/typed-emitter.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Daemon
export type { SignalHandlerOptions, SignalSource } from "./daemon/signal-handler.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  ConfigError,
  errorMessage,
  HookRelayError,
  PayloadError,
  TransportError,
  toHookRelayError,
} from "./errors.js";
// Interfaces
export type { ConcurrencyLimiter, SlotLease } from "./interfaces/concurrency-limiter.js";
export type { Logger } from "./interfaces/logger.js";
// Server
export { HookConnection } from "./server/hook-connection.js";
export type {
  HookSocketServerEvents,
  HookSocketServerOptions,
  PendingPermissionInfo,
  PermissionDeliveryFailure,
} from "./server/hook-socket-server.js";
export { HookSocketServer } from "./server/hook-socket-server.js";
export type { ReadOutcome, ReadPayloadOptions } from "./server/payload-reader.js";
export { readPayload } from "./server/payload-reader.js";
// Types
export type { RelayConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
export type {
  HookEvent,
  HookEventKind,
  HookEventName,
  HookEventPayload,
  HookResponse,
  PermissionDecision,
} from "./types/hook-event.js";
export {
  AWAITING_APPROVAL_STATUS,
  expectsResponse,
  HOOK_EVENT_NAMES,
  isKnownHookEvent,
  isPermissionDecision,
  PERMISSION_DECISIONS,
} from "./types/hook-event.js";
export {
  decodeHookEvent,
  encodeHookEvent,
  encodeHookResponse,
  hookEventPayloadSchema,
} from "./types/hook-event-schema.js";
export type { SessionPhase, SessionPhaseKind } from "./types/session-phase.js";
export { sessionPhaseOf } from "./types/session-phase.js";
// Utils
export type { JsonObject, JsonValue } from "./utils/canonical-json.js";
export { canonicalStringify, jsonEquals } from "./utils/canonical-json.js";
