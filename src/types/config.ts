import { relayConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Relay configuration; every field falls back to DEFAULT_CONFIG. */
export interface RelayConfig {
  // Endpoint
  socketPath?: string; // default: /tmp/hook-relay.sock
  socketMode?: number; // default: 0o700 (owner only)

  // Per-connection reads
  readTimeoutMs?: number; // default: 5000
  readQuietMs?: number; // default: 50; silence after data that ends a read
  maxPayloadBytes?: number; // default: 1 MiB

  // Resource limits
  maxConcurrentConnections?: number; // default: 10

  // Correlation cache
  cacheEntryTtlMs?: number; // default: 60000
  cacheSweepIntervalMs?: number; // default: 30000
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<RelayConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  socketPath: "/tmp/hook-relay.sock",
  socketMode: 0o700,
  readTimeoutMs: 5000,
  readQuietMs: 50,
  maxPayloadBytes: 1024 * 1024,
  maxConcurrentConnections: 10,
  cacheEntryTtlMs: 60_000,
  cacheSweepIntervalMs: 30_000,
};

/** Validate user config and merge it over the defaults. Throws ConfigError. */
export function resolveConfig(config: RelayConfig = {}): ResolvedConfig {
  const validation = relayConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const overrides = validation.data;
  const resolved: ResolvedConfig = {
    socketPath: overrides.socketPath ?? DEFAULT_CONFIG.socketPath,
    socketMode: overrides.socketMode ?? DEFAULT_CONFIG.socketMode,
    readTimeoutMs: overrides.readTimeoutMs ?? DEFAULT_CONFIG.readTimeoutMs,
    readQuietMs: overrides.readQuietMs ?? DEFAULT_CONFIG.readQuietMs,
    maxPayloadBytes: overrides.maxPayloadBytes ?? DEFAULT_CONFIG.maxPayloadBytes,
    maxConcurrentConnections:
      overrides.maxConcurrentConnections ?? DEFAULT_CONFIG.maxConcurrentConnections,
    cacheEntryTtlMs: overrides.cacheEntryTtlMs ?? DEFAULT_CONFIG.cacheEntryTtlMs,
    cacheSweepIntervalMs: overrides.cacheSweepIntervalMs ?? DEFAULT_CONFIG.cacheSweepIntervalMs,
  };

  if (resolved.readQuietMs > resolved.readTimeoutMs) {
    throw new ConfigError(
      `Invalid configuration: readQuietMs (${resolved.readQuietMs}) exceeds readTimeoutMs (${resolved.readTimeoutMs})`,
    );
  }
  return resolved;
}
