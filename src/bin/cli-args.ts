import { LogLevel, parseLogLevel } from "../adapters/structured-logger.js";
import type { RelayConfig } from "../types/config.js";

export interface CliOptions {
  config: RelayConfig;
  logLevel: LogLevel;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const HELP_TEXT = `
  hook-relay: hold assistant permission requests for a human decision

  Usage: hook-relay [options]

  Options:
    --socket <path>          Unix socket path (default: /tmp/hook-relay.sock)
    --max-connections <n>    Concurrent client connections (default: 10)
    --read-timeout <ms>      Per-connection read deadline (default: 5000)
    --cache-ttl <ms>         Age at which unmatched tool ids expire (default: 60000)
    --verbose, -v            Debug logging
    --help, -h               Show this help

  Environment:
    HOOK_RELAY_SOCKET        Socket path when --socket is not given
    HOOK_RELAY_LOG_LEVEL     debug | info | warn | error (default: info)
`;

/**
 * Parse CLI arguments (without the node and script entries).
 * Values are only checked for shape here; resolveConfig validates ranges.
 */
export function parseArgs(argv: readonly string[], env: NodeJS.ProcessEnv = {}): ParsedArgs {
  const config: RelayConfig = {};
  let logLevel = LogLevel.INFO;
  let verbose = false;

  if (env.HOOK_RELAY_SOCKET) config.socketPath = env.HOOK_RELAY_SOCKET;
  if (env.HOOK_RELAY_LOG_LEVEL) {
    const level = parseLogLevel(env.HOOK_RELAY_LOG_LEVEL);
    if (level === undefined) {
      return { kind: "error", message: `Unknown log level: ${env.HOOK_RELAY_LOG_LEVEL}` };
    }
    logLevel = level;
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--socket": {
        const value = argv[++i];
        if (!value) return { kind: "error", message: "--socket requires a path" };
        config.socketPath = value;
        break;
      }
      case "--max-connections":
      case "--read-timeout":
      case "--cache-ttl": {
        const value = Number(argv[++i]);
        if (!Number.isInteger(value)) {
          return { kind: "error", message: `${arg} requires an integer` };
        }
        if (arg === "--max-connections") config.maxConcurrentConnections = value;
        else if (arg === "--read-timeout") config.readTimeoutMs = value;
        else config.cacheEntryTtlMs = value;
        break;
      }
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option: ${arg}` };
    }
  }

  return { kind: "run", options: { config, logLevel: verbose ? LogLevel.DEBUG : logLevel } };
}
