import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/** The slice of `process` the handler needs; tests pass an EventEmitter. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  /** Force exit with code 1 if cleanup has not finished by then. */
  timeoutMs?: number;
  signals?: readonly NodeJS.Signals[];
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Run `cleanup` once on the first shutdown signal, then exit 0 (also when
 * cleanup rejects). Returns a function that unregisters the handlers.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signals = options.signals ?? DEFAULT_SIGNALS;
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down");

    const forceTimer = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit", { timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .catch((err: unknown) => {
        logger.error("Shutdown cleanup failed", { error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        exit(0);
      });
  };

  for (const signal of signals) source.on(signal, handler);
  return () => {
    for (const signal of signals) source.off(signal, handler);
  };
}
