import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "./noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/** Where signal listeners are registered; `process` unless a test injects an emitter. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  signals?: readonly NodeJS.Signals[];
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers that run `cleanup` and exit with the code it returns.
 * Exits with 1 if cleanup fails or stalls past `timeoutMs`. Later signals are ignored.
 * Returns a function that removes the handlers.
 */
export function registerSignalHandlers(
  cleanup: (signal: NodeJS.Signals) => Promise<number>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signals = options.signals ?? DEFAULT_SIGNALS;
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Received signal, shutting down", { signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, force exiting", { timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup(signal).then(
      (code) => {
        clearTimeout(forceTimer);
        exit(code);
      },
      (err: unknown) => {
        logger.error("Shutdown cleanup failed", { signal, error: err });
        clearTimeout(forceTimer);
        exit(1);
      },
    );
  };

  for (const signal of signals) source.on(signal, handler);
  return () => {
    for (const signal of signals) source.off(signal, handler);
  };
}
