import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** The subset of `process` the handlers attach to. */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface SignalHandlerOptions {
  logger?: Logger;
  /** Force-exit with status 1 if shutdown has not finished this long after the first signal. */
  timeoutMs?: number;
  target?: SignalTarget;
  exit?: (code: number) => void;
}

/**
 * Register SIGINT and SIGTERM handlers that request a graceful shutdown.
 *
 * The first signal calls `onInterrupt` and arms a force-exit timer; a second
 * signal exits immediately with status 1. Returns a function that removes the
 * handlers and disarms the timer once shutdown has completed.
 */
export function registerSignalHandlers(
  onInterrupt: (signal: NodeJS.Signals) => void,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let forceTimer: ReturnType<typeof setTimeout> | undefined;
  let interrupted = false;

  const listeners = SIGNALS.map((signal) => {
    const listener = () => {
      if (interrupted) {
        logger.warn(`Received ${signal} during shutdown, force exiting`, { component: "signals" });
        exit(1);
        return;
      }
      interrupted = true;
      logger.info(`Received ${signal}, shutting down`, { component: "signals" });

      forceTimer = setTimeout(() => {
        logger.error("Shutdown timed out, force exiting", { component: "signals", timeoutMs });
        exit(1);
      }, timeoutMs);
      forceTimer.unref();

      onInterrupt(signal);
    };
    target.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    if (forceTimer !== undefined) clearTimeout(forceTimer);
    for (const { signal, listener } of listeners) {
      target.off(signal, listener);
    }
  };
}
