import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SIGNALS = ["SIGTERM", "SIGINT"] as const;

export interface SignalHandlerOptions {
  logger?: Logger;
  /** Force-exit with code 1 if cleanup has not settled by then. */
  timeoutMs?: number;
}

/**
 * Register SIGTERM and SIGINT handlers that run a cleanup function before exiting.
 * Exits 0 after cleanup settles, 1 on a failed or stalled cleanup. Returns an
 * unregister function.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, force exiting");
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    void cleanup()
      .then(
        () => 0,
        (err: unknown) => {
          logger.error("Shutdown cleanup failed", { error: err });
          return 1;
        },
      )
      .then((code) => {
        clearTimeout(forceTimer);
        process.exit(code);
      });
  };

  for (const signal of SIGNALS) process.on(signal, handler);
  return () => {
    for (const signal of SIGNALS) process.off(signal, handler);
  };
}
