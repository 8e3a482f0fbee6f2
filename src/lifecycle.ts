// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly poller: Stoppable;
  readonly closeServer: (() => void) | null;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT signal handlers for graceful shutdown.
 * Stops the poller, closes the status server if one is listening, then exits.
 *
 * - Guard against double-shutdown (re-entrant signal delivery)
 * - Stops the poller before closing the server so the last snapshot stays readable
 * - Wraps each cleanup step in try/catch so every step runs
 * - Calls `process.exit(0)` after cleanup
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    try {
      deps.poller.stop();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error stopping poller");
    }

    if (deps.closeServer) {
      try {
        deps.closeServer();
        deps.logger.info("status server closed");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error closing status server");
      }
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
