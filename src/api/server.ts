// pattern: Imperative Shell
import express from "express";
import type { PollerSnapshot } from "../tracker";

export type StatusServerContext = {
  readonly snapshot: () => PollerSnapshot;
};

function describeOutcome(snapshot: PollerSnapshot) {
  const outcome = snapshot.lastOutcome;
  if (!outcome) return null;

  switch (outcome.kind) {
    case "idle":
      return { kind: outcome.kind };
    case "status":
      return { kind: outcome.kind, delivery: outcome.delivery };
    case "error":
      return {
        kind: outcome.kind,
        errorKind: outcome.error.kind,
        message: outcome.message,
        delivery: outcome.delivery,
      };
  }
}

/**
 * Creates an Express app exposing the poller's state for container health
 * checks and manual inspection.
 *
 * @returns Configured Express app instance (not started — caller decides port)
 */
export function createStatusServer(context: StatusServerContext): express.Express {
  const app = express();

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    const snapshot = context.snapshot();
    res.json({
      running: snapshot.running,
      cursor: snapshot.cursor,
      lastMessage: snapshot.lastMessage,
      cycles: snapshot.cycles,
      lastCycleAt: snapshot.lastCycleAt?.toISOString() ?? null,
      lastOutcome: describeOutcome(snapshot),
    });
  });

  return app;
}
