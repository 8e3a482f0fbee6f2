// pattern: Imperative Shell
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { ApiClient } from "./api-client";
import type { StatusCatalog } from "./catalog";
import type { Notifier } from "../notify/telegram";
import {
  classifyError,
  describeError,
  formatDiagnostic,
  isRetryable,
  severityOf,
} from "./errors";
import type { ClassifiedError, CycleFailure } from "./errors";
import { validateResponse } from "./validator";
import { parseSubmission } from "./parser";
import {
  createNotificationState,
  recordSent,
  resetNotificationState,
  shouldSend,
} from "./dedup";
import type { PollerState } from "./types";

export type Delivery = "sent" | "suppressed" | "send-failed";

export type CycleOutcome =
  | { readonly kind: "idle"; readonly cursor: number | null }
  | {
      readonly kind: "status";
      readonly message: string;
      readonly delivery: Delivery;
      readonly cursor: number | null;
    }
  | {
      readonly kind: "error";
      readonly error: ClassifiedError;
      readonly message: string;
      readonly delivery: Delivery;
      readonly cursor: number | null;
    };

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export type PollerDeps = {
  readonly apiClient: ApiClient;
  readonly notifier: Notifier;
  readonly catalog: StatusCatalog;
  readonly chatId: string;
  readonly pollIntervalMs: number;
  readonly logger: Logger;
  /** Wall clock in milliseconds; defaults to Date.now. */
  readonly now?: () => number;
  readonly sleep?: SleepFn;
};

export type PollerSnapshot = {
  readonly running: boolean;
  readonly cursor: number | null;
  readonly lastMessage: string | null;
  readonly cycles: number;
  readonly lastCycleAt: Date | null;
  readonly lastOutcome: CycleOutcome | null;
};

export type Poller = {
  readonly start: () => Promise<void>;
  readonly stop: () => void;
  readonly snapshot: () => PollerSnapshot;
};

export function createPollerState(initialCursor?: number): PollerState {
  return {
    cursor: initialCursor ?? null,
    notification: createNotificationState(),
  };
}

/**
 * Sleeps for `ms`, returning early without error once `signal` aborts.
 */
export const abortableSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
};

function advanceCursor(
  state: PollerState,
  currentDate: number,
  logger: Logger,
): void {
  if (state.cursor !== null && currentDate < state.cursor) {
    logger.warn(
      { cursor: state.cursor, currentDate },
      "current_date is older than cursor, keeping cursor",
    );
    return;
  }
  state.cursor = currentDate;
}

async function deliver(
  state: PollerState,
  deps: PollerDeps,
  message: string,
): Promise<Delivery> {
  if (!shouldSend(message, state.notification)) {
    deps.logger.debug({ message }, "message unchanged since last send, skipping");
    return "suppressed";
  }

  try {
    const result = await deps.notifier.send(deps.chatId, message);
    if (!result.success) {
      deps.logger.warn(
        { error: result.error },
        "notification not delivered, will retry next cycle",
      );
      return "send-failed";
    }
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    deps.logger.error({ error }, "notifier threw while sending");
    return "send-failed";
  }

  recordSent(message, state.notification);
  return "sent";
}

async function handleFailure(
  state: PollerState,
  deps: PollerDeps,
  failure: CycleFailure,
): Promise<CycleOutcome> {
  const error = classifyError(failure);
  const message = formatDiagnostic(error);

  deps.logger[severityOf(error)](
    {
      kind: error.kind,
      retryable: isRetryable(error),
      error: describeError(error),
    },
    "poll cycle failed",
  );

  const delivery = await deliver(state, deps, message);
  return { kind: "error", error, message, delivery, cursor: state.cursor };
}

/**
 * Runs one poll cycle against `state`. Never throws: every failure is
 * classified and reported through the same dedup channel as status messages.
 * At most one message is sent.
 */
export async function runCycle(
  state: PollerState,
  deps: PollerDeps,
): Promise<CycleOutcome> {
  const { logger } = deps;

  if (state.cursor === null) {
    state.cursor = Math.floor((deps.now ?? Date.now)() / 1000);
  }

  let message: string;
  try {
    const fetched = await deps.apiClient.fetchStatuses(state.cursor);
    if (!fetched.success) {
      return await handleFailure(state, deps, {
        stage: "fetch",
        error: fetched.error,
      });
    }

    const validated = validateResponse(fetched.body);
    if (!validated.success) {
      return await handleFailure(state, deps, {
        stage: "validate",
        error: validated.error,
      });
    }

    const { homeworks, currentDate } = validated.response;

    if (homeworks.length === 0) {
      logger.debug({ cursor: state.cursor }, "no review status changes");
      advanceCursor(state, currentDate, logger);
      resetNotificationState(state.notification);
      return { kind: "idle", cursor: state.cursor };
    }

    const parsed = parseSubmission(homeworks[0], deps.catalog);
    if (!parsed.success) {
      return await handleFailure(state, deps, {
        stage: "parse",
        error: parsed.error,
      });
    }

    logger.info(
      { homework: parsed.record.name, status: parsed.record.status },
      "review status received",
    );
    advanceCursor(state, currentDate, logger);
    message = parsed.message;
  } catch (err) {
    return handleFailure(state, deps, { stage: "unexpected", cause: err });
  }

  const delivery = await deliver(state, deps, message);
  return { kind: "status", message, delivery, cursor: state.cursor };
}

/**
 * Creates a poller that runs a cycle, sleeps the fixed interval, and repeats
 * until stop() is called. Cycles never overlap.
 *
 * @param deps - Collaborators and timing
 * @param initialCursor - Unix timestamp to poll from; defaults to now
 */
export function createPoller(deps: PollerDeps, initialCursor?: number): Poller {
  const state = createPollerState(initialCursor);
  const controller = new AbortController();
  const sleep = deps.sleep ?? abortableSleep;

  let running = false;
  let cycles = 0;
  let lastCycleAt: Date | null = null;
  let lastOutcome: CycleOutcome | null = null;

  return {
    async start(): Promise<void> {
      if (running) {
        throw new Error("poller is already running");
      }
      running = true;
      deps.logger.info(
        { cursor: state.cursor, intervalMs: deps.pollIntervalMs },
        "poller started",
      );

      try {
        while (!controller.signal.aborted) {
          lastOutcome = await runCycle(state, deps);
          cycles++;
          lastCycleAt = new Date();

          if (controller.signal.aborted) break;
          await sleep(deps.pollIntervalMs, controller.signal);
        }
      } finally {
        running = false;
        deps.logger.info({ cycles, cursor: state.cursor }, "poller stopped");
      }
    },

    stop(): void {
      controller.abort();
    },

    snapshot(): PollerSnapshot {
      return {
        running,
        cursor: state.cursor,
        lastMessage: state.notification.lastMessage,
        cycles,
        lastCycleAt,
        lastOutcome,
      };
    },
  };
}
