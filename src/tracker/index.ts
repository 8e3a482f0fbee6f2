export { createStatusCatalog } from "./catalog";
export { validateResponse } from "./validator";
export { parseSubmission, renderStatusMessage } from "./parser";
export {
  classifyError,
  describeError,
  formatDiagnostic,
  isRetryable,
  severityOf,
} from "./errors";
export {
  createNotificationState,
  recordSent,
  resetNotificationState,
  shouldSend,
} from "./dedup";
export { createApiClient } from "./api-client";
export {
  abortableSleep,
  createPoller,
  createPollerState,
  runCycle,
} from "./poller";
export type { StatusCatalog } from "./catalog";
export type { ApiClient, ApiClientOptions, FetchError, FetchResult } from "./api-client";
export type { ClassifiedError, CycleFailure, ErrorSeverity } from "./errors";
export type {
  CycleOutcome,
  Delivery,
  Poller,
  PollerDeps,
  PollerSnapshot,
  SleepFn,
} from "./poller";
export type {
  NotificationState,
  ParseError,
  ParseResult,
  PollerState,
  PollResponse,
  SubmissionRecord,
  ValidationError,
  ValidationResult,
} from "./types";
