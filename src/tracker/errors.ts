// pattern: Functional Core
import type { FetchError } from "./api-client";
import type { ParseError, ValidationError } from "./types";

/**
 * A failure as raised somewhere inside a poll cycle, tagged with the stage
 * that produced it.
 */
export type CycleFailure =
  | { readonly stage: "fetch"; readonly error: FetchError }
  | { readonly stage: "validate"; readonly error: ValidationError }
  | { readonly stage: "parse"; readonly error: ParseError }
  | { readonly stage: "unexpected"; readonly cause: unknown };

export type ClassifiedError =
  | {
      readonly kind: "Transport";
      readonly endpoint: string;
      readonly message: string;
    }
  | {
      readonly kind: "ServerStatus";
      readonly endpoint: string;
      readonly code: number;
    }
  | { readonly kind: "Validation"; readonly error: ValidationError }
  | { readonly kind: "Parse"; readonly error: ParseError }
  | { readonly kind: "Unexpected"; readonly message: string };

export type ErrorSeverity = "warn" | "error";

export function classifyError(failure: CycleFailure): ClassifiedError {
  switch (failure.stage) {
    case "fetch": {
      const { error } = failure;
      if (error.kind === "InvalidJson") {
        return { kind: "Validation", error: { kind: "MalformedBody" } };
      }
      return error;
    }
    case "validate":
      return { kind: "Validation", error: failure.error };
    case "parse":
      return { kind: "Parse", error: failure.error };
    case "unexpected":
      return {
        kind: "Unexpected",
        message:
          failure.cause instanceof Error
            ? failure.cause.message
            : String(failure.cause),
      };
  }
}

/**
 * Whether the failure is expected to clear by itself on a later attempt.
 * Contract violations are not, but the poller still tries again on its timer.
 */
export function isRetryable(error: ClassifiedError): boolean {
  return error.kind === "Transport" || error.kind === "ServerStatus";
}

/**
 * Data contract violations point at an upstream change and log louder than
 * connectivity problems.
 */
export function severityOf(error: ClassifiedError): ErrorSeverity {
  switch (error.kind) {
    case "Transport":
    case "ServerStatus":
      return "warn";
    case "Validation":
    case "Parse":
    case "Unexpected":
      return "error";
  }
}

function describeValidation(error: ValidationError): string {
  switch (error.kind) {
    case "MalformedBody":
      return "response body is not a JSON object";
    case "MalformedHomeworksField":
      return 'response field "homeworks" is missing or not a list';
    case "MalformedCurrentDateField":
      return 'response field "current_date" is missing or not an integer';
  }
}

function describeParse(error: ParseError): string {
  switch (error.kind) {
    case "MissingField":
      return `submission record field "${error.key}" is missing or not a string`;
    case "UnknownStatus":
      return `unknown review status "${error.code}"`;
  }
}

export function describeError(error: ClassifiedError): string {
  switch (error.kind) {
    case "Transport":
      return `request to ${error.endpoint} failed: ${error.message}`;
    case "ServerStatus":
      return `endpoint ${error.endpoint} responded with status ${error.code}`;
    case "Validation":
      return describeValidation(error.error);
    case "Parse":
      return describeParse(error.error);
    case "Unexpected":
      return `unexpected error: ${error.message}`;
  }
}

/**
 * Renders the single diagnostic line sent to the chat. Identical failures
 * render identically so the deduplicator can suppress repeats.
 */
export function formatDiagnostic(error: ClassifiedError): string {
  return `Program failure: ${describeError(error)}`;
}
