import { describe, it, expect } from "vitest";
import {
  classifyError,
  describeError,
  formatDiagnostic,
  isRetryable,
  severityOf,
} from "./errors";
import type { ClassifiedError } from "./errors";

const ENDPOINT = "https://reviews.example.com/api/statuses/";

describe("classifyError", () => {
  it("should pass transport failures through", () => {
    const error = classifyError({
      stage: "fetch",
      error: { kind: "Transport", endpoint: ENDPOINT, message: "fetch failed" },
    });

    expect(error).toEqual({
      kind: "Transport",
      endpoint: ENDPOINT,
      message: "fetch failed",
    });
    expect(isRetryable(error)).toBe(true);
    expect(severityOf(error)).toBe("warn");
  });

  it("should classify non-200 responses as ServerStatus", () => {
    const error = classifyError({
      stage: "fetch",
      error: { kind: "ServerStatus", endpoint: ENDPOINT, code: 503 },
    });

    expect(error).toEqual({ kind: "ServerStatus", endpoint: ENDPOINT, code: 503 });
    expect(isRetryable(error)).toBe(true);
    expect(severityOf(error)).toBe("warn");
  });

  it("should classify a non-JSON body as a validation failure", () => {
    const error = classifyError({
      stage: "fetch",
      error: { kind: "InvalidJson", endpoint: ENDPOINT },
    });

    expect(error).toEqual({
      kind: "Validation",
      error: { kind: "MalformedBody" },
    });
  });

  it("should log contract violations at error and not mark them retryable", () => {
    const validation = classifyError({
      stage: "validate",
      error: { kind: "MalformedHomeworksField" },
    });
    const parse = classifyError({
      stage: "parse",
      error: { kind: "UnknownStatus", code: "on_hold" },
    });

    expect(validation.kind).toBe("Validation");
    expect(parse.kind).toBe("Parse");
    expect(isRetryable(validation)).toBe(false);
    expect(isRetryable(parse)).toBe(false);
    expect(severityOf(validation)).toBe("error");
    expect(severityOf(parse)).toBe("error");
  });

  it("should wrap thrown values as Unexpected", () => {
    expect(
      classifyError({ stage: "unexpected", cause: new Error("boom") }),
    ).toEqual({ kind: "Unexpected", message: "boom" });
    expect(classifyError({ stage: "unexpected", cause: "plain" })).toEqual({
      kind: "Unexpected",
      message: "plain",
    });
  });
});

describe("formatDiagnostic", () => {
  const cases: ReadonlyArray<[ClassifiedError, string]> = [
    [
      { kind: "Transport", endpoint: ENDPOINT, message: "fetch failed" },
      `Program failure: request to ${ENDPOINT} failed: fetch failed`,
    ],
    [
      { kind: "ServerStatus", endpoint: ENDPOINT, code: 401 },
      `Program failure: endpoint ${ENDPOINT} responded with status 401`,
    ],
    [
      { kind: "Validation", error: { kind: "MalformedBody" } },
      "Program failure: response body is not a JSON object",
    ],
    [
      { kind: "Validation", error: { kind: "MalformedHomeworksField" } },
      'Program failure: response field "homeworks" is missing or not a list',
    ],
    [
      { kind: "Validation", error: { kind: "MalformedCurrentDateField" } },
      'Program failure: response field "current_date" is missing or not an integer',
    ],
    [
      { kind: "Parse", error: { kind: "MissingField", key: "status" } },
      'Program failure: submission record field "status" is missing or not a string',
    ],
    [
      { kind: "Parse", error: { kind: "UnknownStatus", code: "on_hold" } },
      'Program failure: unknown review status "on_hold"',
    ],
    [
      { kind: "Unexpected", message: "boom" },
      "Program failure: unexpected error: boom",
    ],
  ];

  it.each(cases)("should render %j", (error, expected) => {
    expect(formatDiagnostic(error)).toBe(expected);
    expect(`Program failure: ${describeError(error)}`).toBe(expected);
  });
});
