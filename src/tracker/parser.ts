// pattern: Functional Core
import { z } from "zod";
import type { StatusCatalog } from "./catalog";
import type { ParseResult } from "./types";

const submissionRecordSchema = z.object({
  homework_name: z.string(),
  status: z.string(),
});

export function renderStatusMessage(name: string, verdict: string): string {
  return `Changed review status for "${name}". ${verdict}`;
}

/**
 * Extracts name and status from a submission record and renders the
 * notification text for it.
 *
 * @returns MissingField when `homework_name` or `status` is absent or not a
 *          string, UnknownStatus when the catalog has no verdict for the code
 */
export function parseSubmission(
  record: unknown,
  catalog: StatusCatalog,
): ParseResult {
  const parsed = submissionRecordSchema.safeParse(record);
  if (!parsed.success) {
    // a non-object record has no path; report the first required key
    const key = parsed.error.issues[0]?.path[0];
    return {
      success: false,
      error: {
        kind: "MissingField",
        key: typeof key === "string" ? key : "homework_name",
      },
    };
  }

  const { homework_name: name, status } = parsed.data;

  const verdict = catalog.verdictFor(status);
  if (verdict === null) {
    return { success: false, error: { kind: "UnknownStatus", code: status } };
  }

  return {
    success: true,
    record: { name, status },
    message: renderStatusMessage(name, verdict),
  };
}
