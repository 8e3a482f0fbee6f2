// pattern: Functional Core
import { z } from "zod";
import type { ValidationResult } from "./types";

const bodySchema = z.record(z.string(), z.unknown());
const homeworksSchema = z.array(z.unknown());
const currentDateSchema = z.number().int();

/**
 * Checks the shape of a decoded poll response. `homeworks` must be a list and
 * `current_date` an integer timestamp; record contents are left to the parser.
 */
export function validateResponse(raw: unknown): ValidationResult {
  const body = bodySchema.safeParse(raw);
  if (!body.success) {
    return { success: false, error: { kind: "MalformedBody" } };
  }

  const homeworks = homeworksSchema.safeParse(body.data["homeworks"]);
  if (!homeworks.success) {
    return { success: false, error: { kind: "MalformedHomeworksField" } };
  }

  const currentDate = currentDateSchema.safeParse(body.data["current_date"]);
  if (!currentDate.success) {
    return { success: false, error: { kind: "MalformedCurrentDateField" } };
  }

  return {
    success: true,
    response: { homeworks: homeworks.data, currentDate: currentDate.data },
  };
}
