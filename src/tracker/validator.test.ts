import { describe, it, expect } from "vitest";
import { validateResponse } from "./validator";

describe("validateResponse", () => {
  it("should accept a response with a homework list and current_date", () => {
    const result = validateResponse({
      homeworks: [{ homework_name: "X", status: "approved" }],
      current_date: 100,
    });

    expect(result).toEqual({
      success: true,
      response: {
        homeworks: [{ homework_name: "X", status: "approved" }],
        currentDate: 100,
      },
    });
  });

  it("should accept an empty homework list", () => {
    const result = validateResponse({ homeworks: [], current_date: 1 });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.response.homeworks).toHaveLength(0);
    }
  });

  it("should reject a response without homeworks", () => {
    const result = validateResponse({ current_date: 100 });

    expect(result).toEqual({
      success: false,
      error: { kind: "MalformedHomeworksField" },
    });
  });

  it("should reject homeworks that is not a list", () => {
    const result = validateResponse({
      homeworks: { homework_name: "X", status: "approved" },
      current_date: 100,
    });

    expect(result).toEqual({
      success: false,
      error: { kind: "MalformedHomeworksField" },
    });
  });

  it("should reject a missing or fractional current_date", () => {
    expect(validateResponse({ homeworks: [] })).toEqual({
      success: false,
      error: { kind: "MalformedCurrentDateField" },
    });
    expect(validateResponse({ homeworks: [], current_date: 1.5 })).toEqual({
      success: false,
      error: { kind: "MalformedCurrentDateField" },
    });
    expect(validateResponse({ homeworks: [], current_date: "100" })).toEqual({
      success: false,
      error: { kind: "MalformedCurrentDateField" },
    });
  });

  it("should reject bodies that are not JSON objects", () => {
    for (const raw of [null, "homeworks", 42, [{ homeworks: [] }]]) {
      expect(validateResponse(raw)).toEqual({
        success: false,
        error: { kind: "MalformedBody" },
      });
    }
  });
});
