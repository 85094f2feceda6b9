import { describe, expect, it } from "vitest";

import { displayText, formatDisplayDate } from "./format";

describe("formatDisplayDate", () => {
  it("formats local time to the minute", () => {
    expect(formatDisplayDate(new Date(2024, 0, 9, 7, 5, 59))).toBe("2024-01-09 07:05");
  });
});

describe("displayText", () => {
  it("renders absent values as empty strings", () => {
    expect(displayText(null)).toBe("");
    expect(displayText(undefined)).toBe("");
    expect(displayText("Hardware")).toBe("Hardware");
  });
});
