import { describe, expect, it } from "vitest";

import { FALLBACK_STATUS_COLOR, statusColor, toReportRow } from "./report_row";

describe("statusColor", () => {
  it("maps the known states", () => {
    expect(statusColor("Active")).toBe("#f59e0b");
    expect(statusColor("Resolved")).toBe("#10b981");
    expect(statusColor("Closed")).toBe("#6b7280");
  });

  it("falls back for any other label", () => {
    expect(statusColor("Pending")).toBe(FALLBACK_STATUS_COLOR);
    expect(statusColor("")).toBe(FALLBACK_STATUS_COLOR);
    expect(statusColor("active")).toBe(FALLBACK_STATUS_COLOR);
  });
});

describe("toReportRow", () => {
  it("formats the created date and resolves the color", () => {
    const row = toReportRow({
      id: "IR7",
      title: "Mail down",
      createdDate: new Date(2024, 4, 1, 8, 30, 12),
      status: "Resolved",
      classification: null,
      tierQueue: null,
      affectedUser: "",
      assignedTo: "",
      relatedCount: 0,
    });
    expect(row.created).toBe("2024-05-01 08:30");
    expect(row.color).toBe("#10b981");
  });
});
