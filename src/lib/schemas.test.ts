import { describe, expect, it } from "vitest";

import { IncidentExportSchema, IncidentRecordSchema, RelationshipEdgeSchema } from "./schemas";

describe("IncidentRecordSchema", () => {
  it("normalizes numeric ids and ISO dates", () => {
    const rec = IncidentRecordSchema.parse({
      id: 42,
      title: "Printer offline",
      createdDate: "2024-05-01T08:30:00Z",
      status: "Active",
      classification: "Hardware",
    });
    expect(rec.id).toBe("42");
    expect(rec.createdDate.toISOString()).toBe("2024-05-01T08:30:00.000Z");
    expect(rec.classification).toBe("Hardware");
    expect(rec.tierQueue).toBeNull();
  });

  it("treats empty optional labels as absent", () => {
    const rec = IncidentRecordSchema.parse({ id: "IR1", title: "x", createdDate: 0, status: "Active", classification: "" });
    expect(rec.classification).toBeNull();
  });

  it("rejects a missing created date instead of defaulting it", () => {
    const res = IncidentRecordSchema.safeParse({ id: "IR1", title: "x", createdDate: null, status: "Active" });
    expect(res.success).toBe(false);
  });

  it("rejects unparseable dates", () => {
    const res = IncidentRecordSchema.safeParse({ id: "IR1", title: "x", createdDate: "not a date", status: "Active" });
    expect(res.success).toBe(false);
  });
});

describe("RelationshipEdgeSchema", () => {
  it("accepts only the three relationship kinds", () => {
    expect(RelationshipEdgeSchema.safeParse({ kind: "assignedTo", targetDisplayName: "Kim" }).success).toBe(true);
    expect(RelationshipEdgeSchema.safeParse({ kind: "ownedBy", targetDisplayName: "Kim" }).success).toBe(false);
  });
});

describe("IncidentExportSchema", () => {
  it("defaults the relationship map to empty", () => {
    const parsed = IncidentExportSchema.parse({ incidents: [] });
    expect(parsed.relationships).toEqual({});
  });
});
