import { describe, expect, it } from "vitest";

import { DiagnosticsLog } from "../../lib/diagnostics";
import type { IncidentRecord, RelationshipEdge } from "../../lib/schemas";
import { resolveRelationships, summarizeRelationships } from "./relationships";

function incident(id: string): IncidentRecord {
  return { id, title: `Incident ${id}`, createdDate: new Date(2024, 0, 1), status: "Active", classification: null, tierQueue: null };
}

describe("summarizeRelationships", () => {
  it("returns empty names and a zero count without edges", () => {
    expect(summarizeRelationships([])).toEqual({ affectedUser: "", assignedTo: "", relatedCount: 0 });
  });

  it("takes the first target of each person kind in source order", () => {
    const edges: RelationshipEdge[] = [
      { kind: "relatesTo", targetDisplayName: "CR17" },
      { kind: "assignedTo", targetDisplayName: "Sam Berg" },
      { kind: "affectedUser", targetDisplayName: "Alex Lind" },
      { kind: "assignedTo", targetDisplayName: "Robin Ek" },
      { kind: "affectedUser", targetDisplayName: "Kim Holm" },
      { kind: "relatesTo", targetDisplayName: "PR3" },
    ];
    expect(summarizeRelationships(edges)).toEqual({ affectedUser: "Alex Lind", assignedTo: "Sam Berg", relatedCount: 2 });
  });

  it("counts duplicate relates-to edges", () => {
    const edges: RelationshipEdge[] = [
      { kind: "relatesTo", targetDisplayName: "CR17" },
      { kind: "relatesTo", targetDisplayName: "CR17" },
    ];
    expect(summarizeRelationships(edges).relatedCount).toBe(2);
  });
});

describe("resolveRelationships", () => {
  it("joins each incident with its summary and keeps input order", async () => {
    const edgesById: Record<string, RelationshipEdge[]> = {
      IR2: [{ kind: "assignedTo", targetDisplayName: "Sam Berg" }],
      IR1: [],
    };
    const log = new DiagnosticsLog({ echo: false });

    const res = await resolveRelationships([incident("IR2"), incident("IR1")], async (id) => edgesById[id] ?? [], log);

    expect(res.skipped).toEqual([]);
    expect(res.resolved.map((r) => [r.id, r.assignedTo, r.relatedCount])).toEqual([
      ["IR2", "Sam Berg", 0],
      ["IR1", "", 0],
    ]);
  });

  it("drops an incident whose edges cannot be fetched and logs a warning", async () => {
    const log = new DiagnosticsLog({ echo: false });
    const calls: string[] = [];

    const res = await resolveRelationships(
      [incident("IR1"), incident("IR2"), incident("IR3")],
      async (id) => {
        calls.push(id);
        if (id === "IR2") throw new Error("timeout");
        return [{ kind: "relatesTo", targetDisplayName: "PR1" }];
      },
      log
    );

    expect(calls).toEqual(["IR1", "IR2", "IR3"]);
    expect(res.resolved.map((r) => r.id)).toEqual(["IR1", "IR3"]);
    expect(res.skipped).toEqual([{ incidentId: "IR2", reason: "timeout" }]);

    const entries = log.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "warning",
      context: "Relationships",
      message: "Skipping incident IR2: relationships could not be resolved (timeout)",
    });
  });
});
