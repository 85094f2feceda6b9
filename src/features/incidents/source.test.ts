import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AppErrorException } from "../../lib/errors";
import { createExportSource, loadJsonFileSource, parseIncidentExport } from "./source";

const exportJson = JSON.stringify({
  incidents: [
    { id: "IR1", title: "Mail down", createdDate: "2024-05-01T08:00:00Z", status: "Aktiv", state: "Active" },
    { id: "IR2", title: "Old", createdDate: "2024-04-01T08:00:00Z", status: "Löst", state: "Resolved" },
    { id: 3, title: "VPN", createdDate: "2024-05-02T10:00:00Z", status: "Active", classification: "Network" },
    { id: "IR4", title: "Closed", createdDate: "2024-05-03T10:00:00Z", status: "Closed" },
  ],
  relationships: {
    IR1: [
      { kind: "affectedUser", targetDisplayName: "Alex Lind" },
      { kind: "relatesTo", targetDisplayName: "CR9" },
    ],
  },
});

describe("parseIncidentExport", () => {
  it("rejects malformed JSON", () => {
    expect(() => parseIncidentExport("{", "export.json")).toThrowError(/SOURCE_INVALID: export.json is not valid JSON/);
  });

  it("rejects exports with invalid records and names the field", () => {
    let caught: unknown = null;
    try {
      parseIncidentExport(JSON.stringify({ incidents: [{ id: "IR1", title: "x", status: "Active" }] }), "export.json");
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(AppErrorException);
    expect((caught as AppErrorException).code).toBe("SOURCE_INVALID");
    expect(String((caught as AppErrorException).details)).toContain("incidents.0.createdDate");
  });
});

describe("createExportSource", () => {
  const source = createExportSource(parseIncidentExport(exportJson, "export.json"));

  it("returns only incidents in the Active state", async () => {
    const incidents = await source.fetchActiveIncidents("sv");
    expect(incidents.map((i) => i.id)).toEqual(["IR1", "3"]);
  });

  it("returns edges in export order and nothing for unknown incidents", async () => {
    expect(await source.fetchRelationshipEdges("IR1")).toEqual([
      { kind: "affectedUser", targetDisplayName: "Alex Lind" },
      { kind: "relatesTo", targetDisplayName: "CR9" },
    ]);
    expect(await source.fetchRelationshipEdges("3")).toEqual([]);
  });
});

describe("loadJsonFileSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "incident-source-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads an export file from disk", async () => {
    const file = join(dir, "export.json");
    await writeFile(file, exportJson, "utf8");
    const source = await loadJsonFileSource(file);
    expect((await source.fetchActiveIncidents("en")).length).toBe(2);
  });

  it("reads the bundled sample export", async () => {
    const source = await loadJsonFileSource(fileURLToPath(new URL("../../../fixtures/sample-export.json", import.meta.url)));
    expect((await source.fetchActiveIncidents("sv")).map((i) => i.id)).toEqual(["1042", "1043", "1044"]);
    expect(await source.fetchRelationshipEdges("1043")).toEqual([{ kind: "assignedTo", targetDisplayName: "Robin Ek" }]);
  });

  it("reports a missing file as an invalid source", async () => {
    await expect(loadJsonFileSource(join(dir, "missing.json"))).rejects.toMatchObject({ code: "SOURCE_INVALID" });
  });
});
