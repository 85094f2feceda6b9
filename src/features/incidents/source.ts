import { readFile } from "node:fs/promises";

import { AppErrorException, formatError } from "../../lib/errors";
import {
  IncidentExportSchema,
  describeIssues,
  type IncidentExport,
  type IncidentRecordInput,
  type Language,
  type RelationshipEdge,
} from "../../lib/schemas";

/**
 * Boundary to the ticketing store. Records come back in their raw shape and
 * are validated by the caller.
 */
export interface IncidentSource {
  /** Incidents whose state is Active, with display labels in `language`. */
  fetchActiveIncidents(language: Language): Promise<readonly IncidentRecordInput[]>;
  /** Edges in the order the store returns them. */
  fetchRelationshipEdges(incidentId: string): Promise<readonly RelationshipEdge[]>;
}

export const ACTIVE_STATE = "Active";

export function isActive(incident: IncidentExport["incidents"][number]): boolean {
  return (incident.state ?? incident.status) === ACTIVE_STATE;
}

/** Serves an already-parsed export. Labels are taken as exported, whatever the language. */
export function createExportSource(data: IncidentExport): IncidentSource {
  return {
    async fetchActiveIncidents() {
      return data.incidents.filter(isActive);
    },
    async fetchRelationshipEdges(incidentId) {
      return data.relationships[incidentId] ?? [];
    },
  };
}

export function parseIncidentExport(text: string, origin: string): IncidentExport {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new AppErrorException({ code: "SOURCE_INVALID", message: `${origin} is not valid JSON`, details: formatError(e) });
  }

  const parsed = IncidentExportSchema.safeParse(json);
  if (!parsed.success) {
    throw new AppErrorException({
      code: "SOURCE_INVALID",
      message: `${origin} does not look like an incident export`,
      details: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}

export async function loadJsonFileSource(path: string): Promise<IncidentSource> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new AppErrorException({ code: "SOURCE_INVALID", message: `Cannot read ${path}`, details: formatError(e) }, { cause: e });
  }
  return createExportSource(parseIncidentExport(text, path));
}
