import type { DiagnosticsLog } from "../../lib/diagnostics";
import { formatError } from "../../lib/errors";
import type { IncidentRecord, RelationshipEdge, RelationshipKind, RelationshipSummary, ResolvedIncident } from "../../lib/schemas";

export type EdgeFetcher = (incidentId: string) => Promise<readonly RelationshipEdge[]>;

export type SkippedIncident = {
  incidentId: string;
  reason: string;
};

export type ResolutionResult = {
  resolved: ResolvedIncident[];
  skipped: SkippedIncident[];
};

/**
 * Picks the first affected-user and assigned-to targets in the order the
 * source returned them, and counts relates-to edges.
 */
export function summarizeRelationships(edges: readonly RelationshipEdge[]): RelationshipSummary {
  const buckets: Record<RelationshipKind, string[]> = { relatesTo: [], affectedUser: [], assignedTo: [] };
  for (const edge of edges) {
    buckets[edge.kind].push(edge.targetDisplayName);
  }

  return {
    affectedUser: buckets.affectedUser[0] ?? "",
    assignedTo: buckets.assignedTo[0] ?? "",
    relatedCount: buckets.relatesTo.length,
  };
}

export async function resolveRelationships(
  incidents: readonly IncidentRecord[],
  fetchEdges: EdgeFetcher,
  log: DiagnosticsLog
): Promise<ResolutionResult> {
  const resolved: ResolvedIncident[] = [];
  const skipped: SkippedIncident[] = [];

  // One incident at a time; a failure drops only that incident.
  for (const incident of incidents) {
    try {
      const edges = await fetchEdges(incident.id);
      resolved.push({ ...incident, ...summarizeRelationships(edges) });
    } catch (e) {
      const reason = formatError(e);
      skipped.push({ incidentId: incident.id, reason });
      log.warn(`Skipping incident ${incident.id}: relationships could not be resolved (${reason})`, "Relationships");
    }
  }

  return { resolved, skipped };
}
