import { formatDisplayDate } from "../../lib/format";
import type { ResolvedIncident } from "../../lib/schemas";

export const FILTER_FIELDS = ["classification", "affectedUser", "assignedTo", "tierQueue"] as const;
export type FilterField = (typeof FILTER_FIELDS)[number];

export const COLLAPSED_GLYPH = "+";
export const EXPANDED_GLYPH = "–";

export const STATUS_COLORS: ReadonlyMap<string, string> = new Map([
  ["Active", "#f59e0b"],
  ["Resolved", "#10b981"],
  ["Closed", "#6b7280"],
]);
export const FALLBACK_STATUS_COLOR = "#fbbf24";

export function statusColor(status: string): string {
  return STATUS_COLORS.get(status) ?? FALLBACK_STATUS_COLOR;
}

export type ReportRow = {
  incident: ResolvedIncident;
  created: string;
  color: string;
};

export function toReportRow(incident: ResolvedIncident): ReportRow {
  return {
    incident,
    created: formatDisplayDate(incident.createdDate),
    color: statusColor(incident.status),
  };
}
