import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { applyPipeline } from "../features/incidents/pipeline";
import { resolveRelationships, type EdgeFetcher, type SkippedIncident } from "../features/incidents/relationships";
import type { IncidentSource } from "../features/incidents/source";
import { renderReport } from "../features/report/render";
import type { ReportSettings } from "./config";
import type { DiagnosticsLog } from "./diagnostics";
import { AppErrorException, toAppErrorException } from "./errors";
import { createCatalog } from "./i18n";
import { IncidentListSchema, RelationshipEdgeListSchema, describeIssues, type IncidentRecord } from "./schemas";

const CONTEXT = "Report";

export type GenerateReportRequest = {
  source: IncidentSource;
  options: ReportSettings;
  log: DiagnosticsLog;
  now?: () => Date;
};

export type GenerateReportResult = {
  outputPath: string;
  rowCount: number;
  skipped: SkippedIncident[];
  generatedAt: Date;
};

async function fetchIncidents(source: IncidentSource, options: ReportSettings): Promise<IncidentRecord[]> {
  let raw: unknown;
  try {
    raw = await source.fetchActiveIncidents(options.language);
  } catch (e) {
    throw toAppErrorException(e, "SOURCE_FETCH_FAILED", "Active incidents could not be fetched");
  }

  const parsed = IncidentListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppErrorException({
      code: "SOURCE_FETCH_FAILED",
      message: "The source returned malformed incidents",
      details: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}

function validatedEdges(source: IncidentSource): EdgeFetcher {
  return async (incidentId) => {
    const parsed = RelationshipEdgeListSchema.safeParse(await source.fetchRelationshipEdges(incidentId));
    if (!parsed.success) {
      throw new AppErrorException({
        code: "SOURCE_INVALID",
        message: "malformed relationship edges",
        details: describeIssues(parsed.error),
      });
    }
    return parsed.data;
  };
}

/**
 * Fetches, resolves, filters, sorts and renders active incidents, then
 * writes the report. Nothing is written when the initial fetch fails;
 * filesystem errors are rethrown untouched.
 */
export async function generateReport(request: GenerateReportRequest): Promise<GenerateReportResult> {
  const { source, options, log } = request;
  const generatedAt = (request.now ?? (() => new Date()))();

  log.info(`Fetching active incidents (${options.language})`, CONTEXT);
  const incidents = await fetchIncidents(source, options);
  log.info(`Fetched ${incidents.length} active incidents`, CONTEXT);

  const { resolved, skipped } = await resolveRelationships(incidents, validatedEdges(source), log);
  if (skipped.length > 0) {
    log.warn(`${skipped.length} incident(s) skipped while resolving relationships`, CONTEXT);
  }

  const rows = applyPipeline(resolved, {
    filters: { classification: options.classification, tierQueue: options.tierQueue },
    sort: { key: options.sort, direction: options.direction },
  });
  log.info(`${rows.length} of ${resolved.length} incidents match the filters`, CONTEXT);

  const catalog = await createCatalog(options.language);
  const html = renderReport({ incidents: rows, catalog, title: options.title, generatedAt });

  const outputPath = resolve(options.output);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, html, "utf8");
  log.success(`Wrote ${rows.length} incidents to ${outputPath}`, CONTEXT);

  return { outputPath, rowCount: rows.length, skipped, generatedAt };
}
