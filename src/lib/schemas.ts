import { z } from "zod";

export const SUPPORTED_LANGUAGES = ["sv", "en"] as const;
export const LanguageSchema = z.enum(SUPPORTED_LANGUAGES);
export type Language = z.infer<typeof LanguageSchema>;
export const DEFAULT_LANGUAGE: Language = "sv";

export const SORT_KEYS = ["id", "createdDate", "title"] as const;
export const SortKeySchema = z.enum(SORT_KEYS);
export type SortKey = z.infer<typeof SortKeySchema>;

export const SortDirectionSchema = z.enum(["ascending", "descending"]);
export type SortDirection = z.infer<typeof SortDirectionSchema>;

export const RELATIONSHIP_KINDS = ["relatesTo", "affectedUser", "assignedTo"] as const;
export const RelationshipKindSchema = z.enum(RELATIONSHIP_KINDS);
export type RelationshipKind = z.infer<typeof RelationshipKindSchema>;

export const RelationshipEdgeSchema = z.object({
  kind: RelationshipKindSchema,
  targetDisplayName: z.string(),
});
export type RelationshipEdge = z.infer<typeof RelationshipEdgeSchema>;

export const RelationshipEdgeListSchema = z.array(RelationshipEdgeSchema);

const optionalLabel = z
  .string()
  .nullish()
  .transform((v) => (v == null || v === "" ? null : v));

export const IncidentRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform((v) => String(v)),
  title: z.string(),
  createdDate: z.union([z.string(), z.number(), z.date()]).pipe(z.coerce.date()),
  status: z.string(),
  classification: optionalLabel,
  tierQueue: optionalLabel,
});
export type IncidentRecord = z.output<typeof IncidentRecordSchema>;

export const IncidentListSchema = z.array(IncidentRecordSchema);

/** Export file read by the JSON incident source. `state` is the raw, untranslated work item state. */
export const IncidentExportSchema = z.object({
  incidents: z.array(IncidentRecordSchema.extend({ state: z.string().optional() })),
  relationships: z.record(z.string(), RelationshipEdgeListSchema).default({}),
});
export type IncidentExport = z.output<typeof IncidentExportSchema>;

export type RelationshipSummary = {
  affectedUser: string;
  assignedTo: string;
  relatedCount: number;
};

export type ResolvedIncident = IncidentRecord & RelationshipSummary;

export type IncidentRecordInput = z.input<typeof IncidentRecordSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("\n");
}
