import { z } from "zod";

import { AppErrorException } from "./errors";
import { DEFAULT_LANGUAGE, LanguageSchema, SortDirectionSchema, SortKeySchema, describeIssues } from "./schemas";

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v?.trim() ? v : undefined));

export const ReportOptionsSchema = z.object({
  input: z.string().trim().min(1, "an input file is required"),
  output: z.string().trim().min(1, "an output file is required"),
  title: optionalText,
  sort: SortKeySchema.default("createdDate"),
  direction: SortDirectionSchema.default("ascending"),
  classification: optionalText,
  tierQueue: optionalText,
  language: LanguageSchema.default(DEFAULT_LANGUAGE),
});
export type ReportOptions = z.output<typeof ReportOptionsSchema>;

/** What generation needs once the source is open. */
export type ReportSettings = Omit<ReportOptions, "input">;

export function parseReportOptions(raw: unknown): ReportOptions {
  const parsed = ReportOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppErrorException({
      code: "CONFIG_INVALID",
      message: "Report options are invalid",
      details: describeIssues(parsed.error),
    });
  }
  return parsed.data;
}
