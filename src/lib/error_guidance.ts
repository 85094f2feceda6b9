import { extractAppError, formatError } from "./errors";

export function guidanceForReportErrorCode(code: string): string | null {
  switch (code) {
    case "CONFIG_INVALID":
      return "Check the command line flags. --input and --output are required; --sort takes id, createdDate or title; --language takes sv or en.";
    case "SOURCE_INVALID":
      return "The incident export could not be read. Point --input at a JSON file with an incidents array and a relationships map.";
    case "SOURCE_FETCH_FAILED":
      return "Active incidents could not be fetched. No report was written; fix the source and run again.";
    case "I18N_KEY_UNKNOWN":
      return "A label is missing from the locale files. Add the key to every file under src/locales.";
    case "I18N_CATALOG_INCOMPLETE":
      return "The locale files disagree on their keys. Every language must define the same set of labels.";
    case "SORT_KEY_UNSUPPORTED":
      return "Sort by id, createdDate or title.";
    default:
      return null;
  }
}

/** Printable failure: the formatted error, then advice when the code has any. */
export function describeFailure(err: unknown): string {
  const message = formatError(err);
  const code = extractAppError(err)?.code;
  const guidance = code ? guidanceForReportErrorCode(code) : null;
  return guidance ? `${message}\n\n${guidance}` : message;
}
