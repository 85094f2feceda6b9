export type AppError = {
  code: string;
  message: string;
  details?: unknown;
  retryable?: boolean;
};

export class AppErrorException extends Error {
  code: string;
  details?: unknown;
  retryable: boolean;

  constructor(err: AppError, options?: { cause?: unknown }) {
    super(`${err.code}: ${err.message}`, options);
    this.name = "AppErrorException";
    this.code = err.code;
    this.details = err.details;
    this.retryable = err.retryable ?? false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object";
}

export function isAppError(value: unknown): value is AppError {
  if (!isRecord(value)) return false;
  return (
    typeof value.code === "string" &&
    typeof value.message === "string" &&
    (value.retryable === undefined || typeof value.retryable === "boolean")
  );
}

export function extractAppError(err: unknown): AppError | null {
  if (err instanceof AppErrorException) {
    return { code: err.code, message: err.message.replace(/^[^:]+:\s*/, ""), details: err.details, retryable: err.retryable };
  }

  if (isAppError(err)) return err;

  if (isRecord(err) && "error" in err && isAppError(err.error)) {
    return err.error;
  }

  return null;
}

function formatDetails(details: unknown): string {
  if (details == null) return "";
  if (typeof details === "string") return details;
  try {
    return JSON.stringify(details, null, 2);
  } catch {
    return String(details);
  }
}

export function formatError(err: unknown): string {
  const appErr = extractAppError(err);
  if (appErr) {
    const details = appErr.details != null ? `\n\nDetails:\n${formatDetails(appErr.details)}` : "";
    return `${appErr.code}: ${appErr.message}${details}`;
  }
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

/** Wraps a failure from an outside call under `code`, keeping AppErrors as they are. */
export function toAppErrorException(err: unknown, code: string, message: string): AppErrorException {
  if (err instanceof AppErrorException) return err;
  return new AppErrorException({ code, message, details: formatError(err) }, { cause: err });
}
