import { format } from "date-fns";

export const DISPLAY_DATE_FORMAT = "yyyy-MM-dd HH:mm";

/** Local wall-clock time, minute precision. */
export function formatDisplayDate(date: Date): string {
  return format(date, DISPLAY_DATE_FORMAT);
}

export function displayText(value: string | null | undefined): string {
  return value ?? "";
}
