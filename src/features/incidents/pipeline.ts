import { AppErrorException } from "../../lib/errors";
import type { IncidentRecord, SortDirection, SortKey } from "../../lib/schemas";

export type IncidentFilters = {
  classification?: string;
  tierQueue?: string;
};

export type SortOptions = {
  key: SortKey;
  direction?: SortDirection;
};

export type PipelineOptions = {
  filters?: IncidentFilters;
  sort: SortOptions;
};

type Sortable = Pick<IncidentRecord, "id" | "title" | "createdDate">;
type Filterable = Pick<IncidentRecord, "classification" | "tierQueue">;
type Comparator<T> = (a: T, b: T) => number;

const REGEXP_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const NUMERIC_ID = /^\d+$/;

// Root collation: row order must not change with the report language.
const TITLE_COLLATOR = new Intl.Collator("und");

/** `*` matches any run, `?` one character; the whole value must match, ignoring case. */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(REGEXP_SPECIALS, "\\$&");
  }
  return new RegExp(`^${source}$`, "isu");
}

export function matchesWildcard(value: string | null | undefined, pattern: string | null | undefined): boolean {
  if (!pattern) return true;
  if (!value) return false;
  return wildcardToRegExp(pattern).test(value);
}

export function filterIncidents<T extends Filterable>(items: readonly T[], filters: IncidentFilters = {}): T[] {
  const { classification, tierQueue } = filters;
  return items.filter((item) => matchesWildcard(item.classification, classification) && matchesWildcard(item.tierQueue, tierQueue));
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareDigits(a: string, b: string): number {
  const x = a.replace(/^0+(?=\d)/, "");
  const y = b.replace(/^0+(?=\d)/, "");
  if (x.length !== y.length) return x.length - y.length;
  return compareCodeUnits(x, y);
}

/** All-digit ids sort numerically and ahead of the rest; other ids by code units. */
export function compareIds(a: string, b: string): number {
  const aNumeric = NUMERIC_ID.test(a);
  const bNumeric = NUMERIC_ID.test(b);
  if (aNumeric && bNumeric) return compareDigits(a, b);
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  return compareCodeUnits(a, b);
}

export function comparatorFor<T extends Sortable>(key: SortKey): Comparator<T> {
  switch (key) {
    case "id":
      return (a, b) => compareIds(a.id, b.id);
    case "createdDate":
      return (a, b) => a.createdDate.getTime() - b.createdDate.getTime();
    case "title":
      return (a, b) => TITLE_COLLATOR.compare(a.title, b.title);
    default: {
      const unsupported: never = key;
      throw new AppErrorException({ code: "SORT_KEY_UNSUPPORTED", message: `Cannot sort incidents by "${String(unsupported)}"` });
    }
  }
}

/** Stable in both directions: ties keep their input order. */
export function sortIncidents<T extends Sortable>(items: readonly T[], options: SortOptions): T[] {
  const compare = comparatorFor<T>(options.key);
  const directed: Comparator<T> = options.direction === "descending" ? (a, b) => compare(b, a) : compare;
  return [...items].sort(directed);
}

export function applyPipeline<T extends Sortable & Filterable>(items: readonly T[], options: PipelineOptions): T[] {
  return sortIncidents(filterIncidents(items, options.filters), options.sort);
}
