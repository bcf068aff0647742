// src/metrics/records.ts
// Parse-with-default for raw document-status rows.
//
// Rows come straight from the database. A bad value in one row must never
// fail the whole report, so every parser here returns a default instead of
// throwing:
//   status        unknown value       -> null (counted in no bucket)
//   is_duplicate  anything but true   -> false (counts toward the backlog)
//   count         non-numeric         -> 0

import { DOC_STATUSES, type DocStatus, type StatusTally } from "./types.js";

/** Row produced by the grouped doc_status query */
export interface StatusTallyRow {
  workspace: unknown;
  status: unknown;
  duplicate_flag: unknown;
  count: unknown;
}

export function isDocStatus(value: unknown): value is DocStatus {
  return typeof value === "string" && DOC_STATUSES.some((status) => status === value);
}

/** Exact, case-sensitive match against the five known statuses */
export function parseDocStatus(value: unknown): DocStatus | null {
  return isDocStatus(value) ? value : null;
}

/**
 * Only JSON `true` or the string "true" mark a duplicate.
 * PostgreSQL's `->>` hands booleans back as text, hence the string form.
 */
export function parseDuplicateFlag(value: unknown): boolean {
  return value === true || value === "true";
}

/**
 * pg returns COUNT(*) as a string (bigint); SQLite as a number.
 * Every form must be a positive safe integer; anything else, including a
 * count too large to hold exactly, reads as 0.
 */
export function toCount(value: unknown): number {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "bigint") {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) return 0;
    n = Number(value);
  } else if (typeof value === "string" && /^\d+$/.test(value)) {
    n = Number(value);
  } else {
    return 0;
  }
  return Number.isSafeInteger(n) && n > 0 ? n : 0;
}

export function parseStatusTally(row: StatusTallyRow): StatusTally {
  const rawStatus = row.status == null ? "" : String(row.status);
  return {
    workspace: row.workspace == null ? "" : String(row.workspace),
    status: parseDocStatus(row.status),
    rawStatus,
    isDuplicate: parseDuplicateFlag(row.duplicate_flag),
    count: toCount(row.count),
  };
}
