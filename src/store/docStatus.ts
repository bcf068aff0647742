// src/store/docStatus.ts
// Read side of the doc_status table: grouped status tallies per scope.
//
// Tables: doc_status

import type { DbAdapter } from "../db/types.js";
import { parseStatusTally, type StatusTallyRow } from "../metrics/records.js";
import { scopeFilter } from "../metrics/scope.js";
import type { DocumentStatusReader, StatusTally, WorkspaceScope } from "../metrics/types.js";

/* ---------- Duplicate Flag Expressions ---------- */

/**
 * `metadata.is_duplicate` as text, or NULL.
 *
 * PostgreSQL: metadata is JSONB, so `->>` always works and yields 'true' /
 * 'false' for booleans.
 *
 * SQLite: metadata is TEXT and may hold anything. json_valid() guards the
 * JSON functions so a malformed row reads as NULL instead of aborting the
 * query; json_type() keeps booleans as 'true'/'false' rather than 1/0 so
 * both dialects return the same text.
 */
const DUPLICATE_FLAG_SQL = {
  postgresql: `metadata->>'is_duplicate'`,
  sqlite: `CASE WHEN json_valid(metadata) THEN
      CASE json_type(metadata, '$.is_duplicate')
        WHEN 'true' THEN 'true'
        WHEN 'false' THEN 'false'
        ELSE CAST(json_extract(metadata, '$.is_duplicate') AS TEXT)
      END
    END`,
} as const;

export function buildStatusTallySql(
  dbType: DbAdapter["dbType"],
  scope: WorkspaceScope
): { sql: string; params: unknown[] } {
  const { where, params } = scopeFilter(scope);
  const sql = `
    SELECT
      workspace,
      status,
      ${DUPLICATE_FLAG_SQL[dbType]} AS duplicate_flag,
      COUNT(*) AS count
    FROM doc_status
    ${where}
    GROUP BY 1, 2, 3
  `;
  return { sql, params };
}

/* ---------- Reader ---------- */

/**
 * One GROUP BY over the scoped rows; the aggregator folds the groups into
 * buckets, queue depth and workspace count.
 */
export function createDocStatusReader(db: DbAdapter): DocumentStatusReader {
  return {
    async tallyStatuses(scope: WorkspaceScope): Promise<StatusTally[]> {
      const { sql, params } = buildStatusTallySql(db.dbType, scope);
      const rows = await db.queryAll<StatusTallyRow>(sql, params);
      return rows.map(parseStatusTally);
    },
  };
}
