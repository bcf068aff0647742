// src/metrics/scope.ts
// Workspace scope resolution and SQL filter building

import { InvalidScopeError } from "./errors.js";
import { ALL_WORKSPACES, type WorkspaceScope } from "./types.js";

/**
 * Map an external workspace parameter onto a scope.
 *
 * - `undefined` / `null` -> every workspace
 * - any string, including "" -> exact match on that identifier
 * - anything else -> InvalidScopeError
 *
 * The empty string is a filter that normally matches nothing; it is not an
 * alias for "all".
 */
export function resolveScope(input: unknown): WorkspaceScope {
  if (input === undefined || input === null) return ALL_WORKSPACES;
  if (typeof input === "string") return { kind: "workspace", workspace: input };
  throw new InvalidScopeError(input);
}

/**
 * Runtime check for scope objects handed in by callers that bypass the
 * type system (JSON bodies, plain JS).
 */
export function assertValidScope(scope: unknown): asserts scope is WorkspaceScope {
  if (typeof scope !== "object" || scope === null) {
    throw new InvalidScopeError(scope);
  }
  if (!("kind" in scope)) throw new InvalidScopeError(scope);
  if (scope.kind === "all") return;
  if (scope.kind === "workspace" && "workspace" in scope && typeof scope.workspace === "string") {
    return;
  }
  throw new InvalidScopeError(scope);
}

/** Label used for logs and Prometheus series */
export function scopeLabel(scope: WorkspaceScope): string {
  return scope.kind === "all" ? "all" : `workspace:${scope.workspace}`;
}

/**
 * WHERE fragment for a table with a `workspace` column.
 * Unscoped reads get no predicate at all rather than `? IS NULL OR ...`,
 * which PostgreSQL cannot type.
 */
export function scopeFilter(
  scope: WorkspaceScope,
  column = "workspace"
): { where: string; params: unknown[] } {
  if (scope.kind === "all") return { where: "", params: [] };
  return { where: `WHERE ${column} = ?`, params: [scope.workspace] };
}
