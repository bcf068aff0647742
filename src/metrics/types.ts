// src/metrics/types.ts
// Document/graph metrics: scope, reader contracts and the report shape

/* ---------- Document Status ---------- */

export type DocStatus =
  | "pending"
  | "processing"
  | "processed"
  | "failed"
  | "preprocessed";

export const DOC_STATUSES: readonly DocStatus[] = [
  "pending",
  "processing",
  "processed",
  "failed",
  "preprocessed",
];

/** Statuses that count toward the actionable backlog */
export const QUEUED_STATUSES: ReadonlySet<DocStatus> = new Set<DocStatus>([
  "pending",
  "failed",
]);

/* ---------- Scope ---------- */

export type WorkspaceScope =
  | { readonly kind: "all" }
  | { readonly kind: "workspace"; readonly workspace: string };

export const ALL_WORKSPACES: WorkspaceScope = Object.freeze({ kind: "all" });

/* ---------- Reader Contracts ---------- */

/**
 * One group of document-status rows sharing workspace, status and duplicate
 * flag. `count` rows collapse into one tally so a reader can push the
 * grouping down to the database.
 */
export interface StatusTally {
  workspace: string;
  /** null when the stored status is outside the known set */
  status: DocStatus | null;
  /** Stored value, kept for logging unrecognized statuses */
  rawStatus: string;
  isDuplicate: boolean;
  count: number;
}

export interface GraphCounts {
  nodes: number;
  edges: number;
}

export interface DocumentStatusReader {
  tallyStatuses(scope: WorkspaceScope): Promise<StatusTally[]>;
}

export interface GraphReader {
  countGraph(scope: WorkspaceScope): Promise<GraphCounts>;
}

export interface MetricsReadView {
  documents: DocumentStatusReader;
  graph: GraphReader;
}

/**
 * Hands out readers bound to a single consistent snapshot of storage.
 * Everything `fn` reads must come from the same point in time.
 */
export interface MetricsSource {
  readSnapshot<T>(fn: (view: MetricsReadView) => Promise<T>): Promise<T>;
}

/* ---------- Report ---------- */

export type DocumentCounts = Readonly<Record<DocStatus, number>>;

export interface MetricsReport {
  readonly status: "ok";
  readonly documents: DocumentCounts;
  readonly graph: Readonly<GraphCounts>;
  readonly workspace_count: number;
  readonly queue_depth: number;
}
