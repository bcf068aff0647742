// src/metrics/aggregator.ts
// Single-snapshot aggregation of document status, queue depth, graph size
// and workspace count into one MetricsReport.

import { createLogger } from "../observability/logger.js";
import { MetricsError, StorageUnavailableError } from "./errors.js";
import { assertValidScope, scopeLabel } from "./scope.js";
import {
  ALL_WORKSPACES,
  QUEUED_STATUSES,
  type DocStatus,
  type GraphCounts,
  type MetricsReport,
  type MetricsSource,
  type StatusTally,
  type WorkspaceScope,
} from "./types.js";

const log = createLogger("metrics/aggregator");

/* ---------- Report Assembly ---------- */

function emptyDocumentCounts(): Record<DocStatus, number> {
  return {
    pending: 0,
    processing: 0,
    processed: 0,
    failed: 0,
    preprocessed: 0,
  };
}

/**
 * Fold status tallies and graph counts into a report in one pass.
 * Duplicates count in their status bucket but never in queue_depth.
 * Unknown statuses land in no bucket but their workspace still counts.
 */
export function buildMetricsReport(
  tallies: readonly StatusTally[],
  graph: GraphCounts
): MetricsReport {
  const documents = emptyDocumentCounts();
  const workspaces = new Set<string>();
  const unrecognized = new Set<string>();
  let queueDepth = 0;

  for (const tally of tallies) {
    if (tally.count <= 0) continue;
    workspaces.add(tally.workspace);

    if (tally.status === null) {
      unrecognized.add(tally.rawStatus);
      continue;
    }

    documents[tally.status] += tally.count;
    if (QUEUED_STATUSES.has(tally.status) && !tally.isDuplicate) {
      queueDepth += tally.count;
    }
  }

  if (unrecognized.size > 0) {
    log.debug({ statuses: [...unrecognized] }, "Ignoring unrecognized document statuses");
  }

  const report: MetricsReport = {
    status: "ok",
    documents: Object.freeze(documents),
    graph: Object.freeze({ nodes: graph.nodes, edges: graph.edges }),
    workspace_count: workspaces.size,
    queue_depth: queueDepth,
  };
  return Object.freeze(report);
}

/* ---------- Aggregator ---------- */

export class MetricsAggregator {
  constructor(private readonly source: MetricsSource) {}

  /**
   * Compute the report for a scope from one consistent snapshot.
   *
   * @throws InvalidScopeError before any read when the scope is malformed
   * @throws StorageUnavailableError when the snapshot or a read fails
   */
  async computeMetrics(scope: WorkspaceScope = ALL_WORKSPACES): Promise<MetricsReport> {
    assertValidScope(scope);
    const started = Date.now();

    let report: MetricsReport;
    try {
      report = await this.source.readSnapshot(async (view) => {
        const tallies = await view.documents.tallyStatuses(scope);
        const graph = await view.graph.countGraph(scope);
        return buildMetricsReport(tallies, graph);
      });
    } catch (err) {
      if (err instanceof MetricsError) throw err;
      log.error({ err, scope: scopeLabel(scope) }, "Metrics snapshot failed");
      throw new StorageUnavailableError(err);
    }

    log.debug(
      { scope: scopeLabel(scope), durationMs: Date.now() - started, queueDepth: report.queue_depth },
      "Metrics computed"
    );
    return report;
  }
}
