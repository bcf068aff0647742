// src/store/graph.ts
// Read side of the knowledge graph: node and edge counts per scope.
//
// Tables: graph_nodes, graph_edges

import type { DbAdapter } from "../db/types.js";
import { toCount } from "../metrics/records.js";
import { scopeFilter } from "../metrics/scope.js";
import type { GraphCounts, GraphReader, WorkspaceScope } from "../metrics/types.js";

interface GraphCountRow {
  nodes: unknown;
  edges: unknown;
}

export function createGraphReader(db: DbAdapter): GraphReader {
  return {
    /** Both counts in one statement, so they share a snapshot even outside a transaction */
    async countGraph(scope: WorkspaceScope): Promise<GraphCounts> {
      const nodes = scopeFilter(scope);
      const edges = scopeFilter(scope);
      const row = await db.queryOne<GraphCountRow>(
        `SELECT
           (SELECT COUNT(*) FROM graph_nodes ${nodes.where}) AS nodes,
           (SELECT COUNT(*) FROM graph_edges ${edges.where}) AS edges`,
        [...nodes.params, ...edges.params]
      );
      return {
        nodes: toCount(row?.nodes),
        edges: toCount(row?.edges),
      };
    },
  };
}
