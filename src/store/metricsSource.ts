// src/store/metricsSource.ts
// Binds the SQL readers to one DbAdapter snapshot.

import type { DbAdapter } from "../db/types.js";
import type { MetricsReadView, MetricsSource } from "../metrics/types.js";
import { createDocStatusReader } from "./docStatus.js";
import { createGraphReader } from "./graph.js";

export function createSqlMetricsSource(db: DbAdapter): MetricsSource {
  return {
    readSnapshot<T>(fn: (view: MetricsReadView) => Promise<T>): Promise<T> {
      return db.snapshot((tx) =>
        fn({
          documents: createDocStatusReader(tx),
          graph: createGraphReader(tx),
        })
      );
    },
  };
}
