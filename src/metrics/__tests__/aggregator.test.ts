import { describe, it, expect } from 'vitest';
import { MetricsAggregator, buildMetricsReport } from '../aggregator.js';
import { InvalidScopeError, StorageUnavailableError } from '../errors.js';
import { parseDocStatus } from '../records.js';
import {
  ALL_WORKSPACES,
  type MetricsReadView,
  type MetricsSource,
  type StatusTally,
  type WorkspaceScope,
} from '../types.js';

/* ============= In-memory source ============= */

interface FakeDoc {
  workspace: string;
  status: string;
  isDuplicate?: boolean;
}

interface FakeData {
  docs: FakeDoc[];
  nodes: string[]; // workspace of each node
  edges: string[]; // workspace of each edge
}

function inScope(workspace: string, scope: WorkspaceScope): boolean {
  return scope.kind === 'all' || scope.workspace === workspace;
}

function createFakeSource(data: FakeData) {
  const stats = { snapshots: 0, reads: 0 };

  const view: MetricsReadView = {
    documents: {
      async tallyStatuses(scope) {
        stats.reads += 1;
        const groups = new Map<string, StatusTally>();
        for (const doc of data.docs) {
          if (!inScope(doc.workspace, scope)) continue;
          const isDuplicate = doc.isDuplicate === true;
          const key = `${doc.workspace}|${doc.status}|${isDuplicate}`;
          const existing = groups.get(key);
          if (existing) {
            existing.count += 1;
          } else {
            groups.set(key, {
              workspace: doc.workspace,
              status: parseDocStatus(doc.status),
              rawStatus: doc.status,
              isDuplicate,
              count: 1,
            });
          }
        }
        return [...groups.values()];
      },
    },
    graph: {
      async countGraph(scope) {
        stats.reads += 1;
        return {
          nodes: data.nodes.filter((w) => inScope(w, scope)).length,
          edges: data.edges.filter((w) => inScope(w, scope)).length,
        };
      },
    },
  };

  const source: MetricsSource = {
    async readSnapshot(fn) {
      stats.snapshots += 1;
      return fn(view);
    },
  };

  return { source, stats };
}

function failingSource(error: unknown): MetricsSource {
  return {
    async readSnapshot() {
      throw error;
    },
  };
}

/** w1: 3 pending (1 duplicate), 2 failed, 1 processed. w2: 1 pending. */
const scenarioB: FakeData = {
  docs: [
    { workspace: 'w1', status: 'pending' },
    { workspace: 'w1', status: 'pending' },
    { workspace: 'w1', status: 'pending', isDuplicate: true },
    { workspace: 'w1', status: 'failed' },
    { workspace: 'w1', status: 'failed' },
    { workspace: 'w1', status: 'processed' },
    { workspace: 'w2', status: 'pending' },
  ],
  nodes: ['w1', 'w1', 'w1', 'w2', 'w2'],
  edges: ['w1', 'w1', 'w2'],
};

/* ============= computeMetrics ============= */

describe('MetricsAggregator.computeMetrics', () => {
  it('reports zeros for empty storage', async () => {
    const { source } = createFakeSource({ docs: [], nodes: [], edges: [] });
    const report = await new MetricsAggregator(source).computeMetrics();

    expect(report).toEqual({
      status: 'ok',
      documents: { pending: 0, processing: 0, processed: 0, failed: 0, preprocessed: 0 },
      graph: { nodes: 0, edges: 0 },
      workspace_count: 0,
      queue_depth: 0,
    });
  });

  it('counts duplicates in buckets but not in queue depth', async () => {
    const { source } = createFakeSource(scenarioB);
    const report = await new MetricsAggregator(source).computeMetrics(ALL_WORKSPACES);

    expect(report).toEqual({
      status: 'ok',
      documents: { pending: 4, processing: 0, processed: 1, failed: 2, preprocessed: 0 },
      graph: { nodes: 5, edges: 3 },
      workspace_count: 2,
      queue_depth: 5,
    });
  });

  it('restricts every count to a scoped workspace', async () => {
    const { source } = createFakeSource(scenarioB);
    const report = await new MetricsAggregator(source).computeMetrics({
      kind: 'workspace',
      workspace: 'w2',
    });

    expect(report).toEqual({
      status: 'ok',
      documents: { pending: 1, processing: 0, processed: 0, failed: 0, preprocessed: 0 },
      graph: { nodes: 2, edges: 1 },
      workspace_count: 1,
      queue_depth: 1,
    });
  });

  it('leaves unknown statuses out of every bucket and the queue', async () => {
    const { source } = createFakeSource({
      docs: [
        { workspace: 'w1', status: 'archived' },
        { workspace: 'w1', status: 'pending' },
        { workspace: 'w3', status: 'archived' },
      ],
      nodes: [],
      edges: [],
    });
    const report = await new MetricsAggregator(source).computeMetrics();

    expect(report.documents).toEqual({
      pending: 1,
      processing: 0,
      processed: 0,
      failed: 0,
      preprocessed: 0,
    });
    expect(report.queue_depth).toBe(1);
    // The workspace of an unknown-status record still counts.
    expect(report.workspace_count).toBe(2);
  });

  it('matches nothing for an unknown or empty workspace', async () => {
    const { source } = createFakeSource(scenarioB);
    const aggregator = new MetricsAggregator(source);

    for (const workspace of ['nope', '', 'W1']) {
      const report = await aggregator.computeMetrics({ kind: 'workspace', workspace });
      expect(report.workspace_count).toBe(0);
      expect(report.queue_depth).toBe(0);
      expect(report.graph).toEqual({ nodes: 0, edges: 0 });
    }
  });

  it('reads everything through one snapshot', async () => {
    const { source, stats } = createFakeSource(scenarioB);
    await new MetricsAggregator(source).computeMetrics();

    expect(stats.snapshots).toBe(1);
    expect(stats.reads).toBe(2);
  });

  it('returns identical reports for unchanged data', async () => {
    const { source } = createFakeSource(scenarioB);
    const aggregator = new MetricsAggregator(source);

    expect(await aggregator.computeMetrics()).toEqual(await aggregator.computeMetrics());
  });

  it('returns a frozen report', async () => {
    const { source } = createFakeSource(scenarioB);
    const report = await new MetricsAggregator(source).computeMetrics();

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.documents)).toBe(true);
  });

  it('rejects an invalid scope before reading', async () => {
    const { source, stats } = createFakeSource(scenarioB);
    const bogus: WorkspaceScope = JSON.parse('{"kind":"workspace","workspace":42}');

    await expect(new MetricsAggregator(source).computeMetrics(bogus)).rejects.toBeInstanceOf(
      InvalidScopeError
    );
    expect(stats.snapshots).toBe(0);
  });

  it('wraps storage failures', async () => {
    const cause = new Error('connection refused');
    const promise = new MetricsAggregator(failingSource(cause)).computeMetrics();

    await expect(promise).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(promise).rejects.toMatchObject({
      code: 'STORAGE_UNAVAILABLE',
      statusCode: 503,
      message: 'Metrics storage unavailable: connection refused',
      cause,
    });
  });

  it('passes metrics errors through unwrapped', async () => {
    const inner = new InvalidScopeError(42);
    await expect(
      new MetricsAggregator(failingSource(inner)).computeMetrics()
    ).rejects.toBe(inner);
  });
});

/* ============= buildMetricsReport ============= */

describe('buildMetricsReport', () => {
  const tally = (overrides: Partial<StatusTally>): StatusTally => ({
    workspace: 'w1',
    status: 'pending',
    rawStatus: 'pending',
    isDuplicate: false,
    count: 1,
    ...overrides,
  });

  it('keeps queue depth within pending + failed', () => {
    const report = buildMetricsReport(
      [
        tally({ count: 4 }),
        tally({ count: 2, isDuplicate: true }),
        tally({ status: 'failed', rawStatus: 'failed', count: 3, isDuplicate: true }),
        tally({ status: 'processing', rawStatus: 'processing', count: 5 }),
      ],
      { nodes: 0, edges: 0 }
    );

    expect(report.queue_depth).toBe(4);
    expect(report.documents.pending + report.documents.failed).toBe(9);
  });

  it('ignores empty groups entirely', () => {
    const report = buildMetricsReport([tally({ workspace: 'w9', count: 0 })], {
      nodes: 0,
      edges: 0,
    });

    expect(report.workspace_count).toBe(0);
    expect(report.documents.pending).toBe(0);
  });

  it('counts a workspace once across groups', () => {
    const report = buildMetricsReport(
      [
        tally({}),
        tally({ status: 'processed', rawStatus: 'processed' }),
        tally({ isDuplicate: true }),
      ],
      { nodes: 1, edges: 2 }
    );

    expect(report.workspace_count).toBe(1);
    expect(report.graph).toEqual({ nodes: 1, edges: 2 });
  });
});
