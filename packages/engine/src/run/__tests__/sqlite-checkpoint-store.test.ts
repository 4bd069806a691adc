/**
 * SQLite Checkpoint Store Tests
 *
 * Uses in-memory databases only.
 */

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { counterLoopDescriptor, quietLogger, testRegistry } from '../../__tests__/fixtures.js';
import { buildGraph } from '../../graph/model.js';
import type { RunCheckpoint } from '../checkpoint.js';
import { StepLimitExceededError } from '../errors.js';
import { Orchestrator } from '../orchestrator.js';
import { SqliteCheckpointStore } from '../sqlite-checkpoint-store.js';

function checkpoint(executionId: string, workflowId: string, savedAt: string): RunCheckpoint {
  return {
    executionId,
    workflowId,
    status: 'running',
    state: { values: { count: 2, tags: ['a'] }, revision: 3, metadata: { source: 'test' } },
    history: [
      {
        revision: 1,
        nodeId: 'A',
        kind: 'node',
        timestamp: new Date('2026-03-01T10:00:00.000Z'),
        delta: { count: 1 },
        removed: [],
        attempt: 1,
        durationMs: 4,
      },
    ],
    historyDropped: 0,
    frontier: [],
    pendingRoute: { nodeId: 'A', next: ['B'] },
    stepCount: 3,
    config: { label: 'nightly' },
    startedAt: new Date('2026-03-01T09:59:59.000Z'),
    savedAt: new Date(savedAt),
  };
}

describe('SqliteCheckpointStore', () => {
  let store: SqliteCheckpointStore;

  beforeEach(() => {
    store = new SqliteCheckpointStore();
  });

  afterEach(() => {
    store.close();
  });

  it('should load what was saved, with dates revived', () => {
    const saved = checkpoint('exec-1', 'wf', '2026-03-01T10:00:01.000Z');
    store.save('exec-1', saved);

    const loaded = store.load('exec-1');
    expect(loaded).toEqual(saved);
    expect(loaded?.history[0].timestamp).toBeInstanceOf(Date);
    expect(loaded?.savedAt.toISOString()).toBe('2026-03-01T10:00:01.000Z');
  });

  it('should return null for unknown executions', () => {
    expect(store.load('missing')).toBeNull();
  });

  it('should replace the checkpoint of an execution', () => {
    store.save('exec-1', checkpoint('exec-1', 'wf', '2026-03-01T10:00:01.000Z'));
    store.save('exec-1', { ...checkpoint('exec-1', 'wf', '2026-03-01T10:00:02.000Z'), status: 'completed' });

    expect(store.load('exec-1')?.status).toBe('completed');
    expect(store.listExecutions('wf')).toEqual(['exec-1']);
  });

  it('should delete checkpoints', () => {
    store.save('exec-1', checkpoint('exec-1', 'wf', '2026-03-01T10:00:01.000Z'));

    expect(store.delete('exec-1')).toBe(true);
    expect(store.delete('exec-1')).toBe(false);
    expect(store.load('exec-1')).toBeNull();
  });

  it('should list executions of a workflow, newest first', () => {
    store.save('exec-old', checkpoint('exec-old', 'wf', '2026-03-01T10:00:01.000Z'));
    store.save('exec-new', checkpoint('exec-new', 'wf', '2026-03-01T11:00:00.000Z'));
    store.save('exec-other', checkpoint('exec-other', 'other', '2026-03-01T12:00:00.000Z'));

    expect(store.listExecutions('wf')).toEqual(['exec-new', 'exec-old']);
    expect(store.listExecutions('none')).toEqual([]);
  });

  it('should reject payloads that are not checkpoints', () => {
    const db = new Database(':memory:');
    const shared = new SqliteCheckpointStore({ db });
    db.prepare(
      `INSERT INTO checkpoints (execution_id, workflow_id, status, step_count, payload, saved_at)
       VALUES ('exec-bad', 'wf', 'running', 1, '{"executionId":"exec-bad"}', '2026-03-01T10:00:00.000Z')`
    ).run();

    expect(() => shared.load('exec-bad')).toThrow();
    shared.close();
  });

  it('should resume a failed run through the orchestrator', async () => {
    const registry = testRegistry();
    const graph = buildGraph(counterLoopDescriptor(), { registry: registry.snapshot(), logger: quietLogger() });
    const orchestrator = new Orchestrator({ registry, logger: quietLogger(), checkpointStore: store });

    expect(() => orchestrator.run(graph, {}, { executionId: 'exec-sqlite', maxSteps: 2 })).toThrow(
      StepLimitExceededError
    );
    expect(store.load('exec-sqlite')).toMatchObject({ status: 'failed', frontier: ['B'], stepCount: 2 });

    const resumed = await orchestrator.loadRun(graph, 'exec-sqlite', 'sync', { maxSteps: 10 });
    expect(resumed.execute().values).toEqual({ count: 3 });
    expect(resumed.history.list().map((entry) => entry.nodeId)).toEqual(['A', 'B', 'B', 'B']);
    expect(store.load('exec-sqlite')?.status).toBe('completed');
  });
});
