/**
 * Tests for the built-in triggers and plugins
 */

import { describe, it, expect, vi } from 'vitest';
import type { GraphNode } from '../../graph/model.js';
import { createExecutionContext } from '../../run/context.js';
import { StateContainer } from '../../state/container.js';
import type { HistoryEntry } from '../../state/history.js';
import { quietLogger } from '../../__tests__/fixtures.js';
import { ExecutionStatsPlugin } from '../execution-stats-plugin.js';
import { LoggingTrigger } from '../logging-trigger.js';
import { LoopGuardTrigger } from '../loop-guard-trigger.js';

function graphNode(id: string): GraphNode {
  return { id, type: 'noop', capability: 'sync', config: {}, terminal: false, parallel: false };
}

function entry(nodeId: string, kind: HistoryEntry['kind'], durationMs?: number): HistoryEntry {
  return { revision: 1, nodeId, kind, timestamp: new Date(0), delta: {}, removed: [], durationMs };
}

describe('LoopGuardTrigger', () => {
  const state = StateContainer.create();

  it('allows visits up to the limit, then warns', () => {
    const context = createExecutionContext({ workflowId: 'wf' });
    const onLoop = vi.fn();
    const trigger = new LoopGuardTrigger({ maxVisits: 2 }, onLoop);
    const event = { node: graphNode('B'), state, context };

    expect([trigger.before(event), trigger.before(event), trigger.before(event)]).toEqual([true, true, true]);
    expect(trigger.getVisits(context, 'B')).toBe(3);
    expect(onLoop).toHaveBeenCalledOnce();
    expect(onLoop).toHaveBeenCalledWith({ nodeId: 'B', visits: 3, maxVisits: 2, blocked: false }, context);
  });

  it('vetoes visits past the limit when blocking', () => {
    const context = createExecutionContext({ workflowId: 'wf' });
    const trigger = new LoopGuardTrigger({ maxVisits: 1, enforceBlocking: true });
    const event = { node: graphNode('B'), state, context };

    expect(trigger.before(event)).toBe(true);
    expect(trigger.before(event)).toBe(false);
  });

  it('counts each run separately', () => {
    const trigger = new LoopGuardTrigger({ maxVisits: 1, enforceBlocking: true });
    const first = createExecutionContext({ workflowId: 'wf' });
    const second = createExecutionContext({ workflowId: 'wf' });

    expect(trigger.before({ node: graphNode('B'), state, context: first })).toBe(true);
    expect(trigger.before({ node: graphNode('B'), state, context: second })).toBe(true);
  });

  it('only guards listed nodes', () => {
    const context = createExecutionContext({ workflowId: 'wf' });
    const trigger = new LoopGuardTrigger({ maxVisits: 1, enforceBlocking: true, nodes: ['B'] });
    const event = { node: graphNode('A'), state, context };

    expect([trigger.before(event), trigger.before(event)]).toEqual([true, true]);
    expect(trigger.getVisits(context, 'A')).toBe(0);
  });
});

describe('LoggingTrigger', () => {
  it('writes one line before and one after a node', () => {
    const logger = quietLogger();
    const info = vi.spyOn(logger, 'info');
    const trigger = new LoggingTrigger({ level: 'info' }, logger);
    const context = createExecutionContext({ workflowId: 'wf', executionId: 'exec-1' });
    const event = { node: graphNode('A'), state: StateContainer.create(), context };

    trigger.before(event);
    trigger.after({ ...event, result: { update: { a: 1, b: 2 } }, attempt: 1, durationMs: 3 });

    expect(info).toHaveBeenNthCalledWith(1, 'Node A starting', {
      executionId: 'exec-1',
      nodeId: 'A',
      revision: 0,
      branch: undefined,
    });
    expect(info).toHaveBeenNthCalledWith(2, 'Node A finished', {
      executionId: 'exec-1',
      nodeId: 'A',
      attempt: 1,
      durationMs: 3,
      updatedKeys: ['a', 'b'],
      branch: undefined,
    });
  });
});

describe('ExecutionStatsPlugin', () => {
  it('aggregates node statistics from the run history', () => {
    const plugin = new ExecutionStatsPlugin({ slowNodeThresholdMs: 10 }, quietLogger());
    const context = createExecutionContext({ workflowId: 'wf', executionId: 'exec-1' });

    plugin.onRunStart(context);
    plugin.onError(context);
    plugin.onRunEnd(context, StateContainer.create(), {
      status: 'completed',
      stepCount: 4,
      durationMs: 40,
      history: [
        entry('A', 'node', 4),
        entry('B', 'node', 20),
        entry('B', 'node', 2),
        entry('B', 'amendment'),
        entry('C', 'skipped'),
        entry('A', 'restore'),
      ],
    });

    expect(plugin.getStats('exec-1')).toEqual({
      executionId: 'exec-1',
      workflowId: 'wf',
      status: 'completed',
      stepCount: 4,
      durationMs: 40,
      errors: 1,
      nodes: {
        A: { executions: 1, skipped: 0, amendments: 0, totalDurationMs: 4, maxDurationMs: 4, averageDurationMs: 4 },
        B: { executions: 2, skipped: 0, amendments: 1, totalDurationMs: 22, maxDurationMs: 20, averageDurationMs: 11 },
        C: { executions: 0, skipped: 1, amendments: 0, totalDurationMs: 0, maxDurationMs: 0, averageDurationMs: 0 },
      },
      slowNodes: ['B'],
    });
  });

  it('keeps a bounded number of runs', () => {
    const plugin = new ExecutionStatsPlugin({ maxTrackedRuns: 1 }, quietLogger());
    const summary = { status: 'completed' as const, stepCount: 0, durationMs: 0, history: [], branchHistories: [] };

    plugin.onRunEnd(createExecutionContext({ workflowId: 'wf', executionId: 'one' }), StateContainer.create(), summary);
    plugin.onRunEnd(createExecutionContext({ workflowId: 'wf', executionId: 'two' }), StateContainer.create(), summary);

    expect(plugin.listStats().map((s) => s.executionId)).toEqual(['two']);
  });
});
