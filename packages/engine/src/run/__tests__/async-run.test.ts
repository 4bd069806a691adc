/**
 * Orchestrator Tests: awaited and streamed runs
 */

import { describe, it, expect, vi } from 'vitest';
import { counterLoopDescriptor, quietLogger, testRegistry } from '../../__tests__/fixtures.js';
import { buildGraph, type GraphModel } from '../../graph/model.js';
import type { GraphDescriptor } from '../../graph/schema.js';
import { asyncNode, ModeMismatchError, syncNode, type NodeRunContext } from '../../modes/types.js';
import type { ComponentRegistry } from '../../registry/registry.js';
import { CancelledError, isCancelledError } from '../cancellation.js';
import { RunBusyError } from '../errors.js';
import { Orchestrator } from '../orchestrator.js';

function orchestrator(registry: ComponentRegistry): Orchestrator {
  return new Orchestrator({ registry, logger: quietLogger() });
}

function build(registry: ComponentRegistry, descriptor: GraphDescriptor): GraphModel {
  return buildGraph(descriptor, { registry: registry.snapshot(), logger: quietLogger() });
}

function single(type: string): GraphDescriptor {
  return {
    id: `single-${type}`,
    entryPoint: 'A',
    nodes: [{ id: 'A', type }, { id: 'Z', terminal: true }],
    edges: [{ from: 'A', to: 'Z' }],
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('awaited runs', () => {
  it('mixes sync and async nodes under HybridMode', async () => {
    const registry = testRegistry();
    registry.nodes.register(
      'async-increment',
      asyncNode(async (state) => ({ update: { count: Number(state.count ?? 0) + 1 } }))
    );
    const descriptor = counterLoopDescriptor();
    const graph = build(registry, {
      ...descriptor,
      nodes: [
        { id: 'A', type: 'noop' },
        { id: 'B', type: 'async-increment' },
        { id: 'C', terminal: true },
      ],
    });

    const state = await orchestrator(registry).runAsync(graph, {}, { mode: 'hybrid' });
    expect(state.values).toEqual({ count: 3 });
  });

  it('rejects sync-only nodes under AsyncMode without calling them', async () => {
    const registry = testRegistry();
    const compute = vi.fn(() => ({ update: { computed: true } }));
    registry.nodes.register('compute', syncNode(compute));
    const graph = build(registry, single('compute'));
    const run = orchestrator(registry).createRun(graph, { x: 1 }, { mode: 'async' });

    await expect(run.executeAsync()).rejects.toThrow('Node "A" (sync) cannot run in async mode: node is sync-only');
    expect(compute).not.toHaveBeenCalled();
    expect(run.status).toBe('failed');
    expect(run.state.values).toEqual({ x: 1 });
  });

  it('refuses to start an awaited run in sync mode', async () => {
    const registry = testRegistry();
    const graph = build(registry, counterLoopDescriptor());
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'sync' });

    await expect(run.executeAsync()).rejects.toThrow(ModeMismatchError);
    expect(run.status).toBe('pending');
  });

  it('merges concurrent branches in declaration order', async () => {
    const registry = testRegistry();
    registry.nodes.register(
      'slow-g',
      asyncNode(async () => {
        await delay(20);
        return { update: { g: 1, shared: 'g' } };
      })
    );
    registry.nodes.register('fast-h', asyncNode(async () => ({ update: { h: 2, shared: 'h' } })));
    const graph = build(registry, {
      id: 'fan-out',
      entryPoint: 'F',
      nodes: [
        { id: 'F', type: 'noop', parallel: true, joinAt: 'J' },
        { id: 'G', type: 'slow-g' },
        { id: 'H', type: 'fast-h' },
        { id: 'J', terminal: true },
      ],
      edges: [
        { from: 'F', to: 'G' },
        { from: 'F', to: 'H' },
        { from: 'G', to: 'J' },
        { from: 'H', to: 'J' },
      ],
    });

    const run = orchestrator(registry).createRun(graph, { shared: 'base' }, { mode: 'hybrid' });
    const state = await run.executeAsync();

    expect(state.values).toEqual({ g: 1, h: 2, shared: 'h' });
    expect(run.finalNodeId).toBe('J');
    expect(run.branchHistories.map((branch) => branch.branchId)).toEqual(['G', 'H']);
  });

  it('retries with backoff between attempts', async () => {
    const registry = testRegistry();
    let calls = 0;
    registry.nodes.register(
      'flaky',
      asyncNode(
        async () => {
          calls += 1;
          if (calls === 1) throw new Error('transient');
          return { update: { calls } };
        },
        { retry: { maxAttempts: 2, initialDelayMs: 5 } }
      )
    );
    const graph = build(registry, single('flaky'));

    const run = orchestrator(registry).createRun(graph, {}, { mode: 'async' });
    expect((await run.executeAsync()).values).toEqual({ calls: 2 });
    expect(run.history.list()[0].attempt).toBe(2);
  });

  it('awaits async triggers', async () => {
    const registry = testRegistry();
    const graph = build(registry, counterLoopDescriptor());
    const hooks = new Orchestrator({
      registry,
      logger: quietLogger(),
      triggers: [{ name: 'skip-a', before: async (event) => event.node.id !== 'A' }],
    });

    const run = hooks.createRun(graph, {}, { mode: 'hybrid' });
    await run.executeAsync();
    expect(run.history.list()[0]).toMatchObject({ kind: 'skipped', nodeId: 'A', source: 'skip-a' });
  });
});

describe('cancellation and timeouts', () => {
  it('cancels a run that outlives its deadline and aborts in-flight work', async () => {
    const registry = testRegistry();
    const signals: AbortSignal[] = [];
    registry.nodes.register(
      'hang',
      asyncNode((_state, ctx: NodeRunContext) => {
        signals.push(ctx.signal);
        return new Promise<never>(() => {});
      })
    );
    const graph = build(registry, single('hang'));
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'async', timeoutMs: 20 });

    let error: unknown;
    try {
      await run.executeAsync();
    } catch (e) {
      error = e;
    }

    expect(isCancelledError(error)).toBe(true);
    if (isCancelledError(error)) {
      expect(error.reason.initiator).toBe('timeout');
    }
    expect(run.status).toBe('cancelled');
    expect(signals[0].aborted).toBe(true);
  });

  it('stops before the next step once cancelled', async () => {
    const registry = testRegistry();
    const graph = build(registry, counterLoopDescriptor());
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'hybrid' });

    const pending = run.executeAsync();
    run.cancel('stop');

    await expect(pending).rejects.toThrow(CancelledError);
    await expect(pending).rejects.toThrow('Operation cancelled: stop');
    expect(run.status).toBe('cancelled');
    expect(run.history.length).toBe(0);
  });

  it('refuses to restore while a step is executing', async () => {
    const registry = testRegistry();
    let release = (): void => {};
    let started = (): void => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    registry.nodes.register(
      'wait',
      asyncNode(async () => {
        started();
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        return { update: { done: true } };
      })
    );
    const graph = build(registry, single('wait'));
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'async' });
    const snapshotId = run.snapshot();

    const pending = run.executeAsync();
    await running;
    expect(() => run.restore(snapshotId)).toThrow(RunBusyError);
    release();

    expect((await pending).values).toEqual({ done: true });
    run.restore(snapshotId);
    expect(run.state.values).toEqual({});
  });
});

describe('streamed runs', () => {
  it('yields the state after every step', async () => {
    const registry = testRegistry();
    const graph = build(registry, counterLoopDescriptor());

    const counts: unknown[] = [];
    for await (const state of orchestrator(registry).runStream(graph, {}, { mode: 'hybrid' })) {
      counts.push(state.get('count'));
    }
    expect(counts).toEqual([undefined, 1, 2, 3]);
  });

  it('cancels the run when the consumer stops early', async () => {
    const registry = testRegistry();
    const graph = build(registry, counterLoopDescriptor());
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'hybrid' });

    for await (const state of run.stream()) {
      expect(state.revision).toBe(1);
      break;
    }
    expect(run.status).toBe('cancelled');
    expect(run.history.length).toBe(1);
  });

  it('surfaces node failures to the consumer', async () => {
    const registry = testRegistry();
    registry.nodes.register(
      'explode',
      asyncNode(async () => {
        throw new Error('kaboom');
      })
    );
    const graph = build(registry, single('explode'));
    const run = orchestrator(registry).createRun(graph, {}, { mode: 'async' });

    const consume = async (): Promise<void> => {
      for await (const state of run.stream()) {
        expect(state).toBeDefined();
      }
    };
    await expect(consume()).rejects.toThrow('Node "A" failed (attempt 1/1): kaboom');
    expect(run.status).toBe('failed');
  });
});
