/**
 * Tests for execution modes
 */

import { describe, it, expect, vi } from 'vitest';
import type { GraphNode } from '../../graph/model.js';
import type { ExecutionCapability } from '../../graph/schema.js';
import { createExecutionContext } from '../../run/context.js';
import { quietLogger } from '../../__tests__/fixtures.js';
import { AsyncMode, raceAbort } from '../async-mode.js';
import { createMode, resolveMode } from '../factory.js';
import { HybridMode } from '../hybrid-mode.js';
import { SyncMode } from '../sync-mode.js';
import {
  ModeMismatchError,
  providesCapability,
  supportsAsync,
  supportsSync,
  type NodeImplementation,
  type NodeRunContext,
} from '../types.js';

function node(id: string, capability: ExecutionCapability): GraphNode {
  return { id, type: 'test', capability, config: {}, terminal: false, parallel: false };
}

function runContext(target: GraphNode, signal: AbortSignal = new AbortController().signal): NodeRunContext {
  return {
    execution: createExecutionContext({ workflowId: 'wf', executionId: 'exec-1' }),
    node: target,
    attempt: 1,
    signal,
    logger: quietLogger(),
  };
}

describe('capability rules', () => {
  it('maps capabilities to entry points', () => {
    expect(supportsSync('sync')).toBe(true);
    expect(supportsSync('both')).toBe(true);
    expect(supportsSync('async')).toBe(false);
    expect(supportsAsync('sync')).toBe(false);
    expect(supportsAsync('both')).toBe(true);
  });

  it('checks declared against provided capability', () => {
    expect(providesCapability('both', 'sync')).toBe(true);
    expect(providesCapability('both', 'both')).toBe(true);
    expect(providesCapability('sync', 'sync')).toBe(true);
    expect(providesCapability('sync', 'both')).toBe(false);
    expect(providesCapability('async', 'sync')).toBe(false);
  });
});

describe('SyncMode', () => {
  const mode = new SyncMode();

  it('calls the synchronous entry point', () => {
    const target = node('a', 'sync');
    const impl: NodeImplementation = { capability: 'sync', runSync: (state) => ({ update: { seen: state.x } }) };
    expect(mode.runNode(target, impl, { x: 1 }, runContext(target))).toEqual({ update: { seen: 1 } });
  });

  it('rejects async-only nodes without calling them', () => {
    const target = node('fetch', 'async');
    const runAsync = vi.fn(async () => ({}));
    const impl: NodeImplementation = { capability: 'async', runAsync };

    expect(() => mode.runNode(target, impl, {}, runContext(target))).toThrow(
      'Node "fetch" (async) cannot run in sync mode: node is async-only'
    );
    expect(runAsync).not.toHaveBeenCalled();
  });

  it('rejects a synchronous entry point that returns a promise', () => {
    const target = node('sneaky', 'sync');
    const impl: NodeImplementation = {
      capability: 'sync',
      // A thenable that still satisfies the result shape
      runSync: () => Object.assign(Promise.resolve({}), { update: {} }),
    };

    expect(() => mode.runNode(target, impl, {}, runContext(target))).toThrow(ModeMismatchError);
  });
});

describe('AsyncMode', () => {
  const mode = new AsyncMode();

  it('awaits the asynchronous entry point', async () => {
    const target = node('a', 'async');
    const impl: NodeImplementation = { capability: 'async', runAsync: async () => ({ update: { ok: true } }) };
    await expect(mode.runNode(target, impl, {}, runContext(target))).resolves.toEqual({ update: { ok: true } });
  });

  it('rejects sync-only nodes without calling them', async () => {
    const target = node('compute', 'sync');
    const runSync = vi.fn(() => ({}));
    const impl: NodeImplementation = { capability: 'sync', runSync };

    await expect(mode.runNode(target, impl, {}, runContext(target))).rejects.toThrow(
      'Node "compute" (sync) cannot run in async mode: node is sync-only'
    );
    expect(runSync).not.toHaveBeenCalled();
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const work = new Promise<string>(() => {});
    const raced = raceAbort(work, controller.signal);
    controller.abort(new Error('stop'));
    await expect(raced).rejects.toThrow('stop');
  });

  it('rejects at once on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));
    const target = node('a', 'async');
    const runAsync = vi.fn(async () => ({}));
    await expect(
      mode.runNode(target, { capability: 'async', runAsync }, {}, runContext(target, controller.signal))
    ).rejects.toThrow('already');
    expect(runAsync).not.toHaveBeenCalled();
  });
});

describe('HybridMode', () => {
  const mode = new HybridMode();

  it('accepts every capability', () => {
    expect(mode.supports('sync')).toBe(true);
    expect(mode.supports('async')).toBe(true);
    expect(mode.supports('both')).toBe(true);
  });

  it('dispatches by capability', async () => {
    const syncTarget = node('s', 'sync');
    const asyncTarget = node('a', 'async');
    const runSync = vi.fn(() => ({ update: { via: 'sync' } }));
    const runAsync = vi.fn(async () => ({ update: { via: 'async' } }));

    await expect(mode.runNode(syncTarget, { capability: 'sync', runSync }, {}, runContext(syncTarget))).resolves.toEqual({
      update: { via: 'sync' },
    });
    await expect(
      mode.runNode(asyncTarget, { capability: 'async', runAsync }, {}, runContext(asyncTarget))
    ).resolves.toEqual({ update: { via: 'async' } });
  });

  it('prefers the async entry point of dual nodes in awaited runs', async () => {
    const target = node('d', 'both');
    const impl: NodeImplementation = {
      capability: 'both',
      runSync: () => ({ update: { via: 'sync' } }),
      runAsync: async () => ({ update: { via: 'async' } }),
    };
    await expect(mode.runNode(target, impl, {}, runContext(target))).resolves.toEqual({ update: { via: 'async' } });
    expect(mode.runNodeSync(target, impl, {}, runContext(target))).toEqual({ update: { via: 'sync' } });
  });

  it('never bridges async-only nodes in blocking runs', () => {
    const target = node('fetch', 'async');
    expect(() =>
      mode.runNodeSync(target, { capability: 'async', runAsync: async () => ({}) }, {}, runContext(target))
    ).toThrow(ModeMismatchError);
  });
});

describe('mode factory', () => {
  it('creates modes by kind', () => {
    expect(createMode('sync')).toBeInstanceOf(SyncMode);
    expect(createMode('async')).toBeInstanceOf(AsyncMode);
    expect(createMode('hybrid')).toBeInstanceOf(HybridMode);
  });

  it('passes instances through', () => {
    const mode = new SyncMode();
    expect(resolveMode(mode)).toBe(mode);
    expect(resolveMode('async').kind).toBe('async');
  });
});
