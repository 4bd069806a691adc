/**
 * Shared test fixtures
 */

import { createLogger, type Logger } from '@stepgraph/core';
import type { GraphDescriptor } from '../graph/schema.js';
import { syncNode } from '../modes/types.js';
import { createComponentRegistry } from '../registry/builtins.js';
import type { ComponentRegistry } from '../registry/registry.js';

/**
 * Logger that drops everything below EMERGENCY
 */
export function quietLogger(): Logger {
  return createLogger('test', { minSeverity: 'EMERGENCY' });
}

/**
 * Registry with the built-ins plus `noop` and `increment` node types
 */
export function testRegistry(): ComponentRegistry {
  const registry = createComponentRegistry();
  registry.nodes.register('noop', syncNode(() => ({})));
  registry.nodes.register(
    'increment',
    syncNode((state) => ({ update: { count: Number(state.count ?? 0) + 1 } }))
  );
  return registry;
}

/**
 * A -> B, B -> B while count < 3, B -> C once count >= 3
 */
export function counterLoopDescriptor(): GraphDescriptor {
  return {
    id: 'counter-loop',
    entryPoint: 'A',
    nodes: [
      { id: 'A', type: 'noop' },
      { id: 'B', type: 'increment' },
      { id: 'C', terminal: true },
    ],
    edges: [
      { from: 'A', to: 'B' },
      { from: 'B', to: 'C', guard: { type: 'field', config: { field: 'count', operator: 'gte', value: 3 } } },
      { from: 'B', to: 'B', guard: { type: 'field', config: { field: 'count', operator: 'lt', value: 3 } } },
    ],
  };
}
