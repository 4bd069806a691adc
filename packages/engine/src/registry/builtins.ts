/**
 * @module @stepgraph/engine/registry
 */

import { BUILTIN_PLUGINS, BUILTIN_TRIGGERS } from '../hooks/config.js';
import { BUILTIN_GUARDS } from '../router/guards.js';
import { BUILTIN_MERGE_STRATEGIES } from '../state/merge.js';
import { ComponentRegistry } from './registry.js';

export interface CreateRegistryOptions {
  /** Register built-in guards, hooks and merge strategies. @default true */
  builtins?: boolean;
}

/**
 * A new, independent registry
 */
export function createComponentRegistry(options: CreateRegistryOptions = {}): ComponentRegistry {
  const registry = new ComponentRegistry();
  if (options.builtins === false) {
    return registry;
  }

  for (const [name, factory] of Object.entries(BUILTIN_GUARDS)) {
    registry.guards.register(name, factory);
  }
  for (const [name, strategy] of Object.entries(BUILTIN_MERGE_STRATEGIES)) {
    registry.mergeStrategies.register(name, strategy);
  }
  for (const [name, factory] of Object.entries(BUILTIN_TRIGGERS)) {
    registry.triggers.register(name, factory);
  }
  for (const [name, factory] of Object.entries(BUILTIN_PLUGINS)) {
    registry.plugins.register(name, factory);
  }
  return registry;
}
