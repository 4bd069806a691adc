/**
 * Registry Module
 *
 * @module @stepgraph/engine/registry
 */

export * from './registry.js';
export * from './builtins.js';
