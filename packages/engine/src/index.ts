/**
 * Workflow Graph Execution Engine
 *
 * Executes directed graphs of nodes connected by guarded edges, carrying an
 * immutable state between steps. It includes:
 *
 * - Graph descriptors, validation and the built graph model
 * - Component registry for node types, guards, hooks and merge strategies
 * - State containers, history, snapshots and branch merging
 * - Sync, async and hybrid execution modes
 * - Router, hooks and the orchestrator
 *
 * @module @stepgraph/engine
 */

export * from './graph/index.js';
export * from './registry/index.js';
export * from './state/index.js';
export * from './modes/index.js';
export * from './router/index.js';
export * from './hooks/index.js';
export * from './run/index.js';
export * from './engine.js';
