/**
 * State Module
 *
 * @module @stepgraph/engine/state
 */

export * from './diff.js';
export * from './container.js';
export * from './history.js';
export * from './snapshots.js';
export * from './merge.js';
