/**
 * Graph Module
 *
 * @module @stepgraph/engine/graph
 */

export * from './schema.js';
export * from './validation.js';
export * from './model.js';
export * from './visualization.js';
