/**
 * Execution Modes
 *
 * @module @stepgraph/engine/modes
 */

export * from './types.js';
export * from './sync-mode.js';
export * from './async-mode.js';
export * from './hybrid-mode.js';
export * from './factory.js';
