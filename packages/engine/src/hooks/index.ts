/**
 * Hooks Module
 *
 * @module @stepgraph/engine/hooks
 */

export * from './types.js';
export * from './runner.js';
export * from './config.js';
export * from './loop-guard-trigger.js';
export * from './logging-trigger.js';
export * from './execution-stats-plugin.js';
