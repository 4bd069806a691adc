/**
 * Run Module
 *
 * @module @stepgraph/engine/run
 */

export * from './state-machine.js';
export * from './cancellation.js';
export * from './context.js';
export * from './errors.js';
export * from './retry.js';
export * from './config.js';
export * from './result.js';
export * from './checkpoint.js';
export * from './sqlite-checkpoint-store.js';
export * from './core.js';
export * from './sync-runner.js';
export * from './async-runner.js';
export * from './workflow-run.js';
export * from './orchestrator.js';
