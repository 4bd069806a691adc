/**
 * Router Module
 *
 * @module @stepgraph/engine/router
 */

export * from './guards.js';
export * from './router.js';
