/**
 * @stepgraph/core
 *
 * Shared primitives for stepgraph packages.
 */

export * from './telemetry/index.js';
