/**
 * Telemetry Module
 *
 * Correlation IDs, async-local telemetry context and the structured logger.
 *
 * @module @stepgraph/core/telemetry
 */

export * from './ids.js';
export * from './context.js';
export * from './logger.js';
