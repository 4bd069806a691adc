/**
 * Identifier generation for runs and their telemetry
 *
 * @module @stepgraph/core/telemetry/ids
 */

import { randomBytes, randomUUID } from 'node:crypto';

/** W3C trace-context trace ID */
export type TraceId = string & { readonly __brand: 'TraceId' };

/** W3C trace-context span ID */
export type SpanId = string & { readonly __brand: 'SpanId' };

export function generateTraceId(): TraceId {
  return randomBytes(16).toString('hex') as TraceId;
}

export function generateSpanId(): SpanId {
  return randomBytes(8).toString('hex') as SpanId;
}

/**
 * Execution IDs double as checkpoint keys, so they are UUIDs
 */
export function generateExecutionId(): string {
  return randomUUID();
}

export function isValidTraceId(id: string): id is TraceId {
  return /^[0-9a-f]{32}$/.test(id);
}

export function isValidSpanId(id: string): id is SpanId {
  return /^[0-9a-f]{16}$/.test(id);
}
