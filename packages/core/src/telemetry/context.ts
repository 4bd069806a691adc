/**
 * Telemetry Context Module
 *
 * A run opens a root context; every node attempt executes inside a child
 * span of it. Log lines emitted while either is active pick up the
 * correlation fields (trace, workflow, execution, node).
 *
 * @module @stepgraph/core/telemetry/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { generateSpanId, generateTraceId, type SpanId, type TraceId } from './ids.js';

/**
 * Where the telemetry originated
 */
export type TelemetrySource = 'engine' | 'cli' | 'test';

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL' | 'ALERT' | 'EMERGENCY';

export interface TelemetryContext {
  /** 32 hex chars, shared by every span of a run */
  traceId: TraceId;
  /** 16 hex chars */
  spanId: SpanId;
  parentSpanId?: SpanId;
  workflowId?: string;
  executionId?: string;
  /** Set on node spans */
  nodeId?: string;
  /** Retry attempt of the node span, 1-based */
  attempt?: number;
  source: TelemetrySource;
  eventName?: string;
  startedAt: Date;
}

export type TelemetryFields = Partial<
  Pick<TelemetryContext, 'workflowId' | 'executionId' | 'nodeId' | 'attempt' | 'eventName'>
>;

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

export async function runWithContextAsync<T>(ctx: TelemetryContext, fn: () => Promise<T>): Promise<T> {
  return telemetryStorage.run(ctx, fn);
}

/**
 * Root context for a new trace
 */
export function createContext(source: TelemetrySource, fields: TelemetryFields = {}): TelemetryContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    startedAt: new Date(),
    ...fields,
  };
}

/**
 * Span under `parent` in the same trace
 */
export function createChildContext(parent: TelemetryContext, fields: TelemetryFields = {}): TelemetryContext {
  return {
    ...parent,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    startedAt: new Date(),
    ...fields,
  };
}

/**
 * Run `fn` inside a node span of the current context. Outside a context
 * `fn` runs as is. Promises returned by `fn` keep the span across awaits.
 */
export function withNodeSpan<T>(nodeId: string, attempt: number, fn: () => T): T {
  const parent = getCurrentContext();
  if (!parent) {
    return fn();
  }
  return telemetryStorage.run(createChildContext(parent, { nodeId, attempt }), fn);
}
