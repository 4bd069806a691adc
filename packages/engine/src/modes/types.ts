/**
 * Execution Mode Contracts
 *
 * The node implementation contract and the capability rules shared by the
 * execution modes. A node declares what it supports; a mode never converts
 * one kind of entry point into the other.
 *
 * @module @stepgraph/engine/modes/types
 */

import type { Logger } from '@stepgraph/core';
import type { ExecutionCapability, RetryPolicy } from '../graph/schema.js';
import type { GraphNode } from '../graph/model.js';
import type { StateValues } from '../state/diff.js';
import type { ExecutionContext } from '../run/context.js';


export type ExecutionModeKind = 'sync' | 'async' | 'hybrid';

// =============================================================================
// Node Contract
// =============================================================================

/**
 * Failure reported by a node without throwing
 */
export interface ErrorInfo {
  message: string;
  code?: string;
  /** Set to false to skip the retry policy */
  retryable?: boolean;
  details?: Record<string, unknown>;
}

export interface NodeExecutionResult {
  /** Keys merged shallowly into the state */
  update?: StateValues;
  /** Keys deleted from the state */
  remove?: string[];
  /** Explicit successors, bypassing edge guards */
  next?: string[];
  error?: ErrorInfo;
}

export interface NodeRunContext {
  readonly execution: ExecutionContext;
  readonly node: GraphNode;
  /** 1-based attempt number */
  readonly attempt: number;
  /** Aborted when the run is cancelled or times out */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  /** Parallel branch this execution belongs to, if any */
  readonly branch?: string;
}

export interface NodeImplementation {
  readonly capability: ExecutionCapability;
  /** Retry defaults; the graph descriptor's retry settings take precedence */
  readonly retry?: Partial<RetryPolicy>;
  runSync?(state: StateValues, ctx: NodeRunContext): NodeExecutionResult;
  runAsync?(state: StateValues, ctx: NodeRunContext): Promise<NodeExecutionResult>;
}

/**
 * Registered under a node type name; creates one implementation per graph node
 */
export interface NodeFactory {
  readonly capability: ExecutionCapability;
  create(node: GraphNode): NodeImplementation;
}

// =============================================================================
// Capability Rules
// =============================================================================

export function supportsSync(capability: ExecutionCapability): boolean {
  return capability !== 'async';
}

export function supportsAsync(capability: ExecutionCapability): boolean {
  return capability !== 'sync';
}

/**
 * Whether an implementation offering `provided` can serve a node declared as `declared`
 */
export function providesCapability(provided: ExecutionCapability, declared: ExecutionCapability): boolean {
  if (declared === 'both') return provided === 'both';
  return provided === 'both' || provided === declared;
}

// =============================================================================
// Errors
// =============================================================================

export class ModeMismatchError extends Error {
  readonly name = 'ModeMismatchError';
  readonly isModeMismatch = true;

  constructor(
    public readonly mode: ExecutionModeKind,
    public readonly reason: string,
    public readonly nodeId?: string,
    public readonly capability?: ExecutionCapability
  ) {
    super(
      nodeId
        ? `Node "${nodeId}" (${capability ?? 'unknown'}) cannot run in ${mode} mode: ${reason}`
        : `${mode} mode: ${reason}`
    );
  }
}

export function isModeMismatchError(error: unknown): error is ModeMismatchError {
  return error instanceof ModeMismatchError;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

// =============================================================================
// Factory Helpers
// =============================================================================

type SyncRun = (state: StateValues, ctx: NodeRunContext) => NodeExecutionResult;
type AsyncRun = (state: StateValues, ctx: NodeRunContext) => Promise<NodeExecutionResult>;

interface NodeOptions {
  retry?: Partial<RetryPolicy>;
}

/**
 * Node type with only a synchronous entry point
 */
export function syncNode(runSync: SyncRun, options: NodeOptions = {}): NodeFactory {
  return {
    capability: 'sync',
    create: () => ({ capability: 'sync', retry: options.retry, runSync }),
  };
}

/**
 * Node type with only an asynchronous entry point
 */
export function asyncNode(runAsync: AsyncRun, options: NodeOptions = {}): NodeFactory {
  return {
    capability: 'async',
    create: () => ({ capability: 'async', retry: options.retry, runAsync }),
  };
}

/**
 * Node type with both entry points
 */
export function dualNode(runSync: SyncRun, runAsync: AsyncRun, options: NodeOptions = {}): NodeFactory {
  return {
    capability: 'both',
    create: () => ({ capability: 'both', retry: options.retry, runSync, runAsync }),
  };
}
