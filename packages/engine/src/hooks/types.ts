/**
 * Hook System Types
 *
 * Contracts for the two kinds of hooks a run invokes:
 * - Triggers run around every node (veto before, amend after)
 * - Plugins observe the run lifecycle (start, end, errors)
 *
 * @module @stepgraph/engine/hooks
 */

import type { GraphNode } from '../graph/model.js';
import type { NodeExecutionResult } from '../modes/types.js';
import type { ExecutionContext } from '../run/context.js';
import type { RunStatus } from '../run/state-machine.js';
import type { StateContainer } from '../state/container.js';
import type { StateValues } from '../state/diff.js';
import type { HistoryEntry } from '../state/history.js';

export type MaybePromise<T> = T | Promise<T>;

// =============================================================================
// Hook Events
// =============================================================================

/**
 * Passed to Trigger.before
 */
export interface NodeHookEvent {
  readonly node: GraphNode;
  /** Frozen state the node is about to see */
  readonly state: StateContainer;
  readonly context: ExecutionContext;
  /** Parallel branch, if the node runs inside one */
  readonly branch?: string;
}

/**
 * Passed to Trigger.after
 */
export interface NodeResultHookEvent extends NodeHookEvent {
  readonly result: NodeExecutionResult;
  readonly attempt: number;
  readonly durationMs: number;
}

/**
 * State change requested by a trigger after a node. Applied by the
 * orchestrator as its own history entry.
 */
export interface HookAmendment {
  update?: StateValues;
  remove?: string[];
  reason?: string;
}

/**
 * Passed to Plugin.onRunEnd
 */
export interface BranchHistory {
  readonly forkNodeId: string;
  readonly branchId: string;
  readonly entries: readonly HistoryEntry[];
}

export interface RunSummary {
  readonly status: RunStatus;
  readonly stepCount: number;
  readonly durationMs: number;
  readonly history: readonly HistoryEntry[];
  /** Histories of joined parallel branches */
  readonly branchHistories: readonly BranchHistory[];
  readonly finalNodeId?: string;
  readonly error?: Error;
}

// =============================================================================
// Hook Contracts
// =============================================================================

export interface Trigger {
  /** Unique name; duplicates are skipped at registration */
  readonly name: string;
  /** Failures fail the run instead of being logged */
  readonly critical?: boolean;

  /**
   * Return false to skip the node
   */
  before?(event: NodeHookEvent): MaybePromise<boolean | void>;

  after?(event: NodeResultHookEvent): MaybePromise<HookAmendment | void>;
}

export interface Plugin {
  readonly name: string;
  readonly critical?: boolean;

  onRunStart?(context: ExecutionContext): MaybePromise<void>;

  onRunEnd?(context: ExecutionContext, finalState: StateContainer, summary: RunSummary): MaybePromise<void>;

  /**
   * Called for each failed node attempt and for run-level failures
   */
  onError?(context: ExecutionContext, error: Error): MaybePromise<void>;
}

/**
 * Registered under a trigger type name; builds a trigger from hook config
 */
export type TriggerFactory = (config: Record<string, unknown>) => Trigger;

export type PluginFactory = (config: Record<string, unknown>) => Plugin;

// =============================================================================
// Hook Configuration
// =============================================================================

export interface HookConfig {
  /**
   * Timeout for individual hook execution in ms (async runs only)
   * @default 5000
   */
  hookTimeoutMs: number;

  /**
   * Log hook execution for debugging
   * @default false
   */
  debug: boolean;
}

export const DEFAULT_HOOK_CONFIG: HookConfig = {
  hookTimeoutMs: 5000,
  debug: false,
};

// =============================================================================
// Errors
// =============================================================================

export type HookMethod = 'before' | 'after' | 'onRunStart' | 'onRunEnd' | 'onError';

/**
 * Raised when a critical hook fails
 */
export class HookError extends Error {
  readonly name = 'HookError';
  readonly isHookError = true;

  constructor(
    public readonly hookName: string,
    public readonly method: HookMethod,
    cause: unknown
  ) {
    super(
      `Critical hook "${hookName}" failed in ${method}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export function isHookError(error: unknown): error is HookError {
  return error instanceof HookError;
}
