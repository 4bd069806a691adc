/**
 * Run Checkpoints
 *
 * Persistence boundary for resumable runs. The orchestrator saves a
 * checkpoint at configured step intervals and when a run ends; a failed
 * save is logged and never fails the run.
 *
 * Checkpoint Pattern:
 * - State, history and the pending frontier are captured between steps
 * - A failed run's frontier starts with the node that failed, unless its
 *   result was already committed: then only its routing is pending
 * - Resuming rebuilds a pending run from the latest checkpoint
 *
 * @module @stepgraph/engine/run/checkpoint
 */

import type { MaybePromise } from '../hooks/types.js';
import type { SerializedState } from '../state/container.js';
import type { HistoryEntry } from '../state/history.js';
import type { RunStatus } from './state-machine.js';

// =============================================================================
// Checkpoint
// =============================================================================

/**
 * A node whose result is in the checkpointed state but whose successors
 * were not yet scheduled. Resuming routes it again without running it.
 */
export interface PendingRoute {
  nodeId: string;
  /** Explicit successors returned by the node */
  next?: string[];
}

export interface RunCheckpoint {
  executionId: string;
  workflowId: string;
  status: RunStatus;
  state: SerializedState;
  history: HistoryEntry[];
  /** Entries already dropped by history retention */
  historyDropped: number;
  /** Nodes still to visit, in order */
  frontier: string[];
  pendingRoute?: PendingRoute;
  stepCount: number;
  /** Caller-supplied run configuration */
  config: Record<string, unknown>;
  startedAt: Date;
  savedAt: Date;
}

// =============================================================================
// Checkpoint Store
// =============================================================================

/**
 * Interface for persisting checkpoints
 *
 * Methods may complete synchronously or return a promise. Blocking runs do
 * not wait for a returned promise; its failure is logged.
 */
export interface CheckpointStore {
  /**
   * Save (replace) the checkpoint for a run
   */
  save(executionId: string, checkpoint: RunCheckpoint): MaybePromise<void>;

  /**
   * Latest checkpoint for a run, or null
   */
  load(executionId: string): MaybePromise<RunCheckpoint | null>;

  delete?(executionId: string): MaybePromise<boolean>;
}

/**
 * In-memory checkpoint store (for development/testing)
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints: Map<string, RunCheckpoint> = new Map();

  save(executionId: string, checkpoint: RunCheckpoint): void {
    this.checkpoints.set(executionId, structuredClone(checkpoint));
  }

  load(executionId: string): RunCheckpoint | null {
    const checkpoint = this.checkpoints.get(executionId);
    return checkpoint ? structuredClone(checkpoint) : null;
  }

  delete(executionId: string): boolean {
    return this.checkpoints.delete(executionId);
  }

  has(executionId: string): boolean {
    return this.checkpoints.has(executionId);
  }

  list(): string[] {
    return [...this.checkpoints.keys()];
  }

  get size(): number {
    return this.checkpoints.size;
  }

  clear(): void {
    this.checkpoints.clear();
  }
}
