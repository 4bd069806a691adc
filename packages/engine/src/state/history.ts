/**
 * Execution History
 *
 * Append-only record of every state transition in a run. Retention is
 * bounded: once the limit is reached the oldest entries are dropped first.
 *
 * @module @stepgraph/engine/state/history
 */

import { applyChanges, cloneValues, type StateValues } from './diff.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What produced a history entry
 *
 * - node: a node execution merged its result
 * - skipped: a trigger vetoed the node
 * - amendment: a trigger amended the state after a node
 * - restore: a snapshot was restored
 * - join: parallel branches were merged
 */
export type HistoryEntryKind = 'node' | 'skipped' | 'amendment' | 'restore' | 'join';

export interface HistoryEntry {
  /** Revision of the state after this entry */
  readonly revision: number;
  readonly nodeId: string;
  readonly kind: HistoryEntryKind;
  readonly timestamp: Date;
  /** Keys set by this transition, with their new values */
  readonly delta: Readonly<StateValues>;
  /** Keys removed by this transition */
  readonly removed: readonly string[];
  /** Attempt that succeeded, for node entries */
  readonly attempt?: number;
  readonly durationMs?: number;
  /** Hook name, snapshot ID or branch list, depending on kind */
  readonly source?: string;
}

export type HistoryEntryInput = Omit<HistoryEntry, 'timestamp'> & { timestamp?: Date };

export interface HistoryOptions {
  /** Maximum retained entries (default: 1000) */
  maxEntries?: number;
}

export const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Read-only view of a run's history
 */
export interface ReadonlyHistory {
  readonly length: number;
  readonly droppedCount: number;
  readonly maxEntries: number;
  list(): HistoryEntry[];
  latest(): HistoryEntry | undefined;
  forNode(nodeId: string): HistoryEntry[];
  since(revision: number): HistoryEntry[];
  replay(initial: Readonly<StateValues>): StateValues;
}

/**
 * Raised when replay is requested after older entries were dropped
 */
export class HistoryTruncatedError extends Error {
  readonly name = 'HistoryTruncatedError';
  readonly isHistoryTruncated = true;

  constructor(public readonly droppedCount: number) {
    super(`Cannot replay history: ${droppedCount} oldest entries were dropped by retention`);
  }
}

// =============================================================================
// History
// =============================================================================

export class History implements ReadonlyHistory {
  private entries: HistoryEntry[] = [];
  private dropped = 0;
  readonly maxEntries: number;

  constructor(options: HistoryOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_HISTORY_LIMIT);
  }

  /**
   * Rebuild a history from stored entries (e.g. a checkpoint)
   */
  static fromEntries(
    entries: readonly HistoryEntry[],
    options: HistoryOptions & { droppedCount?: number } = {}
  ): History {
    const history = new History(options);
    history.dropped = options.droppedCount ?? 0;
    for (const entry of entries) {
      history.append(entry);
    }
    return history;
  }

  append(input: HistoryEntryInput): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      ...input,
      timestamp: input.timestamp ?? new Date(),
      delta: Object.freeze(cloneValues(input.delta)),
      removed: Object.freeze([...input.removed]),
    });
    this.entries.push(entry);

    const excess = this.entries.length - this.maxEntries;
    if (excess > 0) {
      this.entries.splice(0, excess);
      this.dropped += excess;
    }
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  list(): HistoryEntry[] {
    return [...this.entries];
  }

  latest(): HistoryEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  forNode(nodeId: string): HistoryEntry[] {
    return this.entries.filter((entry) => entry.nodeId === nodeId);
  }

  since(revision: number): HistoryEntry[] {
    return this.entries.filter((entry) => entry.revision > revision);
  }

  /**
   * Re-apply every delta in order to `initial`
   */
  replay(initial: Readonly<StateValues>): StateValues {
    if (this.dropped > 0) {
      throw new HistoryTruncatedError(this.dropped);
    }
    return this.entries.reduce<StateValues>(
      (values, entry) => applyChanges(values, { set: { ...entry.delta }, removed: [...entry.removed] }),
      cloneValues(initial)
    );
  }

  toJSON(): HistoryEntry[] {
    return this.list();
  }
}
