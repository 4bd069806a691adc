/**
 * Snapshot Store
 *
 * Point-in-time copies of a run's state. Retention is bounded per run;
 * the oldest snapshots are removed first.
 *
 * @module @stepgraph/engine/state/snapshots
 */

import { randomUUID } from 'node:crypto';
import type { StateContainer } from './container.js';
import { diffValues, type StateChanges, type StateValues } from './diff.js';

export interface Snapshot {
  readonly id: string;
  readonly revision: number;
  readonly values: Readonly<StateValues>;
  readonly createdAt: Date;
  readonly label?: string;
  /** Taken by the orchestrator rather than on request */
  readonly automatic: boolean;
}

export interface SnapshotStoreOptions {
  /** Maximum retained snapshots (default: 50) */
  maxSnapshots?: number;
}

export const DEFAULT_MAX_SNAPSHOTS = 50;

export class SnapshotNotFoundError extends Error {
  readonly name = 'SnapshotNotFoundError';
  readonly isSnapshotNotFound = true;

  constructor(public readonly snapshotId: string) {
    super(`Snapshot not found: ${snapshotId}`);
  }
}

export class SnapshotStore {
  private snapshots = new Map<string, Snapshot>();
  readonly maxSnapshots: number;

  constructor(options: SnapshotStoreOptions = {}) {
    this.maxSnapshots = Math.max(1, options.maxSnapshots ?? DEFAULT_MAX_SNAPSHOTS);
  }

  create(state: StateContainer, options: { label?: string; automatic?: boolean } = {}): Snapshot {
    const snapshot: Snapshot = Object.freeze({
      id: randomUUID(),
      revision: state.revision,
      // Container values are already deep-frozen
      values: state.values,
      createdAt: new Date(),
      label: options.label,
      automatic: options.automatic ?? false,
    });
    this.snapshots.set(snapshot.id, snapshot);
    this.prune();
    return snapshot;
  }

  get(id: string): Snapshot | undefined {
    return this.snapshots.get(id);
  }

  require(id: string): Snapshot {
    const snapshot = this.snapshots.get(id);
    if (!snapshot) {
      throw new SnapshotNotFoundError(id);
    }
    return snapshot;
  }

  /**
   * Snapshots in creation order
   */
  list(): Snapshot[] {
    return [...this.snapshots.values()];
  }

  delete(id: string): boolean {
    return this.snapshots.delete(id);
  }

  get size(): number {
    return this.snapshots.size;
  }

  /**
   * Changes between two snapshots
   */
  diff(fromId: string, toId: string): StateChanges {
    return diffValues(this.require(fromId).values, this.require(toId).values);
  }

  private prune(): void {
    // Map iteration follows insertion order, so the first keys are the oldest
    for (const id of this.snapshots.keys()) {
      if (this.snapshots.size <= this.maxSnapshots) {
        break;
      }
      this.snapshots.delete(id);
    }
  }
}
