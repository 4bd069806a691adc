/**
 * State Container
 *
 * Immutable key/value state passed between nodes. Every mutation produces a
 * new container with a bumped revision; values are deep-frozen so nothing
 * holding a reference can change them.
 *
 * @module @stepgraph/engine/state/container
 */

import {
  applyChanges,
  cloneValues,
  deepFreeze,
  diffValues,
  type StateChanges,
  type StateValues,
} from './diff.js';

/**
 * Plain-data form of a container, as stored in checkpoints
 */
export interface SerializedState {
  values: StateValues;
  revision: number;
  metadata: Record<string, unknown>;
}

export class StateContainer {
  readonly values: Readonly<StateValues>;
  readonly revision: number;
  readonly metadata: Readonly<Record<string, unknown>>;

  private constructor(values: StateValues, revision: number, metadata: Record<string, unknown>) {
    this.values = deepFreeze(values);
    this.revision = revision;
    this.metadata = Object.freeze(metadata);
  }

  /**
   * Create a container at revision 0 from a copy of `values`
   */
  static create(values: Readonly<StateValues> = {}, metadata: Record<string, unknown> = {}): StateContainer {
    return new StateContainer(cloneValues(values), 0, { ...metadata });
  }

  static fromJSON(data: SerializedState): StateContainer {
    return new StateContainer(cloneValues(data.values), data.revision, { ...data.metadata });
  }

  get(key: string): unknown {
    return this.values[key];
  }

  has(key: string): boolean {
    return Object.hasOwn(this.values, key);
  }

  get keys(): string[] {
    return Object.keys(this.values);
  }

  /**
   * Mutable deep copy of the values, as handed to node implementations
   */
  copyValues(): StateValues {
    return cloneValues(this.values);
  }

  /**
   * Independent copy at the same revision, for a parallel branch
   */
  branch(): StateContainer {
    return new StateContainer(cloneValues(this.values), this.revision, { ...this.metadata });
  }

  /**
   * Apply changes, returning the next revision
   */
  apply(changes: StateChanges): StateContainer {
    return new StateContainer(applyChanges(this.values, changes), this.revision + 1, { ...this.metadata });
  }

  /**
   * Replace all values, returning the next revision
   */
  replace(values: Readonly<StateValues>): StateContainer {
    return new StateContainer(cloneValues(values), this.revision + 1, { ...this.metadata });
  }

  /**
   * Changes that turn this container's values into `other`'s
   */
  diff(other: StateContainer | Readonly<StateValues>): StateChanges {
    const target = other instanceof StateContainer ? other.values : other;
    return diffValues(this.values, target);
  }

  toJSON(): SerializedState {
    return {
      values: this.copyValues(),
      revision: this.revision,
      metadata: { ...this.metadata },
    };
  }
}
