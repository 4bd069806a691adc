/**
 * State Diffing
 *
 * Top-level key diffs between value maps. Values are compared structurally,
 * so a node that rewrites a key with an equal value produces no change.
 *
 * @module @stepgraph/engine/state/diff
 */

import { isDeepStrictEqual } from 'node:util';

/**
 * Key/value map held by a state container
 */
export type StateValues = Record<string, unknown>;

/**
 * Changes that turn one value map into another
 */
export interface StateChanges {
  /** Keys added or changed, with their new values */
  set: StateValues;
  /** Keys deleted */
  removed: string[];
}

/**
 * Deep, mutable copy of a value map
 */
export function cloneValues(values: Readonly<StateValues>): StateValues {
  return structuredClone(values);
}

/**
 * Compute the changes from `before` to `after`
 */
export function diffValues(before: Readonly<StateValues>, after: Readonly<StateValues>): StateChanges {
  const set: StateValues = {};
  const removed: string[] = [];

  for (const [key, value] of Object.entries(after)) {
    if (!Object.hasOwn(before, key) || !isDeepStrictEqual(before[key], value)) {
      set[key] = structuredClone(value);
    }
  }
  for (const key of Object.keys(before)) {
    if (!Object.hasOwn(after, key)) {
      removed.push(key);
    }
  }

  return { set, removed };
}

/**
 * Apply changes to a copy of `values`
 */
export function applyChanges(values: Readonly<StateValues>, changes: StateChanges): StateValues {
  const next = cloneValues(values);
  for (const [key, value] of Object.entries(changes.set)) {
    next[key] = structuredClone(value);
  }
  for (const key of changes.removed) {
    delete next[key];
  }
  return next;
}

/**
 * Resolve a shallow update plus key removals against the current values,
 * keeping only keys whose values actually change
 */
export function resolveUpdate(
  current: Readonly<StateValues>,
  update: Readonly<StateValues> = {},
  remove: readonly string[] = []
): StateChanges {
  const next: StateValues = { ...current, ...update };
  for (const key of remove) {
    delete next[key];
  }
  return diffValues(current, next);
}

export function isEmptyChanges(changes: StateChanges): boolean {
  return changes.removed.length === 0 && Object.keys(changes.set).length === 0;
}

/**
 * Freeze `value` and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
