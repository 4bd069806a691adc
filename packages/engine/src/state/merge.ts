/**
 * Branch Merge Strategies
 *
 * Combine the values produced by parallel branches back into the state that
 * existed at the fork. Branches are passed in edge-declaration order.
 *
 * @module @stepgraph/engine/state/merge
 */

import { isDeepStrictEqual } from 'node:util';
import { applyChanges, cloneValues, diffValues, type StateValues } from './diff.js';

export interface BranchState {
  /** Node the branch started at */
  branchId: string;
  values: Readonly<StateValues>;
}

/**
 * Merge branch values into the fork-time base values
 */
export type MergeStrategy = (base: Readonly<StateValues>, branches: readonly BranchState[]) => StateValues;

export class MergeConflictError extends Error {
  readonly name = 'MergeConflictError';
  readonly isMergeConflict = true;

  constructor(
    public readonly key: string,
    public readonly branchIds: string[]
  ) {
    super(`Parallel branches wrote conflicting values for "${key}": ${branchIds.join(', ')}`);
  }
}

/**
 * Apply each branch's changes in order; for overlapping keys the later
 * branch wins
 */
export const lastWriteWins: MergeStrategy = (base, branches) => {
  let merged = cloneValues(base);
  for (const branch of branches) {
    merged = applyChanges(merged, diffValues(base, branch.values));
  }
  return merged;
};

/**
 * Like lastWriteWins, but two branches changing the same key to different
 * outcomes raise MergeConflictError
 */
export const failOnConflict: MergeStrategy = (base, branches) => {
  const writers = new Map<string, { branchId: string; removed: boolean; value: unknown }>();

  for (const branch of branches) {
    const changes = diffValues(base, branch.values);
    const touched: Array<[string, boolean, unknown]> = [
      ...Object.entries(changes.set).map(([key, value]): [string, boolean, unknown] => [key, false, value]),
      ...changes.removed.map((key): [string, boolean, unknown] => [key, true, undefined]),
    ];

    for (const [key, removed, value] of touched) {
      const previous = writers.get(key);
      if (previous && (previous.removed !== removed || !isDeepStrictEqual(previous.value, value))) {
        throw new MergeConflictError(key, [previous.branchId, branch.branchId]);
      }
      writers.set(key, { branchId: branch.branchId, removed, value });
    }
  }

  return lastWriteWins(base, branches);
};

export const DEFAULT_MERGE_STRATEGY = 'last-write-wins';

export const BUILTIN_MERGE_STRATEGIES: Readonly<Record<string, MergeStrategy>> = {
  'last-write-wins': lastWriteWins,
  'fail-on-conflict': failOnConflict,
};
