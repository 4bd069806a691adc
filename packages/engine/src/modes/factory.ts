/**
 * @module @stepgraph/engine/modes/factory
 */

import { AsyncMode } from './async-mode.js';
import { HybridMode } from './hybrid-mode.js';
import { SyncMode } from './sync-mode.js';
import type { ExecutionModeKind } from './types.js';

export type ExecutionMode = SyncMode | AsyncMode | HybridMode;

/** Modes that can drive a blocking run */
export type SyncCapableMode = SyncMode | HybridMode;

/** Modes that can drive an awaited or streamed run */
export type AsyncCapableMode = AsyncMode | HybridMode;

export function createMode(kind: ExecutionModeKind): ExecutionMode {
  switch (kind) {
    case 'sync':
      return new SyncMode();
    case 'async':
      return new AsyncMode();
    case 'hybrid':
      return new HybridMode();
  }
}

export function resolveMode(mode: ExecutionMode | ExecutionModeKind): ExecutionMode {
  return typeof mode === 'string' ? createMode(mode) : mode;
}
