/**
 * Asynchronous Execution Mode
 *
 * Awaits a node's asynchronous entry point. Sync-only nodes are rejected
 * without being called; the run's abort signal interrupts the wait.
 *
 * @module @stepgraph/engine/modes/async-mode
 */

import type { GraphNode } from '../graph/model.js';
import type { ExecutionCapability } from '../graph/schema.js';
import type { StateValues } from '../state/diff.js';
import {
  ModeMismatchError,
  supportsAsync,
  type NodeExecutionResult,
  type NodeImplementation,
  type NodeRunContext,
} from './types.js';

/**
 * Settle with `work`, or reject with the signal's reason once it aborts
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // The abandoned promise may still reject later
    void work.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      void work.catch(() => undefined);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class AsyncMode {
  readonly kind = 'async' as const;

  supports(capability: ExecutionCapability): boolean {
    return supportsAsync(capability);
  }

  async runNode(
    node: GraphNode,
    impl: NodeImplementation,
    state: StateValues,
    ctx: NodeRunContext
  ): Promise<NodeExecutionResult> {
    if (!supportsAsync(node.capability)) {
      throw new ModeMismatchError('async', 'node is sync-only', node.id, node.capability);
    }
    if (!impl.runAsync) {
      throw new ModeMismatchError('async', 'implementation has no asynchronous entry point', node.id, node.capability);
    }
    if (ctx.signal.aborted) {
      throw ctx.signal.reason;
    }
    return raceAbort(impl.runAsync(state, ctx), ctx.signal);
  }
}
