/**
 * Synchronous Execution Mode
 *
 * Calls a node's synchronous entry point on the caller's stack. Async-only
 * nodes fail before anything is invoked.
 *
 * @module @stepgraph/engine/modes/sync-mode
 */

import type { GraphNode } from '../graph/model.js';
import type { ExecutionCapability } from '../graph/schema.js';
import type { StateValues } from '../state/diff.js';
import {
  ModeMismatchError,
  isPromiseLike,
  supportsSync,
  type NodeExecutionResult,
  type NodeImplementation,
  type NodeRunContext,
} from './types.js';

export class SyncMode {
  readonly kind = 'sync' as const;

  supports(capability: ExecutionCapability): boolean {
    return supportsSync(capability);
  }

  runNode(
    node: GraphNode,
    impl: NodeImplementation,
    state: StateValues,
    ctx: NodeRunContext
  ): NodeExecutionResult {
    if (!supportsSync(node.capability)) {
      throw new ModeMismatchError('sync', 'node is async-only', node.id, node.capability);
    }
    if (!impl.runSync) {
      throw new ModeMismatchError('sync', 'implementation has no synchronous entry point', node.id, node.capability);
    }

    const result = impl.runSync(state, ctx);
    if (isPromiseLike(result)) {
      // Never awaited; keep a late rejection from going unhandled
      Promise.resolve(result).catch((error: unknown) => {
        ctx.logger.error('Discarded promise from synchronous entry point rejected', error, { nodeId: node.id });
      });
      throw new ModeMismatchError('sync', 'synchronous entry point returned a promise', node.id, node.capability);
    }
    return result;
  }
}
