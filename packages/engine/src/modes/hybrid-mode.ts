/**
 * Hybrid Execution Mode
 *
 * Accepts nodes of either capability and dispatches each to the matching
 * mode. It never bridges: in a blocking run async-only nodes still fail.
 *
 * @module @stepgraph/engine/modes/hybrid-mode
 */

import type { GraphNode } from '../graph/model.js';
import type { ExecutionCapability } from '../graph/schema.js';
import type { StateValues } from '../state/diff.js';
import { AsyncMode } from './async-mode.js';
import { SyncMode } from './sync-mode.js';
import type {
  NodeExecutionResult,
  NodeImplementation,
  NodeRunContext,
} from './types.js';

export class HybridMode {
  readonly kind = 'hybrid' as const;

  constructor(
    private readonly syncMode: SyncMode = new SyncMode(),
    private readonly asyncMode: AsyncMode = new AsyncMode()
  ) {}

  supports(_capability: ExecutionCapability): boolean {
    return true;
  }

  /**
   * Blocking dispatch, used when the run itself is synchronous
   */
  runNodeSync(
    node: GraphNode,
    impl: NodeImplementation,
    state: StateValues,
    ctx: NodeRunContext
  ): NodeExecutionResult {
    return this.syncMode.runNode(node, impl, state, ctx);
  }

  /**
   * Sync-only nodes run on the current stack; everything else is awaited
   */
  async runNode(
    node: GraphNode,
    impl: NodeImplementation,
    state: StateValues,
    ctx: NodeRunContext
  ): Promise<NodeExecutionResult> {
    if (node.capability === 'sync') {
      return this.syncMode.runNode(node, impl, state, ctx);
    }
    return this.asyncMode.runNode(node, impl, state, ctx);
  }
}
