/**
 * Awaited Runner
 *
 * Drives a run through promises. Parallel branches run concurrently and all
 * of them settle before the join; retry delays are cancellable timers.
 *
 * @module @stepgraph/engine/run/async-runner
 */

import { withNodeSpan } from '@stepgraph/core';
import type { GraphNode } from '../graph/model.js';
import type { AsyncCapableMode } from '../modes/factory.js';
import type { NodeImplementation } from '../modes/types.js';
import type { StateContainer } from '../state/container.js';
import type { NodeOutcome, RunCore, RunFrame } from './core.js';
import { NodeExecutionError } from './errors.js';
import { normalizeResult } from './result.js';
import { sleep } from './retry.js';

export class AsyncRunner {
  constructor(
    private readonly core: RunCore,
    private readonly mode: AsyncCapableMode
  ) {}

  /**
   * Execute main-frame steps, yielding the state after each one
   */
  async *steps(): AsyncGenerator<StateContainer, void, undefined> {
    const { core } = this;
    const pending = core.resumePendingRoute();
    if (pending) {
      await this.resumeRoute(pending.node, pending.next);
    }
    let node = core.takeNext(core.main);
    while (node) {
      await this.step(core.main, node);
      const checkpoint = core.afterMainStep('running');
      if (checkpoint) {
        await core.saveCheckpoint(checkpoint);
      }
      yield core.main.state;
      node = core.takeNext(core.main);
    }
  }

  private async drain(frame: RunFrame): Promise<void> {
    let node = this.core.takeNext(frame);
    while (node) {
      await this.step(frame, node);
      node = this.core.takeNext(frame);
    }
  }

  private async step(frame: RunFrame, node: GraphNode): Promise<void> {
    const { core } = this;
    try {
      const impl = core.beginStep(frame, node);
      const before = await core.hooks.beforeNode(core.hookEvent(frame, node));

      let outcome: NodeOutcome | undefined;
      if (before.allowed) {
        outcome = await this.execute(frame, node, impl);
        core.token.throwIfCancelled();
        core.commitNode(frame, node, outcome);
        const after = await core.hooks.afterNode({ ...core.hookEvent(frame, node), ...outcome });
        core.commitAmendments(frame, node, after.amendments);
      } else {
        core.commitSkipped(frame, node, before.vetoedBy);
      }

      await this.advance(frame, node, outcome?.result.next);
    } catch (error) {
      core.abortStep();
      throw error;
    }
    core.endStep(frame, node);
  }

  /**
   * Schedule the successors of a node committed before the checkpoint
   */
  private async resumeRoute(node: GraphNode, next: readonly string[] | undefined): Promise<void> {
    const { core } = this;
    try {
      await this.advance(core.main, node, next);
    } catch (error) {
      core.abortStep();
      throw error;
    }
    core.endStep(core.main, node);
  }

  private async advance(frame: RunFrame, node: GraphNode, next: readonly string[] | undefined): Promise<void> {
    const { core } = this;
    const targets = core.route(frame, node, next);
    const branches = core.fork(frame, node, targets);
    if (branches) {
      const settled = await Promise.allSettled(branches.map((branch) => this.drain(branch)));
      const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) {
        throw rejected.reason;
      }
      core.join(frame, node, branches);
    } else {
      core.enqueue(frame, targets);
    }
  }

  /**
   * Run the node under its retry policy
   */
  private async execute(frame: RunFrame, node: GraphNode, impl: NodeImplementation): Promise<NodeOutcome> {
    const { core, mode } = this;
    const policy = core.retryPolicy(node, impl);

    for (let attempt = 1; ; attempt++) {
      const startTime = Date.now();
      try {
        const ctx = core.nodeContext(frame, node, attempt);
        const values = frame.state.copyValues();
        const raw = await withNodeSpan(node.id, attempt, () => mode.runNode(node, impl, values, ctx));
        const result = normalizeResult(node.id, attempt, policy.maxAttempts, raw);
        if (result.error) {
          throw new NodeExecutionError(node.id, attempt, policy.maxAttempts, result.error);
        }
        return { result, attempt, durationMs: Date.now() - startTime };
      } catch (error) {
        const failure = core.attemptFailed(node, attempt, policy, error);
        if (failure.nodeError) {
          await core.hooks.error(core.context, failure.nodeError);
        }
        if (!failure.retry) {
          throw failure.error;
        }
        await sleep(failure.delayMs, core.token);
        core.token.throwIfCancelled();
      }
    }
  }
}
