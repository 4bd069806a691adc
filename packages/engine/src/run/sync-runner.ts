/**
 * Blocking Runner
 *
 * Drives a run on the caller's stack. Parallel branches run one after
 * another; retry delays block the thread.
 *
 * @module @stepgraph/engine/run/sync-runner
 */

import { withNodeSpan } from '@stepgraph/core';
import type { GraphNode } from '../graph/model.js';
import type { SyncCapableMode } from '../modes/factory.js';
import type { NodeImplementation } from '../modes/types.js';
import type { StateContainer } from '../state/container.js';
import type { NodeOutcome, RunCore, RunFrame } from './core.js';
import { NodeExecutionError } from './errors.js';
import { normalizeResult } from './result.js';
import { sleepSync } from './retry.js';

export class SyncRunner {
  constructor(
    private readonly core: RunCore,
    private readonly mode: SyncCapableMode
  ) {}

  /**
   * Execute main-frame steps, yielding the state after each one
   */
  *steps(): Generator<StateContainer, void, undefined> {
    const { core } = this;
    const pending = core.resumePendingRoute();
    if (pending) {
      this.resumeRoute(pending.node, pending.next);
    }
    let node = core.takeNext(core.main);
    while (node) {
      this.step(core.main, node);
      const checkpoint = core.afterMainStep('running');
      if (checkpoint) {
        core.saveCheckpointSync(checkpoint);
      }
      yield core.main.state;
      node = core.takeNext(core.main);
    }
  }

  private drain(frame: RunFrame): void {
    let node = this.core.takeNext(frame);
    while (node) {
      this.step(frame, node);
      node = this.core.takeNext(frame);
    }
  }

  private step(frame: RunFrame, node: GraphNode): void {
    const { core } = this;
    try {
      const impl = core.beginStep(frame, node);
      const before = core.hooks.beforeNodeSync(core.hookEvent(frame, node));

      let outcome: NodeOutcome | undefined;
      if (before.allowed) {
        outcome = this.execute(frame, node, impl);
        core.token.throwIfCancelled();
        core.commitNode(frame, node, outcome);
        const after = core.hooks.afterNodeSync({ ...core.hookEvent(frame, node), ...outcome });
        core.commitAmendments(frame, node, after.amendments);
      } else {
        core.commitSkipped(frame, node, before.vetoedBy);
      }

      this.advance(frame, node, outcome?.result.next);
    } catch (error) {
      core.abortStep();
      throw error;
    }
    core.endStep(frame, node);
  }

  /**
   * Schedule the successors of a node committed before the checkpoint
   */
  private resumeRoute(node: GraphNode, next: readonly string[] | undefined): void {
    const { core } = this;
    try {
      this.advance(core.main, node, next);
    } catch (error) {
      core.abortStep();
      throw error;
    }
    core.endStep(core.main, node);
  }

  private advance(frame: RunFrame, node: GraphNode, next: readonly string[] | undefined): void {
    const { core } = this;
    const targets = core.route(frame, node, next);
    const branches = core.fork(frame, node, targets);
    if (branches) {
      for (const branch of branches) {
        this.drain(branch);
      }
      core.join(frame, node, branches);
    } else {
      core.enqueue(frame, targets);
    }
  }

  /**
   * Run the node under its retry policy
   */
  private execute(frame: RunFrame, node: GraphNode, impl: NodeImplementation): NodeOutcome {
    const { core, mode } = this;
    const policy = core.retryPolicy(node, impl);

    for (let attempt = 1; ; attempt++) {
      const startTime = Date.now();
      try {
        const ctx = core.nodeContext(frame, node, attempt);
        const values = frame.state.copyValues();
        const raw = withNodeSpan(node.id, attempt, () =>
          mode.kind === 'sync' ? mode.runNode(node, impl, values, ctx) : mode.runNodeSync(node, impl, values, ctx)
        );
        const result = normalizeResult(node.id, attempt, policy.maxAttempts, raw);
        if (result.error) {
          throw new NodeExecutionError(node.id, attempt, policy.maxAttempts, result.error);
        }
        return { result, attempt, durationMs: Date.now() - startTime };
      } catch (error) {
        const failure = core.attemptFailed(node, attempt, policy, error);
        if (failure.nodeError) {
          core.hooks.errorSync(core.context, failure.nodeError);
        }
        if (!failure.retry) {
          throw failure.error;
        }
        sleepSync(failure.delayMs);
        core.token.throwIfCancelled();
      }
    }
  }
}
