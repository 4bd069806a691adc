/**
 * Run Core
 *
 * Step bookkeeping shared by the blocking and the awaited runners: frontier
 * handling, step budget, state commits, routing, fan-out and joins,
 * automatic snapshots and checkpoints. Everything here is synchronous; the
 * runners only differ in how they call nodes and hooks.
 *
 * @module @stepgraph/engine/run/core
 */

import type { Logger } from '@stepgraph/core';
import type { GraphModel, GraphNode } from '../graph/model.js';
import type { RetryPolicy } from '../graph/schema.js';
import type { AfterNodeOutcome, HookRunner } from '../hooks/runner.js';
import { isHookError, type NodeHookEvent } from '../hooks/types.js';
import {
  isModeMismatchError,
  isPromiseLike,
  type NodeExecutionResult,
  type NodeImplementation,
  type NodeRunContext,
} from '../modes/types.js';
import type { RegistrySnapshot } from '../registry/registry.js';
import { Router } from '../router/router.js';
import type { StateContainer } from '../state/container.js';
import { diffValues, resolveUpdate } from '../state/diff.js';
import { History, type HistoryEntry } from '../state/history.js';
import { SnapshotStore } from '../state/snapshots.js';
import { CancellationToken, isCancelledError } from './cancellation.js';
import type { CheckpointStore, PendingRoute, RunCheckpoint } from './checkpoint.js';
import type { OrchestratorConfig } from './config.js';
import type { ExecutionContext } from './context.js';
import { NodeExecutionError, StepLimitExceededError, toError, toErrorInfo } from './errors.js';
import { computeBackoffDelay, resolveRetryPolicy } from './retry.js';
import type { RunStatus } from './state-machine.js';

// =============================================================================
// Frames
// =============================================================================

/**
 * Isolated line of execution: the main run or one parallel branch
 */
export interface RunFrame {
  /** Branch start node; undefined for the main frame */
  readonly branch?: string;
  state: StateContainer;
  readonly history: History;
  /** Pending node IDs, FIFO without duplicates */
  readonly frontier: string[];
  /** Branches stop when they route here */
  readonly stopAt?: string;
}

/**
 * History of one finished parallel branch
 */
export interface BranchRecord {
  forkNodeId: string;
  branchId: string;
  entries: HistoryEntry[];
}

/**
 * Outcome of one successful node execution
 */
export interface NodeOutcome {
  result: NodeExecutionResult;
  attempt: number;
  durationMs: number;
}

/**
 * What to do after a failed attempt
 */
export interface AttemptFailure {
  error: Error;
  /** Wrapped node failure, passed to plugin onError */
  nodeError?: NodeExecutionError;
  retry: boolean;
  delayMs: number;
}

/**
 * Where a resumed run picks up
 */
export interface RunResumeState {
  state: StateContainer;
  history: History;
  frontier: string[];
  stepCount: number;
  /** Committed node whose successors were never resolved */
  pendingRoute?: PendingRoute;
}

export interface RunCoreInit {
  graph: GraphModel;
  registry: RegistrySnapshot;
  hooks: HookRunner;
  context: ExecutionContext;
  config: OrchestratorConfig;
  logger: Logger;
  initialState: StateContainer;
  checkpointStore?: CheckpointStore;
  resume?: RunResumeState;
}

// =============================================================================
// Run Core
// =============================================================================

export class RunCore {
  readonly graph: GraphModel;
  readonly registry: RegistrySnapshot;
  readonly hooks: HookRunner;
  readonly context: ExecutionContext;
  readonly config: OrchestratorConfig;
  readonly logger: Logger;
  readonly router: Router;
  readonly token: CancellationToken;
  readonly snapshots: SnapshotStore;
  readonly main: RunFrame;
  readonly branches: BranchRecord[] = [];

  stepCount: number;
  finalNodeId: string | undefined;
  /** Main-frame node whose step has not finished */
  currentNodeId: string | undefined;
  lastNodeId: string | undefined;

  private readonly checkpointStore?: CheckpointStore;
  private readonly implementations = new Map<string, NodeImplementation>();
  private activeSteps = 0;
  /** Set once the current main-frame node's result is in the state */
  private committed: PendingRoute | undefined;
  private resumeRoute: PendingRoute | undefined;
  private lastSnapshotStep: number;
  private lastCheckpointStep: number;

  constructor(init: RunCoreInit) {
    this.graph = init.graph;
    this.registry = init.registry;
    this.hooks = init.hooks;
    this.context = init.context;
    this.config = init.config;
    this.logger = init.logger;
    this.checkpointStore = init.checkpointStore;
    this.router = new Router(init.graph);
    this.token = new CancellationToken();
    this.snapshots = new SnapshotStore({ maxSnapshots: init.config.maxSnapshots });

    const resume = init.resume;
    this.main = resume
      ? { state: resume.state, history: resume.history, frontier: [...resume.frontier] }
      : {
          state: init.initialState,
          history: new History({ maxEntries: init.config.historyLimit }),
          frontier: [init.graph.entryPoint],
        };
    this.stepCount = resume?.stepCount ?? 0;
    this.resumeRoute = resume?.pendingRoute;
    this.lastSnapshotStep = this.stepCount;
    this.lastCheckpointStep = this.stepCount;
  }

  get busy(): boolean {
    return this.activeSteps > 0;
  }

  // ===========================================================================
  // Step Selection
  // ===========================================================================

  /**
   * Next node to execute in `frame`, or undefined when the frame is done.
   * Terminal nodes are consumed here without being executed.
   *
   * @throws CancelledError when the run was cancelled
   * @throws StepLimitExceededError when the step budget is spent
   */
  takeNext(frame: RunFrame): GraphNode | undefined {
    for (;;) {
      const nodeId = frame.frontier.shift();
      if (nodeId === undefined) {
        return undefined;
      }
      const node = this.graph.requireNode(nodeId);
      if (node.terminal) {
        if (frame === this.main) {
          this.finalNodeId = node.id;
        }
        continue;
      }

      this.token.throwIfCancelled();
      if (this.stepCount >= this.config.maxSteps) {
        frame.frontier.unshift(nodeId);
        throw new StepLimitExceededError(this.config.maxSteps, nodeId);
      }
      return node;
    }
  }

  beginStep(frame: RunFrame, node: GraphNode): NodeImplementation {
    this.stepCount += 1;
    this.activeSteps += 1;
    if (frame === this.main) {
      this.currentNodeId = node.id;
      this.committed = undefined;
    }
    return this.implementationFor(node);
  }

  /**
   * Take the routing left over from a resumed checkpoint. The node is not
   * executed again and the step is not counted again.
   */
  resumePendingRoute(): { node: GraphNode; next?: string[] } | undefined {
    const pending = this.resumeRoute;
    if (!pending) {
      return undefined;
    }
    this.resumeRoute = undefined;
    const node = this.graph.requireNode(pending.nodeId);
    this.activeSteps += 1;
    this.currentNodeId = node.id;
    this.committed = pending;
    return { node, next: pending.next };
  }

  endStep(frame: RunFrame, node: GraphNode): void {
    this.activeSteps -= 1;
    if (frame === this.main) {
      this.currentNodeId = undefined;
      this.committed = undefined;
      this.lastNodeId = node.id;
    }
  }

  /**
   * Called when a step throws; the failed node stays current for checkpoints
   * and, once committed, is resumed by routing only
   */
  abortStep(): void {
    this.activeSteps = Math.max(0, this.activeSteps - 1);
  }

  private implementationFor(node: GraphNode): NodeImplementation {
    let impl = this.implementations.get(node.id);
    if (!impl) {
      impl = this.registry.nodes.resolve(node.type).create(node);
      this.implementations.set(node.id, impl);
    }
    return impl;
  }

  // ===========================================================================
  // Node Invocation
  // ===========================================================================

  hookEvent(frame: RunFrame, node: GraphNode): NodeHookEvent {
    return { node, state: frame.state, context: this.context, branch: frame.branch };
  }

  nodeContext(frame: RunFrame, node: GraphNode, attempt: number): NodeRunContext {
    return {
      execution: this.context,
      node,
      attempt,
      signal: this.token.signal,
      logger: this.logger.child({ nodeId: node.id }),
      branch: frame.branch,
    };
  }

  retryPolicy(node: GraphNode, impl: NodeImplementation): RetryPolicy {
    return resolveRetryPolicy(node.retry, impl.retry);
  }

  /**
   * Classify a failed attempt. Mode mismatches, cancellations and critical
   * hook failures are passed through and never retried.
   */
  attemptFailed(node: GraphNode, attempt: number, policy: RetryPolicy, error: unknown): AttemptFailure {
    if (isModeMismatchError(error) || isCancelledError(error) || isHookError(error)) {
      return { error, retry: false, delayMs: 0 };
    }

    const nodeError =
      error instanceof NodeExecutionError
        ? error
        : new NodeExecutionError(node.id, attempt, policy.maxAttempts, toErrorInfo(error), error);
    const retry = nodeError.retryable && attempt < policy.maxAttempts;
    const delayMs = retry ? computeBackoffDelay(policy, attempt) : 0;

    this.logger.nodeEnd(node.id, false, 0, {
      attempt,
      maxAttempts: policy.maxAttempts,
      error: nodeError.info.message,
    });
    if (retry) {
      this.logger.warn('Retrying node', { nodeId: node.id, attempt, nextAttempt: attempt + 1, delayMs });
    }
    return { error: nodeError, nodeError, retry, delayMs };
  }

  // ===========================================================================
  // Commits
  // ===========================================================================

  commitNode(frame: RunFrame, node: GraphNode, outcome: NodeOutcome): void {
    const changes = resolveUpdate(frame.state.values, outcome.result.update, outcome.result.remove);
    frame.state = frame.state.apply(changes);
    frame.history.append({
      revision: frame.state.revision,
      nodeId: node.id,
      kind: 'node',
      delta: changes.set,
      removed: changes.removed,
      attempt: outcome.attempt,
      durationMs: outcome.durationMs,
    });
    if (frame === this.main) {
      const { next } = outcome.result;
      this.committed = next ? { nodeId: node.id, next: [...next] } : { nodeId: node.id };
    }
    this.logger.nodeEnd(node.id, true, outcome.durationMs, { attempt: outcome.attempt, branch: frame.branch });
  }

  commitSkipped(frame: RunFrame, node: GraphNode, vetoedBy: string | undefined): void {
    frame.history.append({
      revision: frame.state.revision,
      nodeId: node.id,
      kind: 'skipped',
      delta: {},
      removed: [],
      source: vetoedBy,
    });
    if (frame === this.main) {
      this.committed = { nodeId: node.id };
    }
    this.logger.info('Node skipped by trigger', { nodeId: node.id, vetoedBy });
  }

  commitAmendments(frame: RunFrame, node: GraphNode, amendments: AfterNodeOutcome['amendments']): void {
    for (const { hookName, amendment } of amendments) {
      const changes = resolveUpdate(frame.state.values, amendment.update, amendment.remove);
      frame.state = frame.state.apply(changes);
      frame.history.append({
        revision: frame.state.revision,
        nodeId: node.id,
        kind: 'amendment',
        delta: changes.set,
        removed: changes.removed,
        source: hookName,
      });
      this.logger.debug('State amended by trigger', { nodeId: node.id, hookName, reason: amendment.reason });
    }
  }

  // ===========================================================================
  // Routing
  // ===========================================================================

  /**
   * Successors of `node`: the result's explicit `next`, else the router
   */
  route(frame: RunFrame, node: GraphNode, explicitNext: readonly string[] | undefined): string[] {
    if (explicitNext) {
      const next: string[] = [];
      for (const id of explicitNext) {
        this.graph.requireNode(id, node.id);
        if (!next.includes(id)) next.push(id);
      }
      return next;
    }
    return this.router.resolveNext(node.id, frame.state.values);
  }

  /**
   * Branch frames when `node` fans out in parallel, else undefined
   */
  fork(frame: RunFrame, node: GraphNode, targets: string[]): RunFrame[] | undefined {
    if (!node.parallel || targets.length < 2) {
      return undefined;
    }
    this.logger.debug('Forking parallel branches', { nodeId: node.id, branches: targets, joinAt: node.joinAt });
    return targets.map((target) => {
      const branch: RunFrame = {
        branch: target,
        state: frame.state.branch(),
        history: new History({ maxEntries: this.config.historyLimit }),
        frontier: [],
        stopAt: node.joinAt,
      };
      this.enqueue(branch, [target]);
      return branch;
    });
  }

  /**
   * Merge finished branches into `frame` and continue at the join node
   *
   * @throws MergeConflictError from conflict-detecting strategies
   */
  join(frame: RunFrame, node: GraphNode, branches: RunFrame[]): void {
    const strategyName = node.mergeStrategy ?? this.config.defaultMergeStrategy;
    const strategy = this.registry.mergeStrategies.resolve(strategyName);
    const merged = strategy(
      frame.state.values,
      branches.map((branch) => ({ branchId: branch.branch ?? node.id, values: branch.state.values }))
    );

    const changes = diffValues(frame.state.values, merged);
    frame.state = frame.state.apply(changes);
    frame.history.append({
      revision: frame.state.revision,
      nodeId: node.id,
      kind: 'join',
      delta: changes.set,
      removed: changes.removed,
      source: branches.map((branch) => branch.branch).join(','),
    });

    for (const branch of branches) {
      this.branches.push({ forkNodeId: node.id, branchId: branch.branch ?? node.id, entries: branch.history.list() });
    }
    if (node.joinAt !== undefined) {
      this.enqueue(frame, [node.joinAt]);
    }
    this.logger.debug('Joined parallel branches', { nodeId: node.id, strategy: strategyName, joinAt: node.joinAt });
  }

  /**
   * Append targets to the frontier, skipping duplicates and the frame's stop node
   */
  enqueue(frame: RunFrame, targets: string[]): void {
    for (const target of targets) {
      if (target === frame.stopAt) continue;
      if (!frame.frontier.includes(target)) {
        frame.frontier.push(target);
      }
    }
  }

  // ===========================================================================
  // Snapshots and Checkpoints
  // ===========================================================================

  /**
   * Automatic snapshot and checkpoint after a main-frame step. Returns the
   * checkpoint to save, if one is due.
   */
  afterMainStep(status: RunStatus): RunCheckpoint | undefined {
    const { snapshotEvery, checkpointEvery } = this.config;
    if (snapshotEvery > 0 && this.stepCount - this.lastSnapshotStep >= snapshotEvery) {
      this.lastSnapshotStep = this.stepCount;
      this.snapshots.create(this.main.state, { automatic: true, label: `step-${this.stepCount}` });
    }
    if (this.checkpointStore && checkpointEvery > 0 && this.stepCount - this.lastCheckpointStep >= checkpointEvery) {
      this.lastCheckpointStep = this.stepCount;
      return this.checkpoint(status);
    }
    return undefined;
  }

  checkpoint(status: RunStatus): RunCheckpoint {
    const frontier = [...this.main.frontier];
    const pendingRoute = this.committed ?? this.resumeRoute;
    if (this.currentNodeId !== undefined && !pendingRoute && !frontier.includes(this.currentNodeId)) {
      frontier.unshift(this.currentNodeId);
    }
    return {
      executionId: this.context.executionId,
      workflowId: this.context.workflowId,
      status,
      state: this.main.state.toJSON(),
      history: this.main.history.list(),
      historyDropped: this.main.history.droppedCount,
      frontier,
      ...(pendingRoute ? { pendingRoute: { ...pendingRoute } } : {}),
      stepCount: this.stepCount,
      config: structuredClone({ ...this.context.config }),
      startedAt: this.context.startedAt,
      savedAt: new Date(),
    };
  }

  /**
   * Save without waiting; failures are logged
   */
  saveCheckpointSync(checkpoint: RunCheckpoint): void {
    const store = this.checkpointStore;
    if (!store) return;
    try {
      const pending = store.save(checkpoint.executionId, checkpoint);
      if (isPromiseLike(pending)) {
        Promise.resolve(pending).catch((error: unknown) => this.checkpointFailed(error));
      }
    } catch (error) {
      this.checkpointFailed(error);
    }
  }

  async saveCheckpoint(checkpoint: RunCheckpoint): Promise<void> {
    const store = this.checkpointStore;
    if (!store) return;
    try {
      await store.save(checkpoint.executionId, checkpoint);
    } catch (error) {
      this.checkpointFailed(error);
    }
  }

  private checkpointFailed(error: unknown): void {
    this.logger.error('Failed to save checkpoint', toError(error), { stepCount: this.stepCount });
  }
}
