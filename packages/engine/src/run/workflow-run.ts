/**
 * Workflow Run
 *
 * Handle for one execution of a graph. A run is started once, by exactly one
 * of execute(), executeAsync(), stream() or streamSync(), and is never
 * restarted; a fresh run starts from the initial state again.
 *
 * @module @stepgraph/engine/run/workflow-run
 */

import {
  createContext,
  runWithContext,
  runWithContextAsync,
  type TelemetryContext,
} from '@stepgraph/core';
import type { GraphModel } from '../graph/model.js';
import type { RunSummary } from '../hooks/types.js';
import type { AsyncCapableMode, ExecutionMode, SyncCapableMode } from '../modes/factory.js';
import { ModeMismatchError } from '../modes/types.js';
import type { StateContainer } from '../state/container.js';
import type { ReadonlyHistory } from '../state/history.js';
import type { Snapshot } from '../state/snapshots.js';
import { AsyncRunner } from './async-runner.js';
import { isCancelledError } from './cancellation.js';
import type { RunCheckpoint } from './checkpoint.js';
import type { BranchRecord, RunCore } from './core.js';
import type { ExecutionContext } from './context.js';
import { isNodeExecutionError, RunBusyError, toError } from './errors.js';
import { SyncRunner } from './sync-runner.js';
import { isTerminalState, validateTransition, type RunStatus } from './state-machine.js';

export class WorkflowRun {
  private _status: RunStatus = 'pending';
  private _error: Error | undefined;
  private startTime = 0;
  private endTime: number | undefined;
  private disarmDeadline: () => void = () => {};
  private readonly telemetry: TelemetryContext;

  constructor(
    private readonly core: RunCore,
    readonly mode: ExecutionMode,
    private readonly timeoutMs?: number
  ) {
    this.telemetry = createContext('engine', {
      workflowId: core.context.workflowId,
      executionId: core.context.executionId,
    });
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get context(): ExecutionContext {
    return this.core.context;
  }

  get executionId(): string {
    return this.core.context.executionId;
  }

  get graph(): GraphModel {
    return this.core.graph;
  }

  get status(): RunStatus {
    return this._status;
  }

  /**
   * Live state of the main line of execution
   */
  get state(): StateContainer {
    return this.core.main.state;
  }

  get history(): ReadonlyHistory {
    return this.core.main.history;
  }

  get error(): Error | undefined {
    return this._error;
  }

  /**
   * Terminal node that ended the run, if one was reached
   */
  get finalNodeId(): string | undefined {
    return this.core.finalNodeId;
  }

  get stepCount(): number {
    return this.core.stepCount;
  }

  /**
   * Histories of finished parallel branches, in join order
   */
  get branchHistories(): readonly BranchRecord[] {
    return this.core.branches;
  }

  get snapshots(): readonly Snapshot[] {
    return this.core.snapshots.list();
  }

  get durationMs(): number {
    if (this.startTime === 0) return 0;
    return (this.endTime ?? Date.now()) - this.startTime;
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run to completion on the caller's stack
   *
   * @throws ModeMismatchError when the run was created with AsyncMode
   */
  execute(): StateContainer {
    const runner = new SyncRunner(this.core, this.requireSyncMode('execute'));
    this.begin();

    return runWithContext(this.telemetry, () => {
      try {
        this.core.hooks.runStartSync(this.context);
        const steps = runner.steps();
        let step = steps.next();
        while (!step.done) {
          step = steps.next();
        }
        this.finishSync('completed');
      } catch (error) {
        throw this.failSync(error);
      }
      return this.state;
    });
  }

  /**
   * Run to completion, awaiting asynchronous nodes
   *
   * @throws ModeMismatchError when the run was created with SyncMode
   */
  async executeAsync(): Promise<StateContainer> {
    const runner = new AsyncRunner(this.core, this.requireAsyncMode('executeAsync'));
    this.begin();

    return runWithContextAsync(this.telemetry, async () => {
      try {
        await this.core.hooks.runStart(this.context);
        const steps = runner.steps();
        let step = await steps.next();
        while (!step.done) {
          step = await steps.next();
        }
        await this.finish('completed');
      } catch (error) {
        throw await this.fail(error);
      }
      return this.state;
    });
  }

  /**
   * Yield the state after every step. Closing the stream early cancels the run.
   */
  async *stream(): AsyncGenerator<StateContainer, void, undefined> {
    const runner = new AsyncRunner(this.core, this.requireAsyncMode('stream'));
    this.begin();

    try {
      await runWithContextAsync(this.telemetry, () => this.core.hooks.runStart(this.context));
      const steps = runner.steps();
      for (;;) {
        const step = await runWithContextAsync(this.telemetry, () => steps.next());
        if (step.done) break;
        yield step.value;
      }
      await runWithContextAsync(this.telemetry, () => this.finish('completed'));
    } catch (error) {
      throw await runWithContextAsync(this.telemetry, () => this.fail(error));
    } finally {
      if (!isTerminalState(this._status)) {
        await runWithContextAsync(this.telemetry, () => this.closeEarly());
      }
    }
  }

  /**
   * Blocking counterpart of stream()
   */
  *streamSync(): Generator<StateContainer, void, undefined> {
    const runner = new SyncRunner(this.core, this.requireSyncMode('streamSync'));
    this.begin();

    try {
      runWithContext(this.telemetry, () => this.core.hooks.runStartSync(this.context));
      const steps = runner.steps();
      for (;;) {
        const step = runWithContext(this.telemetry, () => steps.next());
        if (step.done) break;
        yield step.value;
      }
      runWithContext(this.telemetry, () => this.finishSync('completed'));
    } catch (error) {
      throw runWithContext(this.telemetry, () => this.failSync(error));
    } finally {
      if (!isTerminalState(this._status)) {
        runWithContext(this.telemetry, () => this.closeEarlySync());
      }
    }
  }

  /**
   * Request cancellation. A pending run is cancelled at once; a running one
   * stops before its next step, and in-flight async node work is aborted.
   */
  cancel(reason = 'Cancelled by caller'): void {
    this.core.token.cancel({ initiator: 'user', reason, requestedAt: new Date() });
    if (this._status === 'pending') {
      this.transition('cancelled');
      this._error = this.cancellationError();
      this.core.logger.warn('Run cancelled before start', { reason });
    }
  }

  // ===========================================================================
  // Snapshots
  // ===========================================================================

  /**
   * Snapshot the live state
   *
   * @returns snapshot ID
   */
  snapshot(label?: string): string {
    return this.core.snapshots.create(this.core.main.state, { label }).id;
  }

  /**
   * Replace the live values with a snapshot's, recording a `restore` entry
   *
   * @throws SnapshotNotFoundError
   * @throws RunBusyError when a step is executing
   */
  restore(snapshotId: string): void {
    if (this.core.busy) {
      throw new RunBusyError(this.executionId, 'restore');
    }
    const snapshot = this.core.snapshots.require(snapshotId);
    const main = this.core.main;
    const changes = main.state.diff(snapshot.values);
    main.state = main.state.replace(snapshot.values);
    main.history.append({
      revision: main.state.revision,
      nodeId: this.core.lastNodeId ?? this.graph.entryPoint,
      kind: 'restore',
      delta: changes.set,
      removed: changes.removed,
      source: snapshot.id,
    });
    this.core.logger.info('Snapshot restored', { snapshotId, revision: main.state.revision });
  }

  toCheckpoint(): RunCheckpoint {
    return this.core.checkpoint(this._status);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  private requireSyncMode(operation: string): SyncCapableMode {
    const mode = this.mode;
    if (mode.kind === 'async') {
      throw new ModeMismatchError('async', `${operation}() needs SyncMode or HybridMode`);
    }
    return mode;
  }

  private requireAsyncMode(operation: string): AsyncCapableMode {
    const mode = this.mode;
    if (mode.kind === 'sync') {
      throw new ModeMismatchError('sync', `${operation}() needs AsyncMode or HybridMode`);
    }
    return mode;
  }

  private transition(to: RunStatus): void {
    validateTransition(this._status, to, { executionId: this.executionId, timestamp: new Date() });
    this._status = to;
  }

  private begin(): void {
    this.transition('running');
    this.startTime = Date.now();
    if (this.timeoutMs !== undefined) {
      this.core.token.setDeadline(new Date(this.startTime + this.timeoutMs));
      this.disarmDeadline = this.core.token.armDeadline();
    }
    this.core.logger.runStart(this.core.context.workflowId, this.executionId, {
      mode: this.mode.kind,
      stepCount: this.core.stepCount,
    });
  }

  /**
   * Settle the status and save the final checkpoint
   */
  private settle(status: RunStatus, error?: Error): { summary: RunSummary; checkpoint: RunCheckpoint } {
    this.transition(status);
    this._error = error;
    this.endTime = Date.now();
    this.disarmDeadline();

    this.core.logger.runEnd(this.core.context.workflowId, this.executionId, status, this.durationMs, {
      stepCount: this.core.stepCount,
      finalNodeId: this.core.finalNodeId,
      ...(error ? { error: error.message, errorName: error.name } : {}),
    });

    const summary: RunSummary = {
      status,
      stepCount: this.core.stepCount,
      durationMs: this.durationMs,
      history: this.core.main.history.list(),
      branchHistories: [...this.core.branches],
      finalNodeId: this.core.finalNodeId,
      error,
    };
    return { summary, checkpoint: this.core.checkpoint(status) };
  }

  private failureStatus(error: Error): RunStatus {
    return isCancelledError(error) ? 'cancelled' : 'failed';
  }

  private finishSync(status: RunStatus, error?: Error): void {
    const { summary, checkpoint } = this.settle(status, error);
    this.core.saveCheckpointSync(checkpoint);
    this.core.hooks.runEndSync(this.context, this.state, summary);
  }

  private async finish(status: RunStatus, error?: Error): Promise<void> {
    const { summary, checkpoint } = this.settle(status, error);
    await this.core.saveCheckpoint(checkpoint);
    await this.core.hooks.runEnd(this.context, this.state, summary);
  }

  /**
   * Record a failure and return the error to rethrow. Failures from hooks
   * while reporting are logged so they never mask the original error.
   */
  private failSync(thrown: unknown): Error {
    const error = toError(thrown);
    if (isTerminalState(this._status)) {
      return error;
    }
    try {
      if (!isNodeExecutionError(error) && !isCancelledError(error)) {
        this.core.hooks.errorSync(this.context, error);
      }
      this.finishSync(this.failureStatus(error), error);
    } catch (hookError) {
      this.reportHookFailure(hookError, error);
    }
    return error;
  }

  private async fail(thrown: unknown): Promise<Error> {
    const error = toError(thrown);
    if (isTerminalState(this._status)) {
      return error;
    }
    try {
      if (!isNodeExecutionError(error) && !isCancelledError(error)) {
        await this.core.hooks.error(this.context, error);
      }
      await this.finish(this.failureStatus(error), error);
    } catch (hookError) {
      this.reportHookFailure(hookError, error);
    }
    return error;
  }

  private closeEarlySync(): void {
    this.core.token.cancel({ initiator: 'user', reason: 'Stream closed by consumer', requestedAt: new Date() });
    this.failSync(this.cancellationError());
  }

  private async closeEarly(): Promise<void> {
    this.core.token.cancel({ initiator: 'user', reason: 'Stream closed by consumer', requestedAt: new Date() });
    await this.fail(this.cancellationError());
  }

  private cancellationError(): Error {
    try {
      this.core.token.throwIfCancelled();
    } catch (error) {
      return toError(error);
    }
    return new Error('Run cancelled');
  }

  private reportHookFailure(hookError: unknown, original: Error): void {
    if (!isTerminalState(this._status)) {
      this.transition(this.failureStatus(original));
      this._error = original;
      this.endTime = Date.now();
      this.disarmDeadline();
    }
    this.core.logger.error('Hook failed while reporting run failure', hookError, {
      originalError: original.message,
    });
  }
}
