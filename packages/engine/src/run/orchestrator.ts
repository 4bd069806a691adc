/**
 * Orchestrator
 *
 * Creates workflow runs: resolves configuration, takes a registry snapshot,
 * binds the graph's declared hooks and wires state, history, snapshots and
 * checkpoints for each run.
 *
 * @module @stepgraph/engine/run/orchestrator
 */

import { getLogger, type Logger } from '@stepgraph/core';
import type { GraphModel } from '../graph/model.js';
import { bindGraphHooks } from '../hooks/config.js';
import { HookRunner } from '../hooks/runner.js';
import type { HookConfig, Plugin, Trigger } from '../hooks/types.js';
import { resolveMode, type ExecutionMode } from '../modes/factory.js';
import type { ExecutionModeKind } from '../modes/types.js';
import type { ComponentRegistry, RegistrySnapshot } from '../registry/registry.js';
import { StateContainer } from '../state/container.js';
import type { StateValues } from '../state/diff.js';
import { History } from '../state/history.js';
import type { CheckpointStore } from './checkpoint.js';
import {
  resolveOrchestratorConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
} from './config.js';
import { createExecutionContext } from './context.js';
import { RunCore, type RunResumeState } from './core.js';
import { WorkflowRun } from './workflow-run.js';

export interface OrchestratorOptions {
  registry: ComponentRegistry;
  /** Shared hook runner; a new one is created from `hookConfig` when omitted */
  hooks?: HookRunner;
  hookConfig?: Partial<HookConfig>;
  triggers?: Trigger[];
  plugins?: Plugin[];
  config?: OrchestratorConfigInput;
  checkpointStore?: CheckpointStore;
  logger?: Logger;
}

export interface RunOptions {
  mode?: ExecutionMode | ExecutionModeKind;
  executionId?: string;
  /** Caller configuration exposed to nodes as `ctx.execution.config` */
  config?: Record<string, unknown>;
  timeoutMs?: number;
  maxSteps?: number;
}

/**
 * Raised by loadRun when no checkpoint exists
 */
export class CheckpointNotFoundError extends Error {
  readonly name = 'CheckpointNotFoundError';
  readonly isCheckpointNotFound = true;

  constructor(public readonly executionId: string) {
    super(`No checkpoint found for execution ${executionId}`);
  }
}

export class Orchestrator {
  readonly registry: ComponentRegistry;
  readonly hooks: HookRunner;
  readonly config: OrchestratorConfig;
  private readonly checkpointStore?: CheckpointStore;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.config = resolveOrchestratorConfig(options.config);
    this.checkpointStore = options.checkpointStore;
    this.logger = options.logger ?? getLogger('orchestrator');
    this.hooks = options.hooks ?? new HookRunner(options.hookConfig, this.logger.child({ component: 'hooks' }));

    for (const trigger of options.triggers ?? []) {
      this.hooks.registerTrigger(trigger);
    }
    for (const plugin of options.plugins ?? []) {
      this.hooks.registerPlugin(plugin);
    }
  }

  /**
   * Create a pending run
   */
  createRun(graph: GraphModel, initialState: Readonly<StateValues> = {}, options: RunOptions = {}): WorkflowRun {
    return this.assemble(graph, StateContainer.create(initialState), options);
  }

  /**
   * Blocking run to completion
   */
  run(graph: GraphModel, initialState: Readonly<StateValues> = {}, options: RunOptions = {}): StateContainer {
    return this.createRun(graph, initialState, { mode: 'sync', ...options }).execute();
  }

  async runAsync(
    graph: GraphModel,
    initialState: Readonly<StateValues> = {},
    options: RunOptions = {}
  ): Promise<StateContainer> {
    return this.createRun(graph, initialState, { mode: 'async', ...options }).executeAsync();
  }

  /**
   * A fresh run whose states are yielded after every step
   */
  runStream(
    graph: GraphModel,
    initialState: Readonly<StateValues> = {},
    options: RunOptions = {}
  ): AsyncGenerator<StateContainer, void, undefined> {
    return this.createRun(graph, initialState, { mode: 'async', ...options }).stream();
  }

  runStreamSync(
    graph: GraphModel,
    initialState: Readonly<StateValues> = {},
    options: RunOptions = {}
  ): Generator<StateContainer, void, undefined> {
    return this.createRun(graph, initialState, { mode: 'sync', ...options }).streamSync();
  }

  /**
   * Rebuild a pending run from the latest checkpoint of `executionId`
   *
   * @throws CheckpointNotFoundError
   */
  async loadRun(
    graph: GraphModel,
    executionId: string,
    mode: ExecutionMode | ExecutionModeKind = 'hybrid',
    options: Omit<RunOptions, 'mode' | 'executionId'> = {}
  ): Promise<WorkflowRun> {
    const checkpoint = this.checkpointStore ? await this.checkpointStore.load(executionId) : null;
    if (!checkpoint) {
      throw new CheckpointNotFoundError(executionId);
    }

    const config = this.runConfig(options);
    const resume: RunResumeState = {
      state: StateContainer.fromJSON(checkpoint.state),
      history: History.fromEntries(checkpoint.history, {
        maxEntries: config.historyLimit,
        droppedCount: checkpoint.historyDropped,
      }),
      frontier: checkpoint.frontier,
      stepCount: checkpoint.stepCount,
      pendingRoute: checkpoint.pendingRoute,
    };

    this.logger.info('Resuming run from checkpoint', {
      workflowId: checkpoint.workflowId,
      executionId,
      status: checkpoint.status,
      stepCount: checkpoint.stepCount,
      frontier: checkpoint.frontier,
      pendingRoute: checkpoint.pendingRoute?.nodeId,
    });

    return this.assemble(
      graph,
      resume.state,
      { ...options, mode, executionId, config: options.config ?? checkpoint.config },
      resume
    );
  }

  private runConfig(options: Omit<RunOptions, 'mode' | 'executionId'>): OrchestratorConfig {
    return resolveOrchestratorConfig(this.config, {
      maxSteps: options.maxSteps,
      timeoutMs: options.timeoutMs,
    });
  }

  private assemble(
    graph: GraphModel,
    initialState: StateContainer,
    options: RunOptions,
    resume?: RunResumeState
  ): WorkflowRun {
    const config = this.runConfig(options);
    const registry: RegistrySnapshot = this.registry.snapshot();
    const context = createExecutionContext({
      workflowId: graph.id,
      executionId: options.executionId,
      config: options.config,
    });

    const core = new RunCore({
      graph,
      registry,
      hooks: bindGraphHooks(this.hooks, graph, registry),
      context,
      config,
      logger: this.logger.child({ workflowId: graph.id, executionId: context.executionId }),
      initialState,
      checkpointStore: this.checkpointStore,
      resume,
    });

    return new WorkflowRun(core, resolveMode(options.mode ?? 'hybrid'), config.timeoutMs);
  }
}
