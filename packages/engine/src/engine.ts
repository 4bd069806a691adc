/**
 * Engine Facade
 *
 * Single entry point bundling graph validation and build, run creation,
 * resumption, snapshots and visualization around one registry and one
 * orchestrator.
 *
 * @example
 * ```typescript
 * const engine = createEngine();
 * engine.registry.nodes.register('increment', syncNode((state) => ({
 *   update: { count: Number(state.count ?? 0) + 1 },
 * })));
 *
 * const graph = engine.build({
 *   id: 'counter',
 *   entryPoint: 'start',
 *   nodes: [{ id: 'start', type: 'increment' }, { id: 'done', terminal: true }],
 *   edges: [{ from: 'start', to: 'done' }],
 * });
 * engine.run(graph, { count: 0 }).values; // { count: 1 }
 * ```
 *
 * @module @stepgraph/engine
 */

import type { Logger } from '@stepgraph/core';
import { buildGraph, type GraphModel } from './graph/model.js';
import type { GraphDescriptor } from './graph/schema.js';
import { GraphValidationError, validateGraphDescriptor, type GraphValidationResult } from './graph/validation.js';
import { exportVisualization, toMermaid, type GraphVisualization } from './graph/visualization.js';
import { readHookConfigFromEnv } from './hooks/config.js';
import type { HookConfig, MaybePromise, Plugin, Trigger } from './hooks/types.js';
import type { ExecutionMode } from './modes/factory.js';
import type { ExecutionModeKind } from './modes/types.js';
import { createComponentRegistry } from './registry/builtins.js';
import type { ComponentRegistry } from './registry/registry.js';
import type { CheckpointStore } from './run/checkpoint.js';
import { readOrchestratorConfigFromEnv, type OrchestratorConfigInput } from './run/config.js';
import { Orchestrator, type RunOptions } from './run/orchestrator.js';
import type { WorkflowRun } from './run/workflow-run.js';
import type { StateContainer } from './state/container.js';
import type { StateValues } from './state/diff.js';

export interface EngineOptions {
  /** Defaults to a fresh registry with the built-ins */
  registry?: ComponentRegistry;
  config?: OrchestratorConfigInput;
  hookConfig?: Partial<HookConfig>;
  triggers?: Trigger[];
  plugins?: Plugin[];
  checkpointStore?: CheckpointStore;
  logger?: Logger;
  /** Read STEPGRAPH_* variables under the explicit options. @default true */
  useEnv?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Supplies a raw graph descriptor, e.g. parsed from a file or fetched from a
 * service. The descriptor is validated before it is built.
 */
export interface ConfigSource {
  load(): MaybePromise<unknown>;
}

export interface BuildOptions {
  /** Overrides the engine's `strict` setting */
  strict?: boolean;
}

export interface Engine {
  readonly registry: ComponentRegistry;
  readonly orchestrator: Orchestrator;
  validate(descriptor: unknown, options?: BuildOptions): GraphValidationResult;
  build(descriptor: GraphDescriptor, options?: BuildOptions): GraphModel;
  buildFrom(source: ConfigSource, options?: BuildOptions): Promise<GraphModel>;
  createRun(graph: GraphModel, initialState?: Readonly<StateValues>, options?: RunOptions): WorkflowRun;
  run(graph: GraphModel, initialState?: Readonly<StateValues>, options?: RunOptions): StateContainer;
  runAsync(graph: GraphModel, initialState?: Readonly<StateValues>, options?: RunOptions): Promise<StateContainer>;
  runStream(
    graph: GraphModel,
    initialState?: Readonly<StateValues>,
    options?: RunOptions
  ): AsyncGenerator<StateContainer, void, undefined>;
  runStreamSync(
    graph: GraphModel,
    initialState?: Readonly<StateValues>,
    options?: RunOptions
  ): Generator<StateContainer, void, undefined>;
  loadRun(graph: GraphModel, executionId: string, mode?: ExecutionMode | ExecutionModeKind): Promise<WorkflowRun>;
  snapshot(run: WorkflowRun, label?: string): string;
  restore(run: WorkflowRun, snapshotId: string): void;
  exportVisualization(graph: GraphModel): GraphVisualization;
  toMermaid(graph: GraphModel): string;
}

export function createEngine(options: EngineOptions = {}): Engine {
  const useEnv = options.useEnv ?? true;
  const env = options.env ?? process.env;
  const registry = options.registry ?? createComponentRegistry();

  const orchestrator = new Orchestrator({
    registry,
    config: { ...(useEnv ? readOrchestratorConfigFromEnv(env) : {}), ...options.config },
    hookConfig: { ...(useEnv ? readHookConfigFromEnv(env) : {}), ...options.hookConfig },
    triggers: options.triggers,
    plugins: options.plugins,
    checkpointStore: options.checkpointStore,
    logger: options.logger,
  });
  const strictDefault = orchestrator.config.strict;

  const build = (descriptor: GraphDescriptor, buildOptions: BuildOptions = {}): GraphModel =>
    buildGraph(descriptor, {
      registry: registry.snapshot(),
      strict: buildOptions.strict ?? strictDefault,
      logger: options.logger,
    });

  return {
    registry,
    orchestrator,
    validate: (descriptor, buildOptions = {}) =>
      validateGraphDescriptor(descriptor, { strict: buildOptions.strict ?? strictDefault }),
    build,
    buildFrom: async (source, buildOptions = {}) => {
      const result = validateGraphDescriptor(await source.load(), { strict: buildOptions.strict ?? strictDefault });
      if (!result.valid || !result.descriptor) {
        throw GraphValidationError.aggregate('(config source)', result.errors);
      }
      return build(result.descriptor, buildOptions);
    },
    createRun: (graph, initialState, runOptions) => orchestrator.createRun(graph, initialState, runOptions),
    run: (graph, initialState, runOptions) => orchestrator.run(graph, initialState, runOptions),
    runAsync: (graph, initialState, runOptions) => orchestrator.runAsync(graph, initialState, runOptions),
    runStream: (graph, initialState, runOptions) => orchestrator.runStream(graph, initialState, runOptions),
    runStreamSync: (graph, initialState, runOptions) => orchestrator.runStreamSync(graph, initialState, runOptions),
    loadRun: (graph, executionId, mode) => orchestrator.loadRun(graph, executionId, mode),
    snapshot: (run, label) => run.snapshot(label),
    restore: (run, snapshotId) => run.restore(snapshotId),
    exportVisualization,
    toMermaid,
  };
}
