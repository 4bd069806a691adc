/**
 * Hook Configuration
 *
 * Reads hook configuration from environment variables, lists the built-in
 * hook types and attaches the hooks a graph declares to a run's runner.
 *
 * Environment Variables:
 * - STEPGRAPH_HOOK_TIMEOUT_MS: Timeout for async hook execution (default: 5000)
 * - STEPGRAPH_HOOK_DEBUG: Enable debug logging for hooks
 *
 * @module @stepgraph/engine/hooks
 */

import type { GraphModel } from '../graph/model.js';
import type { RegistrySnapshot } from '../registry/registry.js';
import { ExecutionStatsConfigSchema, ExecutionStatsPlugin } from './execution-stats-plugin.js';
import { LoggingTrigger, LoggingTriggerConfigSchema } from './logging-trigger.js';
import { LoopGuardConfigSchema, LoopGuardTrigger } from './loop-guard-trigger.js';
import type { HookRunner } from './runner.js';
import { DEFAULT_HOOK_CONFIG, type HookConfig, type PluginFactory, type TriggerFactory } from './types.js';

/**
 * Read hook configuration from environment variables
 */
export function readHookConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HookConfig {
  return {
    hookTimeoutMs: parseInt(env.STEPGRAPH_HOOK_TIMEOUT_MS || '', 10) || DEFAULT_HOOK_CONFIG.hookTimeoutMs,
    debug: env.STEPGRAPH_HOOK_DEBUG === 'true',
  };
}

export const BUILTIN_TRIGGERS: Readonly<Record<string, TriggerFactory>> = {
  'loop-guard': (config) => new LoopGuardTrigger(LoopGuardConfigSchema.parse(config)),
  logging: (config) => new LoggingTrigger(LoggingTriggerConfigSchema.parse(config)),
};

export const BUILTIN_PLUGINS: Readonly<Record<string, PluginFactory>> = {
  'execution-stats': (config) => new ExecutionStatsPlugin(ExecutionStatsConfigSchema.parse(config)),
};

/**
 * Copy of `base` with the graph's declared triggers and plugins registered
 * after the shared ones
 */
export function bindGraphHooks(base: HookRunner, graph: GraphModel, registry: RegistrySnapshot): HookRunner {
  if (graph.triggers.length === 0 && graph.plugins.length === 0) {
    return base;
  }
  const runner = base.clone();
  for (const spec of graph.triggers) {
    runner.registerTrigger(registry.triggers.resolve(spec.type)(spec.config), { critical: spec.critical || undefined });
  }
  for (const spec of graph.plugins) {
    runner.registerPlugin(registry.plugins.resolve(spec.type)(spec.config), { critical: spec.critical || undefined });
  }
  return runner;
}
