/**
 * Orchestrator Configuration
 *
 * Environment Variables:
 * - STEPGRAPH_MAX_STEPS: Step budget per run (default: 1000)
 * - STEPGRAPH_HISTORY_LIMIT: Retained history entries per run (default: 1000)
 * - STEPGRAPH_MAX_SNAPSHOTS: Retained snapshots per run (default: 50)
 * - STEPGRAPH_SNAPSHOT_EVERY: Automatic snapshot interval in steps (0 = off)
 * - STEPGRAPH_CHECKPOINT_EVERY: Checkpoint interval in steps (0 = only when the run ends)
 * - STEPGRAPH_STRICT: Treat graph warnings as errors
 * - STEPGRAPH_TIMEOUT_MS: Default run deadline
 *
 * @module @stepgraph/engine/run/config
 */

import { z } from 'zod';
import { DEFAULT_HISTORY_LIMIT } from '../state/history.js';
import { DEFAULT_MERGE_STRATEGY } from '../state/merge.js';
import { DEFAULT_MAX_SNAPSHOTS } from '../state/snapshots.js';

export const OrchestratorConfigSchema = z.object({
  maxSteps: z.number().int().min(1).default(1000),
  historyLimit: z.number().int().min(1).default(DEFAULT_HISTORY_LIMIT),
  maxSnapshots: z.number().int().min(1).default(DEFAULT_MAX_SNAPSHOTS),
  snapshotEvery: z.number().int().min(0).default(0),
  checkpointEvery: z.number().int().min(0).default(0),
  strict: z.boolean().default(false),
  defaultMergeStrategy: z.string().min(1).default(DEFAULT_MERGE_STRATEGY),
  timeoutMs: z.number().int().positive().optional(),
});

export type OrchestratorConfig = z.output<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = OrchestratorConfigSchema.parse({});

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Read orchestrator settings present in the environment. Unset variables are
 * left out so explicit options can be merged over the result.
 */
export function readOrchestratorConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OrchestratorConfigInput {
  const config: OrchestratorConfigInput = {};
  const maxSteps = readInt(env.STEPGRAPH_MAX_STEPS);
  const historyLimit = readInt(env.STEPGRAPH_HISTORY_LIMIT);
  const maxSnapshots = readInt(env.STEPGRAPH_MAX_SNAPSHOTS);
  const snapshotEvery = readInt(env.STEPGRAPH_SNAPSHOT_EVERY);
  const checkpointEvery = readInt(env.STEPGRAPH_CHECKPOINT_EVERY);
  const timeoutMs = readInt(env.STEPGRAPH_TIMEOUT_MS);

  if (maxSteps !== undefined) config.maxSteps = maxSteps;
  if (historyLimit !== undefined) config.historyLimit = historyLimit;
  if (maxSnapshots !== undefined) config.maxSnapshots = maxSnapshots;
  if (snapshotEvery !== undefined) config.snapshotEvery = snapshotEvery;
  if (checkpointEvery !== undefined) config.checkpointEvery = checkpointEvery;
  if (env.STEPGRAPH_STRICT !== undefined) config.strict = env.STEPGRAPH_STRICT === 'true';
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;
  return config;
}

/**
 * Merge config layers (later layers win) and validate the result
 */
export function resolveOrchestratorConfig(...layers: Array<OrchestratorConfigInput | undefined>): OrchestratorConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return OrchestratorConfigSchema.parse(merged);
}
