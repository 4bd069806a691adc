import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  readOrchestratorConfigFromEnv,
  resolveOrchestratorConfig,
} from '../config.js';

describe('orchestrator config', () => {
  it('has documented defaults', () => {
    expect(DEFAULT_ORCHESTRATOR_CONFIG).toEqual({
      maxSteps: 1000,
      historyLimit: 1000,
      maxSnapshots: 50,
      snapshotEvery: 0,
      checkpointEvery: 0,
      strict: false,
      defaultMergeStrategy: 'last-write-wins',
    });
  });

  it('reads only the variables that are set', () => {
    expect(readOrchestratorConfigFromEnv({})).toEqual({});
    expect(
      readOrchestratorConfigFromEnv({
        STEPGRAPH_MAX_STEPS: '25',
        STEPGRAPH_CHECKPOINT_EVERY: '5',
        STEPGRAPH_STRICT: 'true',
        STEPGRAPH_TIMEOUT_MS: '',
        STEPGRAPH_HISTORY_LIMIT: 'lots',
      })
    ).toEqual({ maxSteps: 25, checkpointEvery: 5, strict: true });
  });

  it('merges layers with later layers winning', () => {
    const config = resolveOrchestratorConfig({ maxSteps: 10, strict: true }, { maxSteps: 20, timeoutMs: undefined });
    expect(config.maxSteps).toBe(20);
    expect(config.strict).toBe(true);
    expect(config.timeoutMs).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => resolveOrchestratorConfig({ maxSteps: 0 })).toThrow(ZodError);
  });
});
