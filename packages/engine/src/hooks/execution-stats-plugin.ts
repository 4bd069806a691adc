/**
 * Execution Statistics Plugin
 *
 * Aggregates per-node execution counts and durations from each run's
 * history, parallel branches included, when the run ends; flags slow nodes and counts errors.
 *
 * @module @stepgraph/engine/hooks
 */

import { z } from 'zod';
import { getLogger, type Logger } from '@stepgraph/core';
import type { ExecutionContext } from '../run/context.js';
import type { RunStatus } from '../run/state-machine.js';
import type { StateContainer } from '../state/container.js';
import type { Plugin, RunSummary } from './types.js';

export const ExecutionStatsConfigSchema = z.object({
  /** Node executions slower than this are reported. @default 30000 */
  slowNodeThresholdMs: z.number().int().min(0).default(30000),
  /** Runs whose statistics are retained. @default 100 */
  maxTrackedRuns: z.number().int().min(1).default(100),
});

export interface NodeStats {
  executions: number;
  skipped: number;
  amendments: number;
  totalDurationMs: number;
  maxDurationMs: number;
  averageDurationMs: number;
}

export interface ExecutionStats {
  executionId: string;
  workflowId: string;
  status: RunStatus;
  stepCount: number;
  durationMs: number;
  errors: number;
  nodes: Record<string, NodeStats>;
  /** Nodes with at least one execution over the threshold */
  slowNodes: string[];
}

export class ExecutionStatsPlugin implements Plugin {
  readonly name = 'execution-stats';
  private readonly config: z.output<typeof ExecutionStatsConfigSchema>;
  private readonly stats = new Map<string, ExecutionStats>();
  private readonly errors = new Map<string, number>();

  constructor(
    config: z.input<typeof ExecutionStatsConfigSchema> = {},
    private readonly logger: Logger = getLogger('execution-stats')
  ) {
    this.config = ExecutionStatsConfigSchema.parse(config);
  }

  onRunStart(context: ExecutionContext): void {
    this.errors.set(context.executionId, 0);
  }

  onError(context: ExecutionContext): void {
    this.errors.set(context.executionId, (this.errors.get(context.executionId) ?? 0) + 1);
  }

  onRunEnd(context: ExecutionContext, _finalState: StateContainer, summary: RunSummary): void {
    const nodes = new Map<string, NodeStats>();
    const slowNodes = new Set<string>();

    const entries = [...summary.history, ...summary.branchHistories.flatMap((branch) => branch.entries)];
    for (const entry of entries) {
      const stats = nodes.get(entry.nodeId) ?? {
        executions: 0,
        skipped: 0,
        amendments: 0,
        totalDurationMs: 0,
        maxDurationMs: 0,
        averageDurationMs: 0,
      };

      if (entry.kind === 'node') {
        const duration = entry.durationMs ?? 0;
        stats.executions += 1;
        stats.totalDurationMs += duration;
        stats.maxDurationMs = Math.max(stats.maxDurationMs, duration);
        stats.averageDurationMs = stats.totalDurationMs / stats.executions;
        if (duration > this.config.slowNodeThresholdMs) {
          slowNodes.add(entry.nodeId);
        }
      } else if (entry.kind === 'skipped') {
        stats.skipped += 1;
      } else if (entry.kind === 'amendment') {
        stats.amendments += 1;
      } else {
        continue;
      }
      nodes.set(entry.nodeId, stats);
    }

    const result: ExecutionStats = {
      executionId: context.executionId,
      workflowId: context.workflowId,
      status: summary.status,
      stepCount: summary.stepCount,
      durationMs: summary.durationMs,
      errors: this.errors.get(context.executionId) ?? 0,
      nodes: Object.fromEntries(nodes),
      slowNodes: [...slowNodes],
    };

    this.errors.delete(context.executionId);
    this.stats.set(context.executionId, result);
    for (const executionId of this.stats.keys()) {
      if (this.stats.size <= this.config.maxTrackedRuns) break;
      this.stats.delete(executionId);
    }

    if (result.slowNodes.length > 0) {
      this.logger.warn('Slow nodes detected', {
        executionId: result.executionId,
        slowNodes: result.slowNodes,
        thresholdMs: this.config.slowNodeThresholdMs,
      });
    }
    this.logger.info('Execution statistics', {
      executionId: result.executionId,
      workflowId: result.workflowId,
      status: result.status,
      stepCount: result.stepCount,
      durationMs: result.durationMs,
      errors: result.errors,
    });
  }

  getStats(executionId: string): ExecutionStats | undefined {
    return this.stats.get(executionId);
  }

  listStats(): ExecutionStats[] {
    return [...this.stats.values()];
  }
}
