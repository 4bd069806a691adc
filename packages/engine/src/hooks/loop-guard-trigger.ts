/**
 * Loop Guard Trigger
 *
 * Counts visits per node within a run. Past the limit it warns; with
 * `enforceBlocking` set it also vetoes further visits so the node is skipped.
 *
 * @module @stepgraph/engine/hooks
 */

import { z } from 'zod';
import { getLogger } from '@stepgraph/core';
import type { ExecutionContext } from '../run/context.js';
import type { NodeHookEvent, Trigger } from './types.js';

const logger = getLogger('loop-guard');

// =============================================================================
// Configuration
// =============================================================================

export const LoopGuardConfigSchema = z.object({
  /** Visits allowed per node per run. @default 20 */
  maxVisits: z.number().int().min(1).default(20),
  /** Only guard these nodes (default: all) */
  nodes: z.array(z.string()).optional(),
  /** Veto visits past the limit instead of only warning. @default false */
  enforceBlocking: z.boolean().default(false),
});

export type LoopGuardConfig = z.output<typeof LoopGuardConfigSchema>;

export interface LoopDetection {
  nodeId: string;
  visits: number;
  maxVisits: number;
  blocked: boolean;
}

// =============================================================================
// Trigger
// =============================================================================

export class LoopGuardTrigger implements Trigger {
  readonly name = 'loop-guard';
  private readonly config: LoopGuardConfig;
  private readonly visits = new WeakMap<ExecutionContext, Map<string, number>>();

  constructor(
    config: z.input<typeof LoopGuardConfigSchema> = {},
    private readonly onLoopDetected?: (detection: LoopDetection, context: ExecutionContext) => void
  ) {
    this.config = LoopGuardConfigSchema.parse(config);
  }

  before(event: NodeHookEvent): boolean {
    const { node, context } = event;
    if (this.config.nodes && !this.config.nodes.includes(node.id)) {
      return true;
    }

    const counts = this.visits.get(context) ?? new Map<string, number>();
    this.visits.set(context, counts);
    const visits = (counts.get(node.id) ?? 0) + 1;
    counts.set(node.id, visits);

    if (visits <= this.config.maxVisits) {
      return true;
    }

    const detection: LoopDetection = {
      nodeId: node.id,
      visits,
      maxVisits: this.config.maxVisits,
      blocked: this.config.enforceBlocking,
    };
    logger.warn('Loop limit exceeded', {
      executionId: context.executionId,
      ...detection,
    });
    this.onLoopDetected?.(detection, context);

    return !this.config.enforceBlocking;
  }

  /**
   * Visits recorded so far for a run
   */
  getVisits(context: ExecutionContext, nodeId: string): number {
    return this.visits.get(context)?.get(nodeId) ?? 0;
  }
}
