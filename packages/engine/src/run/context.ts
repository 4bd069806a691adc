/**
 * Execution Context
 *
 * Per-run identity and configuration handed to every node and hook.
 *
 * @module @stepgraph/engine/run/context
 */

import { generateExecutionId } from '@stepgraph/core';
import { deepFreeze } from '../state/diff.js';

export interface ExecutionContext {
  readonly workflowId: string;
  readonly executionId: string;
  /** Caller-supplied run configuration; read-only to nodes */
  readonly config: Readonly<Record<string, unknown>>;
  readonly startedAt: Date;
}

export interface ExecutionContextInit {
  workflowId: string;
  executionId?: string;
  config?: Record<string, unknown>;
  startedAt?: Date;
}

export function createExecutionContext(init: ExecutionContextInit): ExecutionContext {
  return Object.freeze({
    workflowId: init.workflowId,
    executionId: init.executionId ?? generateExecutionId(),
    config: deepFreeze(structuredClone(init.config ?? {})),
    startedAt: init.startedAt ?? new Date(),
  });
}
