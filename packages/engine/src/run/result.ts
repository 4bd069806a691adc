/**
 * Node Result Validation
 *
 * Node implementations are user code; their results are checked before
 * anything is merged into the state.
 *
 * @module @stepgraph/engine/run/result
 */

import { z } from 'zod';
import type { NodeExecutionResult } from '../modes/types.js';
import { NodeExecutionError } from './errors.js';

const ErrorInfoSchema = z.object({
  message: z.string(),
  code: z.string().optional(),
  retryable: z.boolean().optional(),
  details: z.record(z.unknown()).optional(),
});

export const NodeExecutionResultSchema = z
  .object({
    update: z.record(z.unknown()).optional(),
    remove: z.array(z.string()).optional(),
    next: z.array(z.string().min(1)).optional(),
    error: ErrorInfoSchema.optional(),
  })
  .strict();

/**
 * Validate a node's return value. A missing result counts as an empty one.
 *
 * @throws NodeExecutionError (not retryable) when the shape is invalid
 */
export function normalizeResult(
  nodeId: string,
  attempt: number,
  maxAttempts: number,
  value: unknown
): NodeExecutionResult {
  if (value === undefined || value === null) {
    return {};
  }
  const parsed = NodeExecutionResultSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new NodeExecutionError(nodeId, attempt, maxAttempts, {
      message: `Invalid node result: ${issues.join('; ')}`,
      code: 'INVALID_RESULT',
      retryable: false,
    });
  }
  return parsed.data;
}
