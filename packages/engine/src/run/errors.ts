/**
 * Run Errors
 *
 * @module @stepgraph/engine/run/errors
 */

import type { ErrorInfo } from '../modes/types.js';

export class StepLimitExceededError extends Error {
  readonly name = 'StepLimitExceededError';
  readonly isStepLimitExceeded = true;

  constructor(
    public readonly maxSteps: number,
    /** Node that would have run next */
    public readonly nodeId: string
  ) {
    super(`Step limit of ${maxSteps} exceeded before node "${nodeId}"`);
  }
}

/**
 * A node threw or reported an error
 */
export class NodeExecutionError extends Error {
  readonly name = 'NodeExecutionError';
  readonly isNodeExecutionError = true;

  constructor(
    public readonly nodeId: string,
    public readonly attempt: number,
    public readonly maxAttempts: number,
    public readonly info: ErrorInfo,
    cause?: unknown
  ) {
    super(`Node "${nodeId}" failed (attempt ${attempt}/${maxAttempts}): ${info.message}`, { cause });
  }

  get retryable(): boolean {
    return this.info.retryable !== false;
  }
}

/**
 * Raised when an operation needs the run to be between steps
 */
export class RunBusyError extends Error {
  readonly name = 'RunBusyError';
  readonly isRunBusy = true;

  constructor(
    public readonly executionId: string,
    operation: string
  ) {
    super(`Cannot ${operation} run ${executionId} while a step is executing`);
  }
}

export function isNodeExecutionError(error: unknown): error is NodeExecutionError {
  return error instanceof NodeExecutionError;
}

export function isStepLimitExceededError(error: unknown): error is StepLimitExceededError {
  return error instanceof StepLimitExceededError;
}

/**
 * Normalise anything thrown into ErrorInfo
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, code };
  }
  return { message: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
