/**
 * Run State Machine
 *
 * ```
 *   pending ──> running ──> completed
 *      │           ├──────> failed
 *      │           └──────> cancelled
 *      ├──> failed
 *      └──> cancelled
 * ```
 *
 * completed, failed and cancelled are terminal: a finished run is never
 * restarted.
 *
 * @module @stepgraph/engine/run/state-machine
 */

export type RunStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

const TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  pending: ['running', 'cancelled', 'failed'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isValidTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function getNextValidStates(current: RunStatus): RunStatus[] {
  return [...TRANSITIONS[current]];
}

export function isTerminalState(status: RunStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export interface TransitionContext {
  executionId?: string;
  timestamp?: Date;
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';
  readonly isInvalidTransition = true;

  constructor(
    public readonly from: RunStatus,
    public readonly to: RunStatus,
    public readonly context?: TransitionContext
  ) {
    const allowed = TRANSITIONS[from].length > 0 ? TRANSITIONS[from].join(', ') : '(none - terminal state)';
    const suffix = context?.executionId ? ` [executionId: ${context.executionId}]` : '';
    super(`Invalid state transition: ${from} -> ${to}. Valid transitions from ${from}: ${allowed}${suffix}`);
  }

  getValidTransitions(): RunStatus[] {
    return getNextValidStates(this.from);
  }

  isTerminalStateError(): boolean {
    return isTerminalState(this.from);
  }
}

/**
 * @throws InvalidTransitionError
 */
export function validateTransition(from: RunStatus, to: RunStatus, context?: TransitionContext): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to, context);
  }
}

export function isInvalidTransitionError(error: unknown): error is InvalidTransitionError {
  return error instanceof InvalidTransitionError;
}
