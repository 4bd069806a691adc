/**
 * Run Cancellation
 *
 * The token is checked before every step and after every node attempt. Its
 * AbortSignal is handed to async nodes so in-flight work can stop early. A
 * deadline cancels the token with a `timeout` reason.
 *
 * @module @stepgraph/engine/run/cancellation
 */

import { EventEmitter } from 'node:events';

export interface CancellationReason {
  /** `user` for cancel() and early stream close, `timeout` for deadlines */
  initiator: 'user' | 'timeout';
  reason: string;
  requestedAt: Date;
}

export class CancelledError extends Error {
  readonly name = 'CancelledError';
  readonly isCancellation = true;

  constructor(public readonly reason: CancellationReason) {
    super(`Operation cancelled: ${reason.reason}`);
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export class CancellationToken {
  private _reason: CancellationReason | undefined;
  private _deadline: Date | undefined;
  private readonly emitter = new EventEmitter();
  private readonly controller = new AbortController();

  constructor(options: { deadline?: Date } = {}) {
    this._deadline = options.deadline;
  }

  /**
   * Also true once the deadline has passed
   */
  get isCancelled(): boolean {
    this.checkDeadline();
    return this._reason !== undefined;
  }

  get reason(): CancellationReason | undefined {
    this.checkDeadline();
    return this._reason;
  }

  get deadline(): Date | undefined {
    return this._deadline;
  }

  /**
   * Aborted with a CancelledError as its reason
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * First request wins
   */
  cancel(reason: CancellationReason): void {
    if (this._reason) {
      return;
    }
    this._reason = reason;
    this.controller.abort(new CancelledError(reason));
    this.emitter.emit('cancelled', reason);
  }

  setDeadline(deadline: Date): void {
    this._deadline = deadline;
    this.checkDeadline();
  }

  /**
   * Fire the deadline from a timer, so a run blocked in an await is
   * interrupted. Returns the disarm function.
   */
  armDeadline(): () => void {
    const deadline = this._deadline;
    if (!deadline || this._reason) {
      return () => {};
    }
    const timer = setTimeout(() => this.checkDeadline(), Math.max(0, deadline.getTime() - Date.now()));
    // the deadline alone never keeps the process alive
    timer.unref();
    return () => clearTimeout(timer);
  }

  onCancelled(callback: (reason: CancellationReason) => void): () => void {
    this.emitter.on('cancelled', callback);
    return () => this.emitter.off('cancelled', callback);
  }

  /**
   * @throws CancelledError
   */
  throwIfCancelled(): void {
    const reason = this.reason;
    if (reason) {
      throw new CancelledError(reason);
    }
  }

  private checkDeadline(): void {
    if (!this._reason && this._deadline && Date.now() >= this._deadline.getTime()) {
      this.cancel({
        initiator: 'timeout',
        reason: `Deadline exceeded (${this._deadline.toISOString()})`,
        requestedAt: new Date(),
      });
    }
  }
}
