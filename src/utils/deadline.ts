/**
 * Request deadlines.
 * A Deadline owns an AbortSignal that fires when its budget runs out or when
 * its parent (an outer deadline or a caller signal) aborts. Every blocking
 * call in the pipeline receives the signal, so expiry tears down in-flight
 * fetches and child processes together.
 */

import { DeadlineExceededError } from '../errors.js';

export class Deadline {
  readonly budgetMs: number;
  readonly expiresAt: number;
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly parent?: AbortSignal;
  private readonly onParentAbort = (): void => {
    this.abort(this.parent?.reason);
  };

  /**
   * @param budgetMs - Time allowed from now
   * @param parent - Optional signal whose abort propagates to this deadline
   */
  constructor(budgetMs: number, parent?: AbortSignal) {
    this.budgetMs = Math.max(0, budgetMs);
    this.expiresAt = Date.now() + this.budgetMs;
    this.parent = parent;

    this.timer = setTimeout(() => {
      this.abort(new DeadlineExceededError(this.budgetMs));
    }, this.budgetMs);
    this.timer.unref();

    if (parent) {
      if (parent.aborted) {
        this.abort(parent.reason);
      } else {
        parent.addEventListener('abort', this.onParentAbort, { once: true });
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Milliseconds left before expiry, never negative */
  remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  isExpired(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Derive a shorter deadline for a sub-step.
   * The child gets the smaller of `budgetMs` and what is left here, and
   * aborts as soon as this deadline does.
   */
  child(budgetMs: number): Deadline {
    return new Deadline(Math.min(budgetMs, this.remainingMs()), this.controller.signal);
  }

  /** Throw the abort reason if the deadline has already fired */
  throwIfExpired(): void {
    if (this.controller.signal.aborted) {
      throw this.controller.signal.reason;
    }
  }

  /** Release the timer and the parent listener. Safe to call more than once. */
  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private abort(reason: unknown): void {
    if (this.controller.signal.aborted) return;
    clearTimeout(this.timer);
    this.controller.abort(reason ?? new DeadlineExceededError(this.budgetMs));
  }
}
