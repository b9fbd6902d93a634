/**
 * Tollgate error type hierarchy.
 * All custom errors extend TollgateError for consistent handling.
 * Only the HTTP status distinguishes a malformed request from a failed one;
 * messages and diagnostics stay in the logs.
 */

/** Base error for all Tollgate errors */
export class TollgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly userFacing: boolean = false,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'TollgateError';
  }
}

/** Thrown when an inbound request fails validation. No collaborator is called. */
export class MalformedInputError extends TollgateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'MALFORMED_INPUT', true, false);
    this.name = 'MalformedInputError';
  }
}

/** Names of the policy services the pipeline depends on */
export type CollaboratorName = 'risk' | 'output_safety';

/** Thrown when a collaborator is unreachable, times out, or answers with a non-success status */
export class CollaboratorError extends TollgateError {
  constructor(
    message: string,
    public readonly service: CollaboratorName,
    public readonly statusCode?: number,
  ) {
    super(message, 'COLLABORATOR_FAILURE', false, false);
    this.name = 'CollaboratorError';
  }
}

/** Thrown when the isolated execution exceeds its sub-deadline */
export class ExecutionTimeoutError extends TollgateError {
  constructor(public readonly timeoutMs: number) {
    super(`Sandboxed execution timed out after ${timeoutMs}ms`, 'EXECUTION_TIMEOUT', false, false);
    this.name = 'ExecutionTimeoutError';
  }
}

/** Thrown when the isolated execution exits nonzero or cannot be set up */
export class ExecutionFailureError extends TollgateError {
  constructor(
    message: string,
    public readonly diagnostics: string = '',
    public readonly exitCode?: number,
  ) {
    super(message, 'EXECUTION_FAILURE', false, false);
    this.name = 'ExecutionFailureError';
  }
}

/** Abort reason of an expired request deadline */
export class DeadlineExceededError extends TollgateError {
  constructor(public readonly budgetMs: number) {
    super(`Request deadline of ${budgetMs}ms exceeded`, 'DEADLINE_EXCEEDED', false, false);
    this.name = 'DeadlineExceededError';
  }
}

/** Terminal error of the chat pipeline, naming the stage that failed */
export class RequestAbortedError extends TollgateError {
  constructor(
    public readonly stage: string,
    public readonly cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Request aborted during ${stage}: ${detail}`, 'REQUEST_ABORTED', false, false);
    this.name = 'RequestAbortedError';
  }
}

/** Thrown when config validation fails */
export class ConfigError extends TollgateError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', true, false);
    this.name = 'ConfigError';
  }
}
