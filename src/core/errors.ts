/**
 * Base error class for all runwarden errors: a machine-readable code
 * plus structured context for the logs.
 */
export class RunwardenError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'RunwardenError';
    this.code = params.code;
    this.context = params.context;
  }
}

/** Thrown when a Command, Schedule, or config value fails validation. */
export class ValidationError extends RunwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Thrown on a state-machine contract violation: executing a non-pending
 * command, completing one that is not running, cancelling a terminal one.
 */
export class InvalidStateError extends RunwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'INVALID_STATE',
      context,
    });
    this.name = 'InvalidStateError';
  }
}

/** Thrown when a due schedule could not be materialized or handed to the executor. */
export class DispatchError extends RunwardenError {
  constructor(scheduleId: string, message: string, cause?: Error) {
    super({
      message: `Dispatch failed for schedule ${scheduleId}: ${message}`,
      code: 'DISPATCH_FAILED',
      cause,
      context: { scheduleId },
    });
    this.name = 'DispatchError';
  }
}

/** Normalize an unknown thrown value to a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
