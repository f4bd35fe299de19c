import type { ErrorCode } from '@shared/types';

/**
 * Base class for the failures the client recognizes and names.
 *
 * Transport failures (connection errors, unexpected HTTP statuses) are not
 * part of this hierarchy and reach the caller unchanged.
 */
export class ChallengeClientError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ChallengeClientError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A local precondition was violated. Always thrown before any request is sent.
 */
export class ValidationError extends ChallengeClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * The server has no tasks of the requested type left in the bound round.
 */
export class TasksOverError extends ChallengeClientError {
  readonly taskType: string | null;

  constructor(taskType: string | null, options?: { cause?: unknown }) {
    super(
      'TASKS_OVER',
      taskType === null
        ? 'No more tasks left on this round'
        : `No more tasks of the '${taskType}' type left on this round`,
      { taskType },
      options,
    );
    this.name = 'TasksOverError';
    this.taskType = taskType;
  }
}

export class NoRoundCurrentlyRunningError extends ChallengeClientError {
  constructor(challengeId?: string) {
    super(
      'NO_ROUND_RUNNING',
      'No round is currently running',
      challengeId === undefined ? undefined : { challengeId },
    );
    this.name = 'NoRoundCurrentlyRunningError';
  }
}

/**
 * A response body could not be turned into the requested domain type.
 * The JSON or schema failure is kept as `cause`.
 */
export class DeserializationError extends ChallengeClientError {
  readonly payload: string;
  readonly targetType: string;

  constructor(payload: string, targetType: string, cause: unknown) {
    super(
      'DESERIALIZATION_ERROR',
      `Can't deserialize the following object into ${targetType}:\n${payload}`,
      { targetType },
      { cause },
    );
    this.name = 'DeserializationError';
    this.payload = payload;
    this.targetType = targetType;
  }
}

export function isChallengeClientError(error: unknown): error is ChallengeClientError {
  return error instanceof ChallengeClientError;
}
