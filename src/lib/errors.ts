/**
 * Error taxonomy for the task pipeline.
 *
 * Transport errors (ConnectionError, MessageError, StatusStoreError) come from the
 * broker and status store wrappers. TaskManagerError and its subclasses are
 * application-level validation errors raised by the task coordinator.
 */

export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class MessageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MessageError';
  }
}

export class StatusStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatusStoreError';
  }
}

export class TaskManagerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskManagerError';
  }
}

export class TaskNotFoundError extends TaskManagerError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} does not exist.`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class InvalidTaskDataError extends TaskManagerError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTaskDataError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorContext {
  path?: string;
  method?: string;
  [key: string]: unknown;
}

export interface ErrorResponse {
  error: {
    type: string;
    message: string;
    context: ErrorContext & { path: string; method: string };
  };
}

/**
 * Format any thrown value as the unified error body returned by the HTTP routes.
 * Requests carry path/method; background callers get 'N/A' / 'INTERNAL'.
 */
export function toErrorResponse(error: unknown, context: ErrorContext = {}): ErrorResponse {
  const { path = 'N/A', method = 'INTERNAL', ...extras } = context;
  return {
    error: {
      type: error instanceof Error ? error.name : typeof error,
      message: errorMessage(error),
      context: { path, method, ...extras },
    },
  };
}

/**
 * HTTP status for an error surfacing from the task coordinator
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof TaskNotFoundError) return 404;
  if (error instanceof InvalidTaskDataError) return 400;
  if (error instanceof ConnectionError || error instanceof StatusStoreError) return 503;
  return 500;
}
