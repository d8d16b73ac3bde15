/**
 * Error taxonomy shared by every package.
 *
 * Each subclass carries the HTTP-style status the action layer reports to callers.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>, status = 500) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details, 400);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required', details?: Record<string, unknown>) {
    super('UNAUTHENTICATED', message, details, 401);
  }
}

// The message never names the queue that was refused.
export class AuthorizationError extends AppError {
  constructor(message = 'You do not have permission to access this queue', details?: Record<string, unknown>) {
    super('FORBIDDEN', message, details, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', `${resource} not found`, details, 404);
  }
}

export class RequestAbortedError extends AppError {
  constructor(message = 'Request was cancelled', details?: Record<string, unknown>) {
    super('REQUEST_ABORTED', message, details, 499);
  }
}

export class DependencyError extends AppError {
  public readonly cause: unknown;

  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super('DEPENDENCY_ERROR', message, details, 500);
    this.cause = cause;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Anything that is not already an AppError is treated as a failed dependency.
 */
export function toAppError(error: unknown, message = 'Internal error'): AppError {
  if (isAppError(error)) {
    return error;
  }
  return new DependencyError(message, error);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
