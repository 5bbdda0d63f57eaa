/**
 * Taskdeck Error Classes
 */

export class TaskdeckError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'TaskdeckError';
  }
}

export class NotFoundError extends TaskdeckError {
  constructor(
    public entity: string,
    public entityId: string,
  ) {
    super(`${entity} not found: ${entityId}`, 'NOT_FOUND', true);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends TaskdeckError {
  constructor(
    public entity: string,
    public from: string,
    public action: string,
  ) {
    super(`Cannot ${action} ${entity} in state ${from}`, 'INVALID_TRANSITION', true);
    this.name = 'InvalidTransitionError';
  }
}

export class ForbiddenError extends TaskdeckError {
  constructor(message: string) {
    super(message, 'FORBIDDEN', true);
    this.name = 'ForbiddenError';
  }
}

export class ExecutionTimeoutError extends TaskdeckError {
  constructor(
    message: string,
    public timeoutMs: number,
  ) {
    super(message, 'EXECUTION_TIMEOUT', false);
    this.name = 'ExecutionTimeoutError';
  }
}

export class ValidationError extends TaskdeckError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends TaskdeckError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}

/** Collaborator failure that the caller may retry. */
export class TransientError extends TaskdeckError {
  constructor(message: string, public cause?: unknown) {
    super(message, 'TRANSIENT', true);
    this.name = 'TransientError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const HTTP_STATUS_BY_CODE: Record<string, number> = {
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  FORBIDDEN: 403,
  VALIDATION_ERROR: 400,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof TaskdeckError) {
    return HTTP_STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

export function errorCodeFor(error: unknown): string {
  return error instanceof TaskdeckError ? error.code : 'INTERNAL_ERROR';
}
