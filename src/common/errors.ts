/**
 * Error types for the analyst
 *
 * Missing or ambiguous input never raises: it becomes an empty result or a
 * clarification turn. These classes cover the cases that do propagate.
 */

export type AnalystErrorCode = 'SESSION_NOT_FOUND' | 'DATASET_ERROR' | 'CONFIG_ERROR';

export class AnalystError extends Error {
  constructor(
    public code: AnalystErrorCode,
    message: string,
    public isOperational = true
  ) {
    super(message);
    this.name = 'AnalystError';
    Object.setPrototypeOf(this, AnalystError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unknown or TTL-expired session on an explicit lookup
 */
export class SessionNotFoundError extends AnalystError {
  constructor(public sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found or expired: ${sessionId}`);
    this.name = 'SessionNotFoundError';
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

/**
 * Fault raised by a dataset accessor. Fatal for the request.
 */
export class DatasetError extends AnalystError {
  constructor(message: string, cause?: unknown) {
    super('DATASET_ERROR', message, false);
    this.name = 'DatasetError';
    this.cause = cause;
    Object.setPrototypeOf(this, DatasetError.prototype);
  }
}

export class ConfigError extends AnalystError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, false);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
