/**
 * Result Pattern Implementation
 *
 * Service methods return Result<T> instead of throwing. Adapters below the
 * services throw (StorageIOError, ConfigError); the services translate.
 */

/**
 * Error codes a service can report. The API layer maps each to a status.
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'EMPTY_PAYLOAD'
  | 'NOT_TEXT'
  | 'UPLOAD_ABORTED'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'PAYLOAD_TOO_LARGE'
  | 'STORAGE_ERROR'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}
