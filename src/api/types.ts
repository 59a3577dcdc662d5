/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ErrorCode } from '../types/index.js';

/**
 * Extended Hono context with the request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 404 | 405 | 413 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  EMPTY_PAYLOAD: 400,
  NOT_TEXT: 400,
  UPLOAD_ABORTED: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  PAYLOAD_TOO_LARGE: 413,
  STORAGE_ERROR: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code for error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
