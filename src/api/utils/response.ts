/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { Failure } from '../../types/index.js';
import { getErrorStatus } from '../types.js';
import type { ErrorResponse, SuccessResponse } from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(c: Context, error: Failure['error']): Response {
  const body: ErrorResponse = {
    error: {
      code: error.code,
      message: error.message,
      requestId: c.get('requestId'),
    },
  };
  if (error.details !== undefined) {
    body.error.details = error.details;
  }

  return c.json(body, getErrorStatus(error.code));
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  status: 200 | 201 = 200
): Response {
  const body: SuccessResponse<T> = {
    data,
    meta: { requestId: c.get('requestId') },
  };
  return c.json(body, status);
}
