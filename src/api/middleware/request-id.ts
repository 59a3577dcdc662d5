/**
 * Request ID Middleware
 * Tags every request with an id, echoed in X-Request-Id and response bodies
 */

import type { MiddlewareHandler } from 'hono';
import { nanoid } from 'nanoid';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function createRequestIdMiddleware(
  generateId: () => string = nanoid
): MiddlewareHandler {
  return async (c, next) => {
    const requestId = generateId();
    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
