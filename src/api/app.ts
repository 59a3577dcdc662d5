/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { EntryService } from '../services/entry.service.js';
import type { Sweeper } from '../services/sweeper.service.js';
import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import { createItemRoutes } from './routes/items.js';
import { createTextRoutes } from './routes/texts.js';
import { errorResponse } from './utils/response.js';

/**
 * Methods each route answers; anything else gets 405
 */
const ROUTE_METHODS: ReadonlyArray<readonly [path: string, methods: string]> = [
  ['/upload', 'POST'],
  ['/download/:id', 'GET, HEAD'],
  ['/share-text', 'POST'],
  ['/text/:id', 'GET, HEAD'],
  ['/list', 'GET, HEAD'],
  ['/item/:id', 'DELETE'],
  ['/stats', 'GET, HEAD'],
  ['/cleanup', 'POST'],
  ['/health', 'GET, HEAD'],
];

/**
 * App configuration
 */
interface AppConfig {
  entryService: EntryService;
  sweeper: Pick<Sweeper, 'runOnce' | 'isRunning'>;
  maxFilesPerUpload: number;
  allowedOrigins: string[] | '*';
  /** Request log lines via hono/logger */
  logRequests?: boolean;
  generateRequestId?: () => string;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { entryService, sweeper, maxFilesPerUpload, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  if (config.logRequests ?? true) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins,
      allowMethods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      exposeHeaders: ['Content-Disposition', 'X-Entry-State', 'X-Request-Id'],
    })
  );
  app.use('*', createRequestIdMiddleware(config.generateRequestId));

  app.route('/', createHealthRoutes({ sweeper }));
  app.route('/', createFileRoutes({ entryService, maxFilesPerUpload }));
  app.route('/', createTextRoutes({ entryService }));
  app.route('/', createItemRoutes({ entryService, sweeper }));

  // Reached only when no handler above matched the method
  for (const [path, methods] of ROUTE_METHODS) {
    app.all(path, (c) => {
      c.header('Allow', methods);
      return errorResponse(c, {
        code: 'METHOD_NOT_ALLOWED',
        message: `Method ${c.req.method} is not allowed on ${c.req.path}`,
      });
    });
  }

  // 404 handler
  app.notFound((c) => {
    return errorResponse(c, {
      code: 'NOT_FOUND',
      message: 'Endpoint not found',
    });
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    return errorResponse(c, {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
