/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { Sweeper } from '../../services/sweeper.service.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { sweeper: Pick<Sweeper, 'isRunning'> }): Hono {
  const app = new Hono();

  /**
   * GET /health
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      sweeper: deps.sweeper.isRunning() ? 'running' : 'stopped',
    });
  });

  return app;
}
