/**
 * Item Routes
 * Listing, deletion and storage maintenance
 */

import { Hono } from 'hono';

import type { EntryService } from '../../services/entry.service.js';
import type { Sweeper } from '../../services/sweeper.service.js';
import { errorResponse, successResponse } from '../utils/response.js';
import { toListedEntryView } from '../utils/serialize.js';

export const ENTRY_STATE_HEADER = 'X-Entry-State';

/**
 * Create item routes
 */
export function createItemRoutes(deps: {
  entryService: EntryService;
  sweeper: Pick<Sweeper, 'runOnce'>;
}): Hono {
  const { entryService, sweeper } = deps;
  const app = new Hono();

  /**
   * GET /list
   * Live entries, oldest first, with usage totals
   */
  app.get('/list', async (c) => {
    const result = await entryService.listEntries();
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    return successResponse(c, {
      items: result.data.items.map(toListedEntryView),
      usage: result.data.usage,
    });
  });

  /**
   * DELETE /item/:id
   * 204 whether or not the entry existed
   */
  app.delete('/item/:id', async (c) => {
    const result = await entryService.deleteEntry(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    return c.body(null, 204, {
      [ENTRY_STATE_HEADER]: result.data.deleted ? 'deleted' : 'absent',
    });
  });

  /**
   * GET /stats
   */
  app.get('/stats', async (c) => {
    const result = await entryService.getStats();
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    return successResponse(c, result.data);
  });

  /**
   * POST /cleanup
   * Run one expiry and reconciliation pass now
   */
  app.post('/cleanup', async (c) => {
    const report = await sweeper.runOnce();
    return successResponse(c, report);
  });

  return app;
}
