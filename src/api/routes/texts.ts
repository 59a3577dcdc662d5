/**
 * Text Routes
 * Share a text snippet and fetch it back
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { EntryService } from '../../services/entry.service.js';
import { TEXT_CONTENT_TYPE } from '../../services/entry.service.js';
import { declaredLength, readBoundedBody } from '../utils/body.js';
import { errorResponse, successResponse } from '../utils/response.js';
import { toEntryView } from '../utils/serialize.js';

/** A JSON string may spell one byte as a six-character escape */
const JSON_EXPANSION = 6;
const JSON_OVERHEAD_BYTES = 1024;

const shareTextSchema = z.object({
  text: z.string(),
});

function isJson(contentType: string | undefined): boolean {
  return contentType?.split(';')[0]?.trim().toLowerCase() === 'application/json';
}

/**
 * Create text routes
 */
export function createTextRoutes(deps: { entryService: EntryService }): Hono {
  const { entryService } = deps;
  const app = new Hono();

  /**
   * POST /share-text
   * Raw body, or { "text": "..." } when sent as application/json
   */
  app.post('/share-text', async (c) => {
    const { maxTextBytes } = entryService.settings;
    const json = isJson(c.req.header('content-type'));
    const bodyLimit = json
      ? maxTextBytes * JSON_EXPANSION + JSON_OVERHEAD_BYTES
      : maxTextBytes;

    const tooLarge = () =>
      errorResponse(c, {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Text is too large',
        details: { maxSizeBytes: maxTextBytes },
      });

    const length = declaredLength(c.req.raw);
    if (length !== null && length > bodyLimit) {
      return tooLarge();
    }

    const bytes = await readBoundedBody(c.req.raw, bodyLimit);
    if (bytes === null) {
      return tooLarge();
    }

    let decoded: string;
    try {
      decoded = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
      // A fatal decoder signals malformed input with TypeError only
      if (!(error instanceof TypeError)) {
        throw error;
      }
      return errorResponse(c, {
        code: 'VALIDATION_ERROR',
        message: 'Text must be valid UTF-8',
      });
    }

    let text = decoded;
    if (json) {
      let parsedJson: unknown;
      try {
        parsedJson = JSON.parse(decoded);
      } catch {
        return errorResponse(c, {
          code: 'VALIDATION_ERROR',
          message: 'Invalid JSON body',
        });
      }
      const parsed = shareTextSchema.safeParse(parsedJson);
      if (!parsed.success) {
        return errorResponse(c, {
          code: 'VALIDATION_ERROR',
          message: 'text must be a string',
        });
      }
      text = parsed.data.text;
    }

    const result = await entryService.shareText(text);
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    return successResponse(c, toEntryView(result.data), 201);
  });

  /**
   * GET /text/:id
   * The snippet itself as text/plain
   */
  app.get('/text/:id', async (c) => {
    const result = await entryService.getText(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    return c.body(result.data.text, 200, { 'Content-Type': TEXT_CONTENT_TYPE });
  });

  return app;
}
