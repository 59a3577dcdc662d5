/**
 * File Routes
 * Multipart upload and streaming download
 */

import { Hono, type Context } from 'hono';
import { stream } from 'hono/streaming';

import { contentDisposition } from '../../lib/filename.js';
import type { EntryService } from '../../services/entry.service.js';
import type { Entry, ErrorCode, UploadOutcome } from '../../types/index.js';
import { declaredLength } from '../utils/body.js';
import { MultipartError, readMultipartFiles } from '../utils/multipart.js';
import { errorResponse, successResponse } from '../utils/response.js';
import { toEntryView } from '../utils/serialize.js';

/** Allowance for boundaries and part headers on top of the payload bytes */
export const MULTIPART_OVERHEAD_BYTES = 1024 * 1024;

type FailedOutcome = Extract<UploadOutcome, { ok: false }>;

/**
 * Status-bearing code for an upload where no part was stored
 */
function rejectionCode(failed: FailedOutcome[]): ErrorCode {
  if (failed.some((outcome) => outcome.error.code === 'PAYLOAD_TOO_LARGE')) {
    return 'PAYLOAD_TOO_LARGE';
  }
  const clientError = failed.find(
    (outcome) =>
      outcome.error.code !== 'STORAGE_ERROR' && outcome.error.code !== 'INTERNAL_ERROR'
  );
  return clientError?.error.code ?? 'STORAGE_ERROR';
}

function setDownloadHeaders(c: Context, entry: Entry, sizeBytes: number): void {
  c.header('Content-Type', entry.contentType);
  c.header('Content-Length', String(sizeBytes));
  c.header('Content-Disposition', contentDisposition(entry.displayName));
}

/**
 * Create file routes
 */
export function createFileRoutes(deps: {
  entryService: EntryService;
  maxFilesPerUpload: number;
}): Hono {
  const { entryService, maxFilesPerUpload } = deps;
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /upload
   * One or more file parts; each part succeeds or fails on its own
   */
  app.post('/upload', async (c) => {
    const { maxSizeBytes } = entryService.settings;

    const length = declaredLength(c.req.raw);
    if (
      length !== null &&
      length > maxSizeBytes * maxFilesPerUpload + MULTIPART_OVERHEAD_BYTES
    ) {
      return errorResponse(c, {
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body is too large',
        details: { maxSizeBytes, maxFilesPerUpload },
      });
    }

    let outcomes: UploadOutcome[];
    let filesLimitReached: boolean;
    try {
      const parsed = await readMultipartFiles(c.req.raw, {
        // One byte over the limit is enough to tell an oversize part apart
        fileSizeLimit: maxSizeBytes + 1,
        maxFiles: maxFilesPerUpload,
        onFile: async (part): Promise<UploadOutcome> => {
          const result = await entryService.uploadFile({
            source: part.stream,
            filename: part.filename,
            mimeType: part.mimeType,
          });
          if (result.success) {
            return { ok: true, entry: result.data };
          }
          return {
            ok: false,
            displayName: part.filename,
            error: { code: result.error.code, message: result.error.message },
          };
        },
      });
      outcomes = parsed.results;
      filesLimitReached = parsed.filesLimitReached;
    } catch (error) {
      if (error instanceof MultipartError) {
        return errorResponse(c, { code: error.code, message: error.message });
      }
      throw error;
    }

    if (outcomes.length === 0) {
      return errorResponse(c, {
        code: 'VALIDATION_ERROR',
        message: 'No file parts in request',
      });
    }

    const files = outcomes.flatMap((outcome) =>
      outcome.ok ? [toEntryView(outcome.entry)] : []
    );
    const failed = outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome]));

    if (files.length === 0) {
      return errorResponse(c, {
        code: rejectionCode(failed),
        message: 'No file was stored',
        details: { failed },
      });
    }

    return successResponse(
      c,
      { uploaded: files.length, files, failed, filesLimitReached },
      201
    );
  });

  // ─────────────────────────────────────────────────────────────
  // DOWNLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /download/:id
   * Stream the payload as an attachment. HEAD is routed here too and only
   * stats the payload, since Hono drops a HEAD body without cancelling it.
   */
  app.get('/download/:id', async (c) => {
    const id = c.req.param('id');

    if (c.req.method === 'HEAD') {
      const result = await entryService.describeDownload(id);
      if (!result.success) {
        return errorResponse(c, result.error);
      }
      setDownloadHeaders(c, result.data.entry, result.data.sizeBytes);
      return c.body(null, 200);
    }

    const result = await entryService.openDownload(id);
    if (!result.success) {
      return errorResponse(c, result.error);
    }

    const { entry, payload } = result.data;
    setDownloadHeaders(c, entry, payload.sizeBytes);

    return stream(
      c,
      async (out) => {
        out.onAbort(() => {
          payload.stream.destroy();
        });
        for await (const chunk of payload.stream) {
          await out.write(chunk);
        }
      },
      async (error) => {
        payload.stream.destroy();
        console.error(`Download of ${entry.id} failed:`, error);
      }
    );
  });

  return app;
}
