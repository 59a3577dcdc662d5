/**
 * Streaming multipart/form-data reader built on busboy
 *
 * File parts are handed to `onFile` as streams while the body is still
 * arriving; nothing is buffered beyond busboy's own chunks. Field parts are
 * ignored.
 */

import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import busboy from 'busboy';

import type { ErrorCode } from '../../types/index.js';

export interface MultipartFilePart {
  stream: Readable;
  filename: string;
  mimeType: string;
}

export interface MultipartOptions<T> {
  /** Per-part cap; parts longer than this arrive truncated to it */
  fileSizeLimit: number;
  maxFiles: number;
  /** Must consume the stream to its end */
  onFile: (part: MultipartFilePart) => Promise<T>;
}

export interface MultipartResult<T> {
  results: T[];
  /** More file parts were sent than maxFiles allows */
  filesLimitReached: boolean;
}

export class MultipartError extends Error {
  override readonly name = 'MultipartError';

  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Parse a multipart request, calling onFile for every file part in order
 */
export async function readMultipartFiles<T>(
  request: Request,
  options: MultipartOptions<T>
): Promise<MultipartResult<T>> {
  const contentType = request.headers.get('content-type') ?? '';

  let parser: busboy.Busboy;
  try {
    parser = busboy({
      headers: { 'content-type': contentType },
      preservePath: true,
      defParamCharset: 'utf8',
      limits: {
        fileSize: options.fileSizeLimit,
        files: options.maxFiles,
      },
    });
  } catch (error) {
    throw new MultipartError('VALIDATION_ERROR', 'Expected a multipart/form-data body', {
      cause: error,
    });
  }

  const pending: Array<Promise<PromiseSettledResult<T>>> = [];
  let filesLimitReached = false;

  parser.on('file', (_field, stream, info) => {
    const handled = options
      .onFile({ stream, filename: info.filename, mimeType: info.mimeType })
      .then(
        (value): PromiseSettledResult<T> => ({ status: 'fulfilled', value }),
        (reason: unknown): PromiseSettledResult<T> => ({ status: 'rejected', reason })
      )
      .finally(() => {
        // Whatever the handler left unread must not stall the parser
        stream.resume();
      });
    pending.push(handled);
  });
  parser.on('filesLimit', () => {
    filesLimitReached = true;
  });

  const body = request.body;
  const source = { failed: false };

  async function* chunks(): AsyncGenerator<Uint8Array> {
    if (body === null) {
      return;
    }
    const reader = body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        yield value;
      }
    } catch (error) {
      source.failed = true;
      throw error;
    } finally {
      reader.releaseLock();
    }
  }

  try {
    await pipeline(chunks, parser);
  } catch (error) {
    // Let every started part clean up its temp file before reporting
    await Promise.all(pending);
    if (source.failed) {
      throw new MultipartError('UPLOAD_ABORTED', 'Upload was interrupted', {
        cause: error,
      });
    }
    throw new MultipartError('VALIDATION_ERROR', 'Malformed multipart body', {
      cause: error,
    });
  }

  const settled = await Promise.all(pending);
  const results: T[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }

  return { results, filesLimitReached };
}
