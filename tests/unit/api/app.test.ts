/**
 * Application Wiring Unit Tests
 * Routing fallbacks, request ids, CORS and the global error handler
 */

import { describe, it, expect, vi } from 'vitest';

import { createMockEntryService, createTestApp, TEST_REQUEST_ID } from '../../mocks/index.js';

describe('createApp()', () => {
  it('should answer unknown routes with 404', async () => {
    const res = await createTestApp({}).request('/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint not found', requestId: TEST_REQUEST_ID },
    });
  });

  it('should answer a wrong method with 405 and Allow', async () => {
    const res = await createTestApp({}).request('/upload');

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('POST');
    expect(await res.json()).toEqual({
      error: {
        code: 'METHOD_NOT_ALLOWED',
        message: 'Method GET is not allowed on /upload',
        requestId: TEST_REQUEST_ID,
      },
    });
  });

  it('should list GET and HEAD for read routes', async () => {
    const res = await createTestApp({}).request('/download/AAAAAAAAAAAAAAAA', {
      method: 'DELETE',
    });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, HEAD');
  });

  it('should tag responses with the request id', async () => {
    const res = await createTestApp({}).request('/health');

    expect(res.headers.get('x-request-id')).toBe(TEST_REQUEST_ID);
  });

  it('should allow cross-origin requests', async () => {
    const res = await createTestApp({}).request('/health', {
      headers: { Origin: 'http://192.168.1.20:8000' },
    });

    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should hide internals when a handler throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const entryService = createMockEntryService();
    vi.mocked(entryService.listEntries).mockRejectedValue(new Error('/secret/path exploded'));

    const res = await createTestApp({ entryService }).request('/list');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId: TEST_REQUEST_ID,
      },
    });
  });
});
