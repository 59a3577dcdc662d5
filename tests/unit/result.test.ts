/**
 * Result Pattern Unit Tests
 * Tests for the core Result type utilities
 */

import { describe, it, expect } from 'vitest';

import { success, failure } from '@/types/result.js';

describe('Result Pattern', () => {
  describe('success()', () => {
    it('should create a success result with data', () => {
      const result = success({ id: 'AbCdEfGh12345678', name: 'notes.txt' });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ id: 'AbCdEfGh12345678', name: 'notes.txt' });
    });

    it('should work with primitive values', () => {
      const stringResult = success('hello');
      const numberResult = success(42);
      const boolResult = success(true);

      expect(stringResult.data).toBe('hello');
      expect(numberResult.data).toBe(42);
      expect(boolResult.data).toBe(true);
    });

    it('should work with null', () => {
      const result = success(null);
      expect(result.data).toBeNull();
    });
  });

  describe('failure()', () => {
    it('should create a failure result with error', () => {
      const result = failure('NOT_FOUND', 'Resource not found');

      expect(result.success).toBe(false);
      expect(result.error.code).toBe('NOT_FOUND');
      expect(result.error.message).toBe('Resource not found');
    });

    it('should include optional details', () => {
      const result = failure('PAYLOAD_TOO_LARGE', 'File exceeds the limit', {
        displayName: 'video.mp4',
        maxSizeBytes: 2000,
      });

      expect(result.error.details).toEqual({
        displayName: 'video.mp4',
        maxSizeBytes: 2000,
      });
    });

    it('should leave details out when none are given', () => {
      const result = failure('NOT_FOUND', 'Entry not found');

      expect('details' in result.error).toBe(false);
    });
  });
});
