/**
 * Expiry Sweeper Unit Tests
 */

import { beforeEach, describe, it, expect, vi } from 'vitest';

import type { EntryService } from '@/services/entry.service.js';
import { createSweeper } from '@/services/sweeper.service.js';

type SweptService = Pick<EntryService, 'expireEntries' | 'reconcile'>;

function createMockEntryService(): SweptService {
  return {
    expireEntries: vi.fn().mockResolvedValue({ expired: 0, failed: 0 }),
    reconcile: vi
      .fn()
      .mockResolvedValue({ orphanedRecords: 0, orphanedPayloads: 0, failed: 0 }),
  };
}

describe('Sweeper', () => {
  describe('runOnce()', () => {
    it('should expire, then reconcile, and merge the reports', async () => {
      const entryService = createMockEntryService();
      vi.mocked(entryService.expireEntries).mockResolvedValue({ expired: 2, failed: 1 });
      vi.mocked(entryService.reconcile).mockResolvedValue({
        orphanedRecords: 1,
        orphanedPayloads: 3,
        failed: 0,
      });
      const log = vi.fn();
      const sweeper = createSweeper({ entryService, intervalMs: 60_000, log });

      const report = await sweeper.runOnce();

      expect(report).toEqual({ expired: 2, failed: 1, orphanedRecords: 1, orphanedPayloads: 3 });
      expect(log).toHaveBeenCalledWith(
        'Sweep: expired=2 orphanedRecords=1 orphanedPayloads=3 failed=1'
      );
    });

    it('should stay quiet when there was nothing to do', async () => {
      const log = vi.fn();
      const sweeper = createSweeper({
        entryService: createMockEntryService(),
        intervalMs: 60_000,
        log,
      });

      await sweeper.runOnce();

      expect(log).not.toHaveBeenCalled();
    });

    it('should join a pass that is already running', async () => {
      const entryService = createMockEntryService();
      let finish: () => void = () => undefined;
      vi.mocked(entryService.expireEntries).mockReturnValue(
        new Promise<{ expired: number; failed: number }>((resolve) => {
          finish = () => resolve({ expired: 1, failed: 0 });
        })
      );
      const sweeper = createSweeper({ entryService, intervalMs: 60_000, log: vi.fn() });

      const first = sweeper.runOnce();
      const second = sweeper.runOnce();
      finish();

      expect(await first).toEqual(await second);
      expect(entryService.expireEntries).toHaveBeenCalledTimes(1);

      await sweeper.runOnce();
      expect(entryService.expireEntries).toHaveBeenCalledTimes(2);
    });
  });

  describe('start() / stop()', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('should tick immediately and then on the interval', async () => {
      const entryService = createMockEntryService();
      const sweeper = createSweeper({ entryService, intervalMs: 1000, log: vi.fn() });

      sweeper.start();
      expect(sweeper.isRunning()).toBe(true);
      await vi.advanceTimersByTimeAsync(0);
      expect(entryService.expireEntries).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(entryService.expireEntries).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(entryService.expireEntries).toHaveBeenCalledTimes(2);

      await sweeper.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(sweeper.isRunning()).toBe(false);
      expect(entryService.expireEntries).toHaveBeenCalledTimes(2);
    });

    it('should wait for the running tick before resolving stop', async () => {
      const entryService = createMockEntryService();
      let finish: () => void = () => undefined;
      vi.mocked(entryService.reconcile).mockReturnValue(
        new Promise<{ orphanedRecords: number; orphanedPayloads: number; failed: number }>(
          (resolve) => {
            finish = () => resolve({ orphanedRecords: 0, orphanedPayloads: 0, failed: 0 });
          }
        )
      );
      const sweeper = createSweeper({ entryService, intervalMs: 60_000, log: vi.fn() });

      sweeper.start();
      let stopped = false;
      const stopping = sweeper.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(0);
      expect(stopped).toBe(false);

      finish();
      await stopping;
      expect(stopped).toBe(true);
      expect(entryService.reconcile).toHaveBeenCalledTimes(1);
    });

    it('should log a failed tick and keep the schedule', async () => {
      const entryService = createMockEntryService();
      vi.mocked(entryService.expireEntries).mockRejectedValueOnce(new Error('boom'));
      const log = vi.fn();
      const sweeper = createSweeper({ entryService, intervalMs: 1000, log });

      sweeper.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(log).toHaveBeenCalledWith('Sweep failed: boom');

      await vi.advanceTimersByTimeAsync(1000);
      await sweeper.stop();

      expect(entryService.expireEntries).toHaveBeenCalledTimes(2);
    });

    it('should ignore a second start', async () => {
      const entryService = createMockEntryService();
      const sweeper = createSweeper({ entryService, intervalMs: 1000, log: vi.fn() });

      sweeper.start();
      sweeper.start();
      await vi.advanceTimersByTimeAsync(0);
      await sweeper.stop();

      expect(entryService.expireEntries).toHaveBeenCalledTimes(1);
    });

    it('should keep a single schedule across stop and start', async () => {
      const entryService = createMockEntryService();
      const sweeper = createSweeper({ entryService, intervalMs: 1000, log: vi.fn() });

      sweeper.start();
      const stopping = sweeper.stop();
      sweeper.start();
      await stopping;
      await vi.advanceTimersByTimeAsync(1000);
      await sweeper.stop();

      // Both starts share the first tick; only one interval tick follows
      expect(entryService.expireEntries).toHaveBeenCalledTimes(2);
    });
  });
});
