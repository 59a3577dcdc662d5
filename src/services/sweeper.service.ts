/**
 * Expiry Sweeper
 *
 * Scheduled task that expires old entries and reconciles storage with
 * metadata. Ticks once on start, then every `intervalMs`. A tick never
 * overlaps another; an on-demand run joins the tick already in progress.
 */

import type { SweepReport } from '../types/index.js';
import type { EntryService } from './entry.service.js';

export interface Sweeper {
  start(): void;
  /** Cancel the schedule and wait for a running tick to finish */
  stop(): Promise<void>;
  runOnce(): Promise<SweepReport>;
  isRunning(): boolean;
}

export function createSweeper(deps: {
  entryService: Pick<EntryService, 'expireEntries' | 'reconcile'>;
  intervalMs: number;
  log?: (message: string) => void;
}): Sweeper {
  const { entryService, intervalMs } = deps;
  const log = deps.log ?? ((message: string) => console.error(message));

  let active = false;
  // Bumped on every start, so a tick left over from before a restart cannot re-arm
  let generation = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let loop: Promise<void> | null = null;
  let current: Promise<SweepReport> | null = null;

  async function tick(): Promise<SweepReport> {
    const expiry = await entryService.expireEntries();
    const reconciled = await entryService.reconcile();
    const report: SweepReport = {
      expired: expiry.expired,
      failed: expiry.failed + reconciled.failed,
      orphanedRecords: reconciled.orphanedRecords,
      orphanedPayloads: reconciled.orphanedPayloads,
    };

    if (
      report.expired > 0 ||
      report.failed > 0 ||
      report.orphanedRecords > 0 ||
      report.orphanedPayloads > 0
    ) {
      log(
        `Sweep: expired=${report.expired} orphanedRecords=${report.orphanedRecords} ` +
          `orphanedPayloads=${report.orphanedPayloads} failed=${report.failed}`
      );
    }
    return report;
  }

  function runOnce(): Promise<SweepReport> {
    if (current === null) {
      current = tick().finally(() => {
        current = null;
      });
    }
    return current;
  }

  /**
   * One scheduled tick; the next is armed only once this one has finished
   */
  async function scheduledTick(run: number): Promise<void> {
    try {
      await runOnce();
    } catch (error) {
      log(`Sweep failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (active && run === generation) {
      timer = setTimeout(() => {
        timer = null;
        loop = scheduledTick(run);
      }, intervalMs);
    }
  }

  return {
    start(): void {
      if (active) {
        return;
      }
      active = true;
      generation += 1;
      loop = scheduledTick(generation);
    },

    async stop(): Promise<void> {
      active = false;
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }

      const running = loop;
      loop = null;
      await running;
      if (current !== null) {
        await current.catch(() => undefined);
      }
    },

    runOnce,

    isRunning(): boolean {
      return active;
    },
  };
}
