/**
 * EntryService Implementation
 *
 * SCOPE: Shared files and text snippets (payload + metadata together)
 *
 * GUARDRAILS:
 * - Every operation that touches one entry holds that entry's lock
 * - Metadata and payload exist together after every mutation
 * - Deletion (by a client or by expiry) goes through removeEntry only
 * - Adapter errors become STORAGE_ERROR results, temp files are discarded
 *
 * Dependencies: EntryServiceDb, EntryServiceStorage
 */

import type { Readable } from 'node:stream';

import mime from 'mime-types';

import { BYTES_PER_MB } from '../lib/config.js';
import { isEntryId } from '../lib/entry-id.js';
import { StorageIOError } from '../lib/errors.js';
import { FALLBACK_FILENAME, textLabel } from '../lib/filename.js';
import { KeyedLock } from '../lib/keyed-lock.js';
import type {
  Entry,
  EntryKind,
  EntryListing,
  ListedEntry,
  Result,
  StorageStats,
  SweepReport,
} from '../types/index.js';
import { failure, success } from '../types/index.js';
import type { EntryServiceDb } from './entry.db.js';
import {
  entryIdFromStoredPath,
  type EntryServiceStorage,
  type PayloadHandle,
  type StagedPayload,
} from './entry.storage.js';

export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
const DEFAULT_CONTENT_TYPE = 'application/octet-stream';
const MIME_TYPE_PATTERN = /^[\w!#$&^.+-]+\/[\w!#$&^.+-]+$/;
const MS_PER_HOUR = 60 * 60 * 1000;

export interface EntryServiceSettings {
  cleanupHours: number;
  maxSizeMb: number;
  maxSizeBytes: number;
  maxTextBytes: number;
}

export interface UploadFileParams {
  source: Readable;
  filename: string;
  /** Content type the client declared for the part */
  mimeType?: string;
}

export interface DownloadHandle {
  entry: Entry;
  payload: PayloadHandle;
}

export interface DownloadInfo {
  entry: Entry;
  sizeBytes: number;
}

export interface TextContent {
  entry: Entry;
  text: string;
}

export type ExpiryReport = Pick<SweepReport, 'expired' | 'failed'>;
export type ReconcileReport = Pick<
  SweepReport,
  'orphanedRecords' | 'orphanedPayloads' | 'failed'
>;

/**
 * EntryService interface
 */
export interface EntryService {
  readonly settings: EntryServiceSettings;
  /** Prepare storage, load metadata and reconcile the two */
  init(): Promise<ReconcileReport>;
  uploadFile(params: UploadFileParams): Promise<Result<Entry>>;
  shareText(text: string): Promise<Result<Entry>>;
  openDownload(id: string): Promise<Result<DownloadHandle>>;
  /** What a download would send, without opening the payload */
  describeDownload(id: string): Promise<Result<DownloadInfo>>;
  getText(id: string): Promise<Result<TextContent>>;
  listEntries(): Promise<Result<EntryListing>>;
  /** Succeeds for absent ids too; `deleted` tells which case applied */
  deleteEntry(id: string): Promise<Result<{ deleted: boolean }>>;
  getStats(): Promise<Result<StorageStats>>;
  expireEntries(): Promise<ExpiryReport>;
  reconcile(): Promise<ReconcileReport>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * Content type for a file: by extension, then the declared type
 */
function contentTypeFor(displayName: string, declared: string | undefined): string {
  const byName = mime.lookup(displayName);
  if (byName !== false) {
    return byName;
  }
  const candidate = declared?.trim().toLowerCase();
  if (candidate !== undefined && MIME_TYPE_PATTERN.test(candidate)) {
    return candidate;
  }
  return DEFAULT_CONTENT_TYPE;
}

function notFound(id: string): Result<never> {
  return failure('NOT_FOUND', 'Entry not found', { id });
}

/**
 * Map an adapter error to a failure. Internals are logged, never returned.
 */
function storageFailure(operation: string, error: unknown): Result<never> {
  console.error(`${operation} failed:`, error);
  if (error instanceof StorageIOError) {
    return failure('STORAGE_ERROR', 'Storage operation failed');
  }
  return failure('INTERNAL_ERROR', 'An unexpected error occurred');
}

function formatLimit(bytes: number): string {
  return `${bytes / BYTES_PER_MB} MB`;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create EntryService instance
 */
export function createEntryService(deps: {
  db: EntryServiceDb;
  storage: EntryServiceStorage;
  settings: EntryServiceSettings;
  locks?: KeyedLock;
  now?: () => Date;
}): EntryService {
  const { db, storage, settings } = deps;
  const locks = deps.locks ?? new KeyedLock();
  const now = deps.now ?? (() => new Date());
  const retentionMs = settings.cleanupHours * MS_PER_HOUR;

  function isExpired(entry: Entry, at: Date): boolean {
    return at.getTime() - entry.createdAt.getTime() >= retentionMs;
  }

  function toListed(entry: Entry, at: Date): ListedEntry {
    const expiresAt = new Date(entry.createdAt.getTime() + retentionMs);
    const remainingMs = expiresAt.getTime() - at.getTime();
    return {
      ...entry,
      expiresAt,
      expiresIn: Math.max(0, Math.floor(remainingMs / 1000)),
    };
  }

  /**
   * Commit a staged payload and create its record under a fresh id
   */
  async function commitEntry(
    staged: StagedPayload,
    fields: {
      kind: EntryKind;
      displayName: string;
      contentType: string;
      createdAt: Date;
    }
  ): Promise<Result<Entry>> {
    const id = db.reserveId();

    try {
      return await locks.withLock(id, async () => {
        let storedPath: string;
        try {
          storedPath = await storage.commit(staged, fields.kind, fields.displayName, id);
        } catch (error) {
          await storage.discard(staged);
          throw error;
        }

        try {
          const entry = await db.create({
            id,
            kind: fields.kind,
            displayName: fields.displayName,
            storedPath,
            sizeBytes: staged.sizeBytes,
            contentType: fields.contentType,
            createdAt: fields.createdAt,
          });
          return success(entry);
        } catch (error) {
          await storage.delete(storedPath).catch((cleanupError: unknown) => {
            console.error(`Failed to remove payload ${storedPath}:`, cleanupError);
          });
          throw error;
        }
      });
    } catch (error) {
      return storageFailure('Storing entry', error);
    } finally {
      db.releaseId(id);
    }
  }

  /**
   * The single delete path. Metadata goes first, so a payload that cannot be
   * removed is left as an orphan for reconciliation, never the reverse.
   */
  async function removeEntry(
    id: string,
    shouldRemove?: (entry: Entry) => boolean
  ): Promise<boolean> {
    return locks.withLock(id, async () => {
      const entry = await db.get(id);
      if (entry === null || (shouldRemove !== undefined && !shouldRemove(entry))) {
        return false;
      }

      await db.delete(id);
      try {
        await storage.delete(entry.storedPath);
      } catch (error) {
        console.error(`Failed to remove payload ${entry.storedPath}:`, error);
      }
      return true;
    });
  }

  async function currentUsage(entryCount: number): Promise<EntryListing['usage']> {
    return { entryCount, totalBytes: await storage.usageBytes() };
  }

  const service: EntryService = {
    settings,

    async init(): Promise<ReconcileReport> {
      await storage.init();
      await db.load();
      return service.reconcile();
    },

    /**
     * Store one uploaded file. The source is read to its end even when it
     * turns out too large, so the request body keeps flowing.
     */
    async uploadFile(params: UploadFileParams): Promise<Result<Entry>> {
      const displayName =
        params.filename.trim() === '' ? FALLBACK_FILENAME : params.filename;

      let staged: StagedPayload;
      try {
        staged = await storage.stage(params.source);
      } catch (error) {
        if (error instanceof StorageIOError) {
          return storageFailure('Staging upload', error);
        }
        return failure('UPLOAD_ABORTED', 'Upload was interrupted', { displayName });
      }

      if (staged.sizeBytes > settings.maxSizeBytes) {
        await storage.discard(staged);
        return failure(
          'PAYLOAD_TOO_LARGE',
          `File exceeds the ${formatLimit(settings.maxSizeBytes)} limit`,
          { displayName, maxSizeBytes: settings.maxSizeBytes }
        );
      }
      if (staged.sizeBytes === 0) {
        await storage.discard(staged);
        return failure('EMPTY_PAYLOAD', 'File is empty', { displayName });
      }

      return commitEntry(staged, {
        kind: 'file',
        displayName,
        contentType: contentTypeFor(displayName, params.mimeType),
        createdAt: now(),
      });
    },

    async shareText(text: string): Promise<Result<Entry>> {
      if (text.trim() === '') {
        return failure('EMPTY_PAYLOAD', 'Text is empty');
      }

      const bytes = Buffer.from(text, 'utf8');
      if (bytes.length > settings.maxTextBytes) {
        return failure(
          'PAYLOAD_TOO_LARGE',
          `Text exceeds the ${formatLimit(settings.maxTextBytes)} limit`,
          { maxSizeBytes: settings.maxTextBytes }
        );
      }

      let staged: StagedPayload;
      try {
        staged = await storage.stage(bytes);
      } catch (error) {
        return storageFailure('Staging text', error);
      }

      const createdAt = now();
      return commitEntry(staged, {
        kind: 'text',
        displayName: textLabel(createdAt),
        contentType: TEXT_CONTENT_TYPE,
        createdAt,
      });
    },

    /**
     * Open a payload for streaming. The handle is opened under the entry
     * lock; reading it afterwards is unaffected by a concurrent delete.
     */
    async openDownload(id: string): Promise<Result<DownloadHandle>> {
      if (!isEntryId(id)) {
        return notFound(id);
      }

      try {
        return await locks.withLock(id, async () => {
          const entry = await db.get(id);
          if (entry === null) {
            return notFound(id);
          }
          const payload = await storage.open(entry.storedPath);
          if (payload === null) {
            return notFound(id);
          }
          return success({ entry, payload });
        });
      } catch (error) {
        return storageFailure('Opening download', error);
      }
    },

    async describeDownload(id: string): Promise<Result<DownloadInfo>> {
      if (!isEntryId(id)) {
        return notFound(id);
      }

      try {
        return await locks.withLock(id, async () => {
          const entry = await db.get(id);
          if (entry === null) {
            return notFound(id);
          }
          const sizeBytes = await storage.size(entry.storedPath);
          if (sizeBytes === null) {
            return notFound(id);
          }
          return success({ entry, sizeBytes });
        });
      } catch (error) {
        return storageFailure('Describing download', error);
      }
    },

    async getText(id: string): Promise<Result<TextContent>> {
      if (!isEntryId(id)) {
        return notFound(id);
      }

      try {
        return await locks.withLock(id, async () => {
          const entry = await db.get(id);
          if (entry === null) {
            return notFound(id);
          }
          if (entry.kind !== 'text') {
            return failure('NOT_TEXT', 'Entry is a file, not text', { id });
          }
          const bytes = await storage.read(entry.storedPath);
          if (bytes === null) {
            return notFound(id);
          }
          return success({ entry, text: bytes.toString('utf8') });
        });
      } catch (error) {
        return storageFailure('Reading text', error);
      }
    },

    async listEntries(): Promise<Result<EntryListing>> {
      try {
        const at = now();
        const entries = await db.list();
        return success({
          items: entries.map((entry) => toListed(entry, at)),
          usage: await currentUsage(entries.length),
        });
      } catch (error) {
        return storageFailure('Listing entries', error);
      }
    },

    async deleteEntry(id: string): Promise<Result<{ deleted: boolean }>> {
      if (!isEntryId(id)) {
        return success({ deleted: false });
      }

      try {
        return success({ deleted: await removeEntry(id) });
      } catch (error) {
        return storageFailure('Deleting entry', error);
      }
    },

    async getStats(): Promise<Result<StorageStats>> {
      try {
        const entries = await db.list();
        const usage = await currentUsage(entries.length);
        return success({
          ...usage,
          totalMegabytes: Math.round((usage.totalBytes / BYTES_PER_MB) * 100) / 100,
          cleanupHours: settings.cleanupHours,
          maxSizeMb: settings.maxSizeMb,
        });
      } catch (error) {
        return storageFailure('Reading stats', error);
      }
    },

    /**
     * Remove entries past the retention window. Age is checked again under
     * each entry's lock.
     */
    async expireEntries(): Promise<ExpiryReport> {
      const at = now();
      const report: ExpiryReport = { expired: 0, failed: 0 };

      for (const entry of await db.list()) {
        if (!isExpired(entry, at)) {
          continue;
        }
        try {
          if (await removeEntry(entry.id, (current) => isExpired(current, at))) {
            report.expired += 1;
          }
        } catch (error) {
          report.failed += 1;
          console.error(`Failed to expire entry ${entry.id}:`, error);
        }
      }

      return report;
    },

    /**
     * Drop records whose payload is missing and payloads nobody references
     */
    async reconcile(): Promise<ReconcileReport> {
      const report: ReconcileReport = {
        orphanedRecords: 0,
        orphanedPayloads: 0,
        failed: 0,
      };

      const records = await db.list();
      const referenced = new Set(records.map((entry) => entry.storedPath));

      for (const record of records) {
        try {
          const dropped = await locks.withLock(record.id, async () => {
            const current = await db.get(record.id);
            if (current === null || (await storage.exists(current.storedPath))) {
              return false;
            }
            return db.delete(current.id);
          });
          if (dropped) {
            report.orphanedRecords += 1;
            console.error(`Dropped entry ${record.id}: payload missing`);
          }
        } catch (error) {
          report.failed += 1;
          console.error(`Failed to reconcile entry ${record.id}:`, error);
        }
      }

      for (const storedPath of await storage.listPayloads()) {
        if (referenced.has(storedPath)) {
          continue;
        }
        const id = entryIdFromStoredPath(storedPath);

        const purge = async (): Promise<boolean> => {
          // The upload holding this id may have created its record meanwhile
          const owner = id === null ? null : await db.get(id);
          if (owner !== null && owner.storedPath === storedPath) {
            return false;
          }
          await storage.delete(storedPath);
          return true;
        };

        try {
          const removed = id === null ? await purge() : await locks.withLock(id, purge);
          if (removed) {
            report.orphanedPayloads += 1;
            console.error(`Removed orphaned payload ${storedPath}`);
          }
        } catch (error) {
          report.failed += 1;
          console.error(`Failed to remove orphaned payload ${storedPath}:`, error);
        }
      }

      return report;
    },
  };

  return service;
}
