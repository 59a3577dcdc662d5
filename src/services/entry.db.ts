/**
 * Entry Metadata Store
 * Implements EntryServiceDb over a JSON file on disk
 *
 * The in-memory map is the source of truth while the process runs. Every
 * mutation rewrites the file as a whole (temp file + rename) under a single
 * write mutex, so the file on disk is always one complete snapshot.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { ENTRY_ID_PATTERN, generateEntryId } from '../lib/entry-id.js';
import { ConfigError, StorageIOError, errnoCode, errorMessage } from '../lib/errors.js';
import { Mutex } from '../lib/keyed-lock.js';
import type { Entry } from '../types/index.js';

const METADATA_VERSION = 1;

/**
 * Database abstraction interface for EntryService
 */
export interface EntryServiceDb {
  load: () => Promise<void>;
  /** Allocate an id no live or pending entry uses */
  reserveId: () => string;
  releaseId: (id: string) => void;
  create: (entry: Entry) => Promise<Entry>;
  get: (id: string) => Promise<Entry | null>;
  list: () => Promise<Entry[]>;
  /** Returns false when no record existed */
  delete: (id: string) => Promise<boolean>;
}

/**
 * On-disk record shape
 */
const entryRecordSchema = z.object({
  id: z.string().regex(ENTRY_ID_PATTERN),
  kind: z.enum(['file', 'text']),
  displayName: z.string(),
  storedPath: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  contentType: z.string().min(1),
  createdAt: z.string().datetime(),
});

const metadataFileSchema = z.object({
  version: z.literal(METADATA_VERSION),
  entries: z.array(entryRecordSchema),
});

type EntryRecord = z.infer<typeof entryRecordSchema>;

function toRecord(entry: Entry): EntryRecord {
  return {
    id: entry.id,
    kind: entry.kind,
    displayName: entry.displayName,
    storedPath: entry.storedPath,
    sizeBytes: entry.sizeBytes,
    contentType: entry.contentType,
    createdAt: entry.createdAt.toISOString(),
  };
}

function fromRecord(record: EntryRecord): Entry {
  return {
    ...record,
    createdAt: new Date(record.createdAt),
  };
}

function compareEntries(a: Entry, b: Entry): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function copyEntry(entry: Entry): Entry {
  return { ...entry, createdAt: new Date(entry.createdAt.getTime()) };
}

/**
 * Create EntryServiceDb backed by the JSON file at `filePath`
 */
export function createEntryDb(
  filePath: string,
  deps: { generateId?: () => string } = {}
): EntryServiceDb {
  const generateId = deps.generateId ?? generateEntryId;
  const entries = new Map<string, Entry>();
  const reserved = new Set<string>();
  const storedPaths = new Set<string>();
  const writeLock = new Mutex();
  let tempCounter = 0;

  /**
   * Write the current snapshot. Each call captures the map when it gets the
   * lock, so the last writer always stores the latest state.
   */
  async function persist(): Promise<void> {
    await writeLock.withLock(async () => {
      const snapshot = {
        version: METADATA_VERSION,
        entries: [...entries.values()].sort(compareEntries).map(toRecord),
      };
      tempCounter += 1;
      const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;

      try {
        await writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
        await rename(tempPath, filePath);
      } catch (error) {
        await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          console.error(`Failed to remove ${tempPath}:`, cleanupError);
        });
        throw new StorageIOError(
          `Failed to write metadata file: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    });
  }

  function insert(entry: Entry): void {
    entries.set(entry.id, entry);
    storedPaths.add(entry.storedPath);
  }

  function remove(entry: Entry): void {
    entries.delete(entry.id);
    storedPaths.delete(entry.storedPath);
  }

  return {
    /**
     * Load records from disk. A missing file means an empty store.
     */
    async load(): Promise<void> {
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf8');
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          return;
        }
        throw new ConfigError(
          `Cannot read metadata file ${filePath}: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (error) {
        throw new ConfigError(`Metadata file ${filePath} is not valid JSON`, {
          cause: error,
        });
      }

      const parsed = metadataFileSchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(
          `Metadata file ${filePath} is invalid at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown error'}`
        );
      }

      entries.clear();
      storedPaths.clear();
      for (const record of parsed.data.entries) {
        if (entries.has(record.id) || storedPaths.has(record.storedPath)) {
          throw new ConfigError(
            `Metadata file ${filePath} has a duplicate entry ${record.id}`
          );
        }
        insert(fromRecord(record));
      }
    },

    reserveId(): string {
      for (;;) {
        const id = generateId();
        if (!entries.has(id) && !reserved.has(id)) {
          reserved.add(id);
          return id;
        }
      }
    },

    releaseId(id: string): void {
      reserved.delete(id);
    },

    /**
     * Insert a record for a reserved id and persist it
     */
    async create(entry: Entry): Promise<Entry> {
      if (!reserved.has(entry.id)) {
        throw new Error(`Entry id ${entry.id} was not reserved`);
      }
      if (entries.has(entry.id) || storedPaths.has(entry.storedPath)) {
        throw new Error(`Entry ${entry.id} collides with an existing record`);
      }

      const stored = copyEntry(entry);
      insert(stored);
      reserved.delete(entry.id);

      try {
        await persist();
      } catch (error) {
        remove(stored);
        throw error;
      }

      return copyEntry(stored);
    },

    async get(id: string): Promise<Entry | null> {
      const entry = entries.get(id);
      return entry === undefined ? null : copyEntry(entry);
    },

    /**
     * All records, oldest first
     */
    async list(): Promise<Entry[]> {
      return [...entries.values()].sort(compareEntries).map(copyEntry);
    },

    async delete(id: string): Promise<boolean> {
      const entry = entries.get(id);
      if (entry === undefined) {
        return false;
      }

      remove(entry);
      try {
        await persist();
      } catch (error) {
        insert(entry);
        throw error;
      }

      return true;
    },
  };
}
