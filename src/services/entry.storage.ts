/**
 * Disk Storage Adapter
 * Implementation of EntryServiceStorage over a local directory
 *
 * Layout under the storage root:
 *   uploads/<id>_<sanitized name>   file payloads
 *   texts/<id>.txt                  shared text payloads
 *   .tmp/                           staged writes, purged on startup
 *   .metadata/entries.json          entry records (owned by the entry db)
 *
 * Writes are staged in .tmp and hard-linked into place, so a payload path
 * either does not exist or holds the complete bytes, and an existing payload
 * is never overwritten.
 */

import { constants, createWriteStream } from 'node:fs';
import {
  access,
  link,
  mkdir,
  open,
  readdir,
  readFile,
  rm,
  stat,
  unlink,
  writeFile,
} from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { nanoid } from 'nanoid';

import { ENTRY_ID_LENGTH } from '../lib/entry-id.js';
import {
  ConfigError,
  StorageIOError,
  errnoCode,
  errorMessage,
  isSystemError,
} from '../lib/errors.js';
import { sanitizeFilename } from '../lib/filename.js';
import type { EntryKind } from '../types/index.js';

export const UPLOADS_DIR = 'uploads';
export const TEXTS_DIR = 'texts';
export const TEMP_DIR = '.tmp';
export const METADATA_DIR = '.metadata';
export const METADATA_FILENAME = 'entries.json';

const PAYLOAD_DIRS = [UPLOADS_DIR, TEXTS_DIR] as const;

/**
 * Bytes written to a temp file, not yet visible under a payload path
 */
export interface StagedPayload {
  tempPath: string;
  sizeBytes: number;
}

/**
 * An opened payload. The file descriptor stays valid even if the payload is
 * deleted while the stream is being read.
 */
export interface PayloadHandle {
  sizeBytes: number;
  stream: Readable;
}

/**
 * Storage abstraction used by the entry service
 */
export interface EntryServiceStorage {
  readonly root: string;
  init: () => Promise<void>;
  stage: (source: Readable | Buffer) => Promise<StagedPayload>;
  commit: (
    staged: StagedPayload,
    kind: EntryKind,
    suggestedName: string,
    id: string
  ) => Promise<string>;
  discard: (staged: StagedPayload) => Promise<void>;
  put: (
    source: Readable | Buffer,
    kind: EntryKind,
    suggestedName: string,
    id: string
  ) => Promise<{ storedPath: string; sizeBytes: number }>;
  open: (storedPath: string) => Promise<PayloadHandle | null>;
  read: (storedPath: string) => Promise<Buffer | null>;
  exists: (storedPath: string) => Promise<boolean>;
  /** Byte size of a payload without opening it, or null when absent */
  size: (storedPath: string) => Promise<number | null>;
  delete: (storedPath: string) => Promise<void>;
  listPayloads: () => Promise<string[]>;
  usageBytes: () => Promise<number>;
}

/**
 * Path of the metadata file for a storage root
 */
export function metadataFilePath(root: string): string {
  return path.join(root, METADATA_DIR, METADATA_FILENAME);
}

/**
 * Stored path (relative, POSIX separators) for a new payload
 */
export function storedPathFor(
  kind: EntryKind,
  id: string,
  suggestedName: string
): string {
  if (kind === 'text') {
    return `${TEXTS_DIR}/${id}.txt`;
  }
  return `${UPLOADS_DIR}/${id}_${sanitizeFilename(suggestedName)}`;
}

const STORED_PATH_ID = new RegExp(
  `^(?:${UPLOADS_DIR}/([0-9A-Za-z]{${ENTRY_ID_LENGTH}})_.+|${TEXTS_DIR}/([0-9A-Za-z]{${ENTRY_ID_LENGTH}})\\.txt)$`
);

/**
 * Entry id encoded in a stored path, or null for names no entry produces
 */
export function entryIdFromStoredPath(storedPath: string): string | null {
  const match = STORED_PATH_ID.exec(storedPath);
  return match?.[1] ?? match?.[2] ?? null;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}

/**
 * Create disk storage adapter rooted at `rootDir`
 */
export function createDiskStorage(rootDir: string): EntryServiceStorage {
  const root = path.resolve(rootDir);
  const tempDir = path.join(root, TEMP_DIR);

  /**
   * Absolute path for a stored path, or null when it would leave a payload
   * directory of the root
   */
  function resolvePayloadPath(storedPath: string): string | null {
    if (storedPath.includes('\0')) {
      return null;
    }
    const absolute = path.resolve(root, storedPath);
    const relative = path.relative(root, absolute);
    if (relative === '' || path.isAbsolute(relative)) {
      return null;
    }
    const segments = relative.split(path.sep);
    if (segments.length !== 2 || segments.includes('..')) {
      return null;
    }
    const [dir] = segments;
    return dir === UPLOADS_DIR || dir === TEXTS_DIR ? absolute : null;
  }

  async function removeTemp(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (error) {
      console.error(`Failed to remove temp file ${tempPath}:`, error);
    }
  }

  const storage: EntryServiceStorage = {
    root,

    /**
     * Create the directory layout and check the root is writable
     */
    async init(): Promise<void> {
      try {
        for (const dir of [...PAYLOAD_DIRS, METADATA_DIR]) {
          await mkdir(path.join(root, dir), { recursive: true });
        }
        // Staged files from an interrupted run never became entries
        await rm(tempDir, { recursive: true, force: true });
        await mkdir(tempDir, { recursive: true });
        await access(root, constants.R_OK | constants.W_OK);
      } catch (error) {
        throw new ConfigError(
          `Storage root ${root} is not usable: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    },

    /**
     * Write bytes to a fresh temp file
     */
    async stage(source: Readable | Buffer): Promise<StagedPayload> {
      const tempPath = path.join(tempDir, `${nanoid()}.part`);

      try {
        if (Buffer.isBuffer(source)) {
          await writeFile(tempPath, source, { flag: 'wx' });
        } else {
          await pipeline(source, createWriteStream(tempPath, { flags: 'wx' }));
        }
        const stats = await stat(tempPath);
        return { tempPath, sizeBytes: stats.size };
      } catch (error) {
        await removeTemp(tempPath);
        // Errors raised by the source stream (client went away) pass through
        if (!isSystemError(error)) {
          throw error;
        }
        throw new StorageIOError(`Failed to stage payload: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    },

    /**
     * Move a staged payload into its final place
     */
    async commit(
      staged: StagedPayload,
      kind: EntryKind,
      suggestedName: string,
      id: string
    ): Promise<string> {
      const storedPath = storedPathFor(kind, id, suggestedName);
      const finalPath = resolvePayloadPath(storedPath);
      if (finalPath === null) {
        throw new StorageIOError(`Refusing to store outside the root: ${storedPath}`);
      }

      try {
        // link() fails with EEXIST instead of replacing an existing payload
        await link(staged.tempPath, finalPath);
      } catch (error) {
        throw new StorageIOError(
          `Failed to commit payload ${storedPath}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      await removeTemp(staged.tempPath);

      return storedPath;
    },

    async discard(staged: StagedPayload): Promise<void> {
      await removeTemp(staged.tempPath);
    },

    async put(
      source: Readable | Buffer,
      kind: EntryKind,
      suggestedName: string,
      id: string
    ): Promise<{ storedPath: string; sizeBytes: number }> {
      const staged = await storage.stage(source);
      try {
        const storedPath = await storage.commit(staged, kind, suggestedName, id);
        return { storedPath, sizeBytes: staged.sizeBytes };
      } catch (error) {
        await storage.discard(staged);
        throw error;
      }
    },

    /**
     * Open a payload for streaming
     */
    async open(storedPath: string): Promise<PayloadHandle | null> {
      const absolute = resolvePayloadPath(storedPath);
      if (absolute === null) {
        return null;
      }

      try {
        const handle = await open(absolute, 'r');
        try {
          const stats = await handle.stat();
          if (!stats.isFile()) {
            await handle.close();
            return null;
          }
          return { sizeBytes: stats.size, stream: handle.createReadStream() };
        } catch (error) {
          await handle.close();
          throw error;
        }
      } catch (error) {
        if (isMissing(error)) {
          return null;
        }
        throw new StorageIOError(`Failed to open ${storedPath}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    },

    async read(storedPath: string): Promise<Buffer | null> {
      const absolute = resolvePayloadPath(storedPath);
      if (absolute === null) {
        return null;
      }

      try {
        return await readFile(absolute);
      } catch (error) {
        if (isMissing(error)) {
          return null;
        }
        throw new StorageIOError(`Failed to read ${storedPath}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    },

    async exists(storedPath: string): Promise<boolean> {
      return (await storage.size(storedPath)) !== null;
    },

    async size(storedPath: string): Promise<number | null> {
      const absolute = resolvePayloadPath(storedPath);
      if (absolute === null) {
        return null;
      }

      try {
        const stats = await stat(absolute);
        return stats.isFile() ? stats.size : null;
      } catch (error) {
        if (isMissing(error)) {
          return null;
        }
        throw new StorageIOError(`Failed to stat ${storedPath}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    },

    /**
     * Remove a payload; absent paths are not an error
     */
    async delete(storedPath: string): Promise<void> {
      const absolute = resolvePayloadPath(storedPath);
      if (absolute === null) {
        return;
      }

      try {
        await unlink(absolute);
      } catch (error) {
        if (isMissing(error)) {
          return;
        }
        throw new StorageIOError(`Failed to delete ${storedPath}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    },

    /**
     * Stored paths of every payload currently on disk
     */
    async listPayloads(): Promise<string[]> {
      const storedPaths: string[] = [];

      for (const dir of PAYLOAD_DIRS) {
        try {
          const dirents = await readdir(path.join(root, dir), { withFileTypes: true });
          for (const dirent of dirents) {
            if (dirent.isFile()) {
              storedPaths.push(`${dir}/${dirent.name}`);
            }
          }
        } catch (error) {
          if (!isMissing(error)) {
            throw new StorageIOError(`Failed to list ${dir}: ${errorMessage(error)}`, {
              cause: error,
            });
          }
        }
      }

      return storedPaths.sort();
    },

    async usageBytes(): Promise<number> {
      let total = 0;
      for (const storedPath of await storage.listPayloads()) {
        try {
          total += (await stat(path.join(root, storedPath))).size;
        } catch (error) {
          // Deleted between listing and stat
          if (!isMissing(error)) {
            throw new StorageIOError(`Failed to stat ${storedPath}: ${errorMessage(error)}`, {
              cause: error,
            });
          }
        }
      }
      return total;
    },
  };

  return storage;
}
