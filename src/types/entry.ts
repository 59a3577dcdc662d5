/**
 * Entry Domain Types
 *
 * An Entry is one shared item: an uploaded file or a text snippet.
 * Metadata lives in the entry store, bytes live under the storage root.
 */

import type { ErrorCode } from './result.js';

export type EntryKind = 'file' | 'text';

/**
 * Entry entity
 */
export interface Entry {
  id: string;
  kind: EntryKind;
  /** Name shown to users; the client-supplied filename for files */
  displayName: string;
  /** POSIX path relative to the storage root, owned by this entry alone */
  storedPath: string;
  sizeBytes: number;
  contentType: string;
  createdAt: Date;
}

/**
 * Entry as presented by the listing, with its remaining lifetime
 */
export interface ListedEntry extends Entry {
  expiresAt: Date;
  /** Whole seconds until the sweeper may remove it, never negative */
  expiresIn: number;
}

/**
 * Aggregate storage usage
 */
export interface StorageUsage {
  entryCount: number;
  totalBytes: number;
}

export interface EntryListing {
  items: ListedEntry[];
  usage: StorageUsage;
}

/**
 * Storage statistics with the limits the server enforces
 */
export interface StorageStats extends StorageUsage {
  totalMegabytes: number;
  cleanupHours: number;
  maxSizeMb: number;
}

/**
 * Outcome of one file part in a multi-file upload
 */
export type UploadOutcome =
  | { ok: true; entry: Entry }
  | {
      ok: false;
      displayName: string;
      error: { code: ErrorCode; message: string };
    };

/**
 * Counts reported by one expiry/reconciliation pass
 */
export interface SweepReport {
  expired: number;
  failed: number;
  orphanedRecords: number;
  orphanedPayloads: number;
}
