/**
 * Wire shapes for entries. The stored path never leaves the server.
 */

import type { Entry, EntryKind, ListedEntry } from '../../types/index.js';

export interface EntryView {
  id: string;
  kind: EntryKind;
  displayName: string;
  sizeBytes: number;
  contentType: string;
  createdAt: string;
}

export interface ListedEntryView extends EntryView {
  expiresAt: string;
  expiresIn: number;
}

export function toEntryView(entry: Entry): EntryView {
  return {
    id: entry.id,
    kind: entry.kind,
    displayName: entry.displayName,
    sizeBytes: entry.sizeBytes,
    contentType: entry.contentType,
    createdAt: entry.createdAt.toISOString(),
  };
}

export function toListedEntryView(entry: ListedEntry): ListedEntryView {
  return {
    ...toEntryView(entry),
    expiresAt: entry.expiresAt.toISOString(),
    expiresIn: entry.expiresIn,
  };
}
