/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure } from './result.js';
export type {
  Entry,
  EntryKind,
  EntryListing,
  ListedEntry,
  StorageStats,
  StorageUsage,
  SweepReport,
  UploadOutcome,
} from './entry.js';
