/**
 * Service Layer Exports
 *
 * Routes reach storage and metadata only through EntryService.
 */

// EntryService
export type {
  EntryService,
  EntryServiceSettings,
  UploadFileParams,
  DownloadHandle,
  TextContent,
  ExpiryReport,
  ReconcileReport,
} from './entry.service.js';
export { createEntryService, TEXT_CONTENT_TYPE } from './entry.service.js';

// Adapters
export type { EntryServiceDb } from './entry.db.js';
export { createEntryDb } from './entry.db.js';
export type {
  EntryServiceStorage,
  PayloadHandle,
  StagedPayload,
} from './entry.storage.js';
export { createDiskStorage, metadataFilePath } from './entry.storage.js';

// Sweeper
export type { Sweeper } from './sweeper.service.js';
export { createSweeper } from './sweeper.service.js';
