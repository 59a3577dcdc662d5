/**
 * Application Entry Point
 *
 * Wires storage, metadata, the entry service and the sweeper, then starts
 * the Hono application over HTTP or HTTPS.
 */

import 'dotenv/config';

import { createApp } from './api/app.js';
import { loadConfig } from './lib/config.js';
import { ConfigError } from './lib/errors.js';
import { closeServer, loadTlsMaterial, startServer } from './lib/transport.js';
import {
  createDiskStorage,
  createEntryDb,
  createEntryService,
  createSweeper,
  metadataFilePath,
} from './services/index.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // Certificate problems stop startup before anything touches the disk
  const tls = config.tls === null ? null : await loadTlsMaterial(config.tls);

  const storage = createDiskStorage(config.storageDir);
  const db = createEntryDb(metadataFilePath(storage.root));
  const entryService = createEntryService({
    db,
    storage,
    settings: {
      cleanupHours: config.cleanupHours,
      maxSizeMb: config.maxSizeMb,
      maxSizeBytes: config.maxSizeBytes,
      maxTextBytes: config.maxTextBytes,
    },
  });

  const reconciled = await entryService.init();
  if (reconciled.orphanedRecords > 0 || reconciled.orphanedPayloads > 0) {
    console.error(
      `Startup reconciliation: dropped ${reconciled.orphanedRecords} records, ` +
        `removed ${reconciled.orphanedPayloads} payloads`
    );
  }

  const sweeper = createSweeper({
    entryService,
    intervalMs: config.sweepIntervalMs,
  });

  const app = createApp({
    entryService,
    sweeper,
    maxFilesPerUpload: config.maxFilesPerUpload,
    allowedOrigins: config.allowedOrigins,
  });

  sweeper.start();
  const server = startServer({
    app,
    host: config.host,
    port: config.port,
    tls,
    onListening: (info) => {
      const scheme = tls === null ? 'http' : 'https';
      console.error(`Server listening on ${scheme}://${info.address}:${info.port}`);
      console.error(`Storage root: ${storage.root}`);
      console.error(
        `Entries expire after ${config.cleanupHours}h, max size ${config.maxSizeMb} MB`
      );
    },
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.error(`${signal} received, shutting down`);

    await sweeper.stop();
    await closeServer(server);
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error('Failed to start:', error);
  }
  process.exit(1);
});
