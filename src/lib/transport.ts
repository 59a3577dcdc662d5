/**
 * Transport Layer
 * Binds the Hono app to a socket, over TLS when a certificate is configured
 */

import { readFile } from 'node:fs/promises';
import { createServer as createHttpsServer } from 'node:https';
import type { AddressInfo } from 'node:net';
import { createSecureContext } from 'node:tls';

import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import type { Hono } from 'hono';

import { ConfigError, errnoCode, errorMessage } from './errors.js';

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
}

async function readMaterial(filePath: string, label: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    const reason =
      errnoCode(error) === 'ENOENT' ? 'file not found' : errorMessage(error);
    throw new ConfigError(`Cannot read TLS ${label} ${filePath}: ${reason}`, {
      cause: error,
    });
  }
}

/**
 * Read and validate a certificate/key pair. Runs before any socket is opened
 * so bad material stops startup instead of failing the first handshake.
 */
export async function loadTlsMaterial(paths: {
  certPath: string;
  keyPath: string;
}): Promise<TlsMaterial> {
  const cert = await readMaterial(paths.certPath, 'certificate');
  const key = await readMaterial(paths.keyPath, 'private key');

  try {
    createSecureContext({ cert, key });
  } catch (error) {
    throw new ConfigError(
      `Invalid TLS certificate/key pair: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return { cert, key };
}

export interface StartServerOptions {
  app: Hono;
  host: string;
  port: number;
  tls: TlsMaterial | null;
  onListening?: (info: AddressInfo) => void;
}

/**
 * Start serving the app; plaintext unless TLS material is given
 */
export function startServer(options: StartServerOptions): ServerType {
  const { app, host, port, tls, onListening } = options;

  if (tls !== null) {
    return serve(
      {
        fetch: app.fetch,
        hostname: host,
        port,
        createServer: createHttpsServer,
        serverOptions: { cert: tls.cert, key: tls.key },
      },
      onListening
    );
  }

  return serve({ fetch: app.fetch, hostname: host, port }, onListening);
}

/**
 * Stop accepting connections and wait for in-flight ones to finish
 */
export function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error?: Error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
