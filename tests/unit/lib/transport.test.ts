/**
 * Transport Layer Unit Tests
 * Certificate loading only; no sockets are opened
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigError } from '@/lib/errors.js';
import { loadTlsMaterial } from '@/lib/transport.js';

import { createTempDir, removeTempDir } from '../../helpers/test-utils.js';

describe('loadTlsMaterial()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should fail with a ConfigError when the certificate is missing', async () => {
    const certPath = path.join(dir, 'missing-cert.pem');

    await expect(
      loadTlsMaterial({ certPath, keyPath: path.join(dir, 'key.pem') })
    ).rejects.toThrow(`Cannot read TLS certificate ${certPath}: file not found`);
  });

  it('should fail with a ConfigError when the key is missing', async () => {
    const certPath = path.join(dir, 'cert.pem');
    const keyPath = path.join(dir, 'missing-key.pem');
    await writeFile(certPath, 'placeholder');

    await expect(loadTlsMaterial({ certPath, keyPath })).rejects.toThrow(
      `Cannot read TLS private key ${keyPath}: file not found`
    );
  });

  it('should reject material that is not a certificate/key pair', async () => {
    const certPath = path.join(dir, 'cert.pem');
    const keyPath = path.join(dir, 'key.pem');
    await writeFile(certPath, 'not a certificate');
    await writeFile(keyPath, 'not a key');

    const attempt = loadTlsMaterial({ certPath, keyPath });

    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toThrow(/^Invalid TLS certificate\/key pair/);
  });
});
