/**
 * Disk Storage Adapter Unit Tests
 * Runs against a real temporary directory
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { text } from 'node:stream/consumers';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigError } from '@/lib/errors.js';
import {
  createDiskStorage,
  entryIdFromStoredPath,
  metadataFilePath,
  storedPathFor,
  type EntryServiceStorage,
} from '@/services/entry.storage.js';

import {
  createTempDir,
  failingReadable,
  readableFrom,
  removeTempDir,
} from '../../helpers/test-utils.js';

const ID = 'Abc123Abc123Abc1';

describe('storedPathFor()', () => {
  it('should place files under uploads with a sanitized name', () => {
    expect(storedPathFor('file', ID, '../../etc/passwd')).toBe(`uploads/${ID}_passwd`);
  });

  it('should place text under texts regardless of the name', () => {
    expect(storedPathFor('text', ID, 'text_20240115_103000.txt')).toBe(`texts/${ID}.txt`);
  });
});

describe('entryIdFromStoredPath()', () => {
  it('should read the id back from both layouts', () => {
    expect(entryIdFromStoredPath(`uploads/${ID}_report.pdf`)).toBe(ID);
    expect(entryIdFromStoredPath(`texts/${ID}.txt`)).toBe(ID);
  });

  it('should return null for names no entry produces', () => {
    expect(entryIdFromStoredPath('uploads/stray.bin')).toBeNull();
    expect(entryIdFromStoredPath(`texts/${ID}.md`)).toBeNull();
    expect(entryIdFromStoredPath(`other/${ID}_x`)).toBeNull();
  });
});

describe('createDiskStorage()', () => {
  let root: string;
  let storage: EntryServiceStorage;

  beforeEach(async () => {
    root = await createTempDir();
    storage = createDiskStorage(root);
    await storage.init();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('init()', () => {
    it('should create the directory layout', async () => {
      const dirs = await readdir(root);

      expect(dirs.sort()).toEqual(['.metadata', '.tmp', 'texts', 'uploads']);
      expect(metadataFilePath(root)).toBe(path.join(root, '.metadata', 'entries.json'));
    });

    it('should purge staged files left by a previous run', async () => {
      await writeFile(path.join(root, '.tmp', 'stale.part'), 'partial');

      await createDiskStorage(root).init();

      expect(await readdir(path.join(root, '.tmp'))).toEqual([]);
    });

    it('should fail with a ConfigError when the root is a file', async () => {
      const filePath = path.join(root, 'not-a-dir');
      await writeFile(filePath, 'x');

      await expect(createDiskStorage(filePath).init()).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('put()', () => {
    it('should store a stream and report its size', async () => {
      const stored = await storage.put(readableFrom('hello ', 'world'), 'file', 'a b.txt', ID);

      expect(stored).toEqual({ storedPath: `uploads/${ID}_a_b.txt`, sizeBytes: 11 });
      expect(await readFile(path.join(root, stored.storedPath), 'utf8')).toBe('hello world');
      expect(await readdir(path.join(root, '.tmp'))).toEqual([]);
    });

    it('should store a buffer as text', async () => {
      const stored = await storage.put(Buffer.from('snippet'), 'text', 'ignored', ID);

      expect(stored).toEqual({ storedPath: `texts/${ID}.txt`, sizeBytes: 7 });
    });

    it('should never overwrite an existing payload', async () => {
      await storage.put(Buffer.from('first'), 'text', '', ID);

      await expect(storage.put(Buffer.from('second'), 'text', '', ID)).rejects.toThrow(
        /Failed to commit payload/
      );
      expect(await readFile(path.join(root, 'texts', `${ID}.txt`), 'utf8')).toBe('first');
      expect(await readdir(path.join(root, '.tmp'))).toEqual([]);
    });

    it('should pass source errors through and leave no temp file', async () => {
      await expect(
        storage.put(failingReadable('partial'), 'file', 'x.bin', ID)
      ).rejects.toThrow('connection reset');

      expect(await readdir(path.join(root, '.tmp'))).toEqual([]);
      expect(await readdir(path.join(root, 'uploads'))).toEqual([]);
    });
  });

  describe('stage() / discard()', () => {
    it('should hold bytes out of sight until committed', async () => {
      const staged = await storage.stage(Buffer.from('abc'));

      expect(staged.sizeBytes).toBe(3);
      expect(await storage.listPayloads()).toEqual([]);

      await storage.discard(staged);
      expect(await readdir(path.join(root, '.tmp'))).toEqual([]);
    });
  });

  describe('open() / read() / exists()', () => {
    it('should stream a stored payload', async () => {
      const { storedPath } = await storage.put(Buffer.from('payload'), 'file', 'p.txt', ID);

      const handle = await storage.open(storedPath);

      expect(handle?.sizeBytes).toBe(7);
      expect(handle === null ? null : await text(handle.stream)).toBe('payload');
    });

    it('should keep serving an opened payload after it is deleted', async () => {
      const { storedPath } = await storage.put(Buffer.from('still here'), 'file', 'p.txt', ID);
      const handle = await storage.open(storedPath);

      await storage.delete(storedPath);

      expect(await storage.exists(storedPath)).toBe(false);
      expect(handle === null ? null : await text(handle.stream)).toBe('still here');
    });

    it('should report the size of a payload', async () => {
      const { storedPath } = await storage.put(Buffer.from('payload'), 'file', 'p.txt', ID);

      expect(await storage.size(storedPath)).toBe(7);
      expect(await storage.size(`uploads/${ID}_gone.txt`)).toBeNull();
    });

    it('should return null or false for absent payloads', async () => {
      expect(await storage.open(`uploads/${ID}_gone.txt`)).toBeNull();
      expect(await storage.read(`texts/${ID}.txt`)).toBeNull();
      expect(await storage.exists(`texts/${ID}.txt`)).toBe(false);
    });

    it('should refuse paths that leave the payload directories', async () => {
      await writeFile(path.join(root, 'outside.txt'), 'secret');
      await mkdir(path.join(root, 'uploads', 'nested'));

      expect(await storage.read('outside.txt')).toBeNull();
      expect(await storage.read('uploads/../outside.txt')).toBeNull();
      expect(await storage.read('../outside.txt')).toBeNull();
      expect(await storage.read('.metadata/entries.json')).toBeNull();
      expect(await storage.exists('uploads/nested')).toBe(false);
      expect(await storage.size('uploads/nested')).toBeNull();
      expect(await storage.open(path.join(root, 'outside.txt'))).toBeNull();
    });
  });

  describe('delete()', () => {
    it('should be idempotent', async () => {
      const { storedPath } = await storage.put(Buffer.from('x'), 'text', '', ID);

      await storage.delete(storedPath);
      await storage.delete(storedPath);

      expect(await storage.exists(storedPath)).toBe(false);
    });
  });

  describe('listPayloads() / usageBytes()', () => {
    it('should list payloads from both directories and sum their sizes', async () => {
      await storage.put(Buffer.from('12345'), 'file', 'five.bin', ID);
      await storage.put(Buffer.from('abc'), 'text', '', ID);

      expect(await storage.listPayloads()).toEqual([`texts/${ID}.txt`, `uploads/${ID}_five.bin`]);
      expect(await storage.usageBytes()).toBe(8);
    });
  });
});
