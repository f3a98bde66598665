import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { AssetManager } from '../asset-manager.js';
import { AssetParseError } from '../errors.js';
import {
  BinaryAssetType,
  BinaryLoader,
  JsonAssetType,
  JsonLoader,
  TextAssetType,
  TextLoader,
  registerBuiltinLoaders,
} from './index.js';

describe('built-in loaders', () => {
  let root: string;
  let manager: AssetManager;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'stockpile-loaders-'));
    manager = new AssetManager({ rootPath: root });
    registerBuiltinLoaders(manager);
  });

  afterEach(() => {
    manager.dispose();
    rmSync(root, { recursive: true, force: true });
  });

  it('registers every built-in extension', () => {
    expect([...manager.getSupportedExtensions()].sort()).toEqual([
      '.bin',
      '.csv',
      '.dat',
      '.json',
      '.md',
      '.txt',
    ]);
    expect(manager.getLoader(TextAssetType, 'MD')).toBeInstanceOf(TextLoader);
    expect(manager.getLoader(JsonAssetType)).toBeInstanceOf(JsonLoader);
    expect(manager.getLoader(BinaryAssetType, '.dat')).toBeInstanceOf(BinaryLoader);
  });

  describe('TextLoader', () => {
    it('decodes UTF-8 and sizes by byte length', () => {
      writeFileSync(join(root, 'greeting.txt'), 'héllo');
      const handle = manager.load(TextAssetType, 'greeting.txt');
      expect(handle.asset?.text).toBe('héllo');
      expect(manager.getAssetInfo('greeting.txt')?.sizeBytes).toBe(6);
    });

    it('drops a leading byte order mark', async () => {
      writeFileSync(join(root, 'notes.md'), Buffer.from([0xef, 0xbb, 0xbf, 0x23, 0x20, 0x41]));
      const handle = await manager.loadAsync(TextAssetType, 'notes.md');
      expect(handle.asset?.text).toBe('# A');
    });
  });

  describe('JsonLoader', () => {
    it('parses the document and sizes by source length', async () => {
      const source = '{"speed": 4, "tags": ["a"]}';
      writeFileSync(join(root, 'unit.json'), source);
      const handle = await manager.loadAsync(JsonAssetType, 'unit.json');
      expect(handle.asset?.data).toEqual({ speed: 4, tags: ['a'] });
      expect(handle.asset?.byteLength).toBe(source.length);
      expect(manager.getCacheStats().totalSizeBytes).toBe(source.length);
    });

    it('reports malformed JSON as a parse error', () => {
      writeFileSync(join(root, 'broken.json'), '{ "speed": ');
      let thrown: unknown;
      try {
        manager.load(JsonAssetType, 'broken.json');
      } catch (err) {
        thrown = err;
      }
      expect(thrown).toBeInstanceOf(AssetParseError);
      expect(thrown instanceof AssetParseError ? thrown.cause : undefined).toBeInstanceOf(SyntaxError);
    });
  });

  describe('BinaryLoader', () => {
    it('copies the file bytes', () => {
      writeFileSync(join(root, 'blob.bin'), Buffer.from([1, 2, 3, 4]));
      const handle = manager.load(BinaryAssetType, 'blob.bin');
      expect(Array.from(handle.asset?.bytes ?? [])).toEqual([1, 2, 3, 4]);
      expect(handle.asset?.bytes).toBeInstanceOf(Uint8Array);
      expect(manager.getAssetInfo('blob.bin')?.sizeBytes).toBe(4);
    });

    it('honours an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      const context = { path: 'blob.bin', manager };
      await expect(
        new BinaryLoader().loadAsync(new Uint8Array([1]), context, controller.signal),
      ).rejects.toBeDefined();
    });
  });
});
