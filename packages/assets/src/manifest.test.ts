import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InvalidDataError, isAssetError } from './errors.js';
import { AssetManifest, describeAsset, loadManifest, saveManifest } from './manifest.js';
import type { ManifestDocument } from './manifest.js';

const VALID_DOCUMENT: ManifestDocument = {
  version: 1,
  generated: '2025-01-01T00:00:00.000Z',
  assets: [
    { path: 'textures/Grass.png', type: 'Texture', size: 2048, hash: 'aaa111' },
    {
      path: 'materials/ground.json',
      type: 'JsonAsset',
      size: 120,
      dependencies: ['textures/Grass.png'],
    },
  ],
};

function expectInvalid(text: string, reason: string): void {
  let thrown: unknown;
  try {
    AssetManifest.parse(text, 'test.json');
  } catch (err) {
    thrown = err;
  }
  expect(thrown).toBeInstanceOf(InvalidDataError);
  expect(isAssetError(thrown, 'InvalidData')).toBe(true);
  expect(thrown instanceof InvalidDataError ? thrown.reason : undefined).toBe(reason);
}

describe('AssetManifest', () => {
  it('indexes entries from a parsed document', () => {
    const manifest = AssetManifest.parse(JSON.stringify(VALID_DOCUMENT));
    expect(manifest.version).toBe(1);
    expect(manifest.generated).toBe('2025-01-01T00:00:00.000Z');
    expect(manifest.size).toBe(2);
    expect(manifest.paths()).toEqual(['textures/Grass.png', 'materials/ground.json']);
  });

  it('looks up paths case-insensitively and across separators', () => {
    const manifest = AssetManifest.parse(JSON.stringify(VALID_DOCUMENT));
    expect(manifest.exists('TEXTURES/grass.PNG')).toBe(true);
    expect(manifest.exists('textures\\grass.png')).toBe(true);
    expect(manifest.getInfo('./textures/grass.png')).toEqual({
      path: 'textures/Grass.png',
      type: 'Texture',
      size: 2048,
      hash: 'aaa111',
    });
    expect(manifest.exists('textures/missing.png')).toBe(false);
    expect(manifest.getInfo('textures/missing.png')).toBeUndefined();
  });

  it('returns dependencies, or an empty list', () => {
    const manifest = AssetManifest.parse(JSON.stringify(VALID_DOCUMENT));
    expect(manifest.getDependencies('materials/ground.json')).toEqual(['textures/Grass.png']);
    expect(manifest.getDependencies('textures/Grass.png')).toEqual([]);
    expect(manifest.getDependencies('nope.json')).toEqual([]);
  });

  it('add replaces an entry with the same path', () => {
    const manifest = new AssetManifest();
    manifest.add({ path: 'a.txt', type: 'TextAsset', size: 1 });
    manifest.add({ path: 'A.TXT', type: 'TextAsset', size: 5 });
    expect(manifest.size).toBe(1);
    expect(manifest.getInfo('a.txt')?.size).toBe(5);
  });

  it('remove reports whether an entry existed', () => {
    const manifest = new AssetManifest();
    manifest.add({ path: 'a.txt', type: 'TextAsset', size: 1 });
    expect(manifest.remove('A.txt')).toBe(true);
    expect(manifest.remove('a.txt')).toBe(false);
    expect(manifest.size).toBe(0);
  });

  it('does not expose stored entries to mutation', () => {
    const manifest = AssetManifest.parse(JSON.stringify(VALID_DOCUMENT));
    const info = manifest.getInfo('materials/ground.json');
    info?.dependencies?.push('other.png');
    expect(manifest.getDependencies('materials/ground.json')).toEqual(['textures/Grass.png']);
  });

  it('serializes back to an equivalent document', () => {
    const manifest = AssetManifest.parse(JSON.stringify(VALID_DOCUMENT));
    const text = manifest.serialize();
    expect(text.endsWith('}\n')).toBe(true);
    expect(text).toContain('\n  "version": 1,');
    expect(JSON.parse(text)).toEqual(VALID_DOCUMENT);
  });

  it('defaults missing optional fields', () => {
    const manifest = AssetManifest.parse('{"assets":[{"path":"a.bin"}]}');
    expect(manifest.version).toBe(1);
    expect(manifest.generated).toBe('');
    expect(manifest.getInfo('a.bin')).toEqual({ path: 'a.bin', type: '', size: 0 });
  });

  it('accepts a document without assets', () => {
    expect(AssetManifest.parse('{"version":1}').size).toBe(0);
  });

  describe('parse rejects malformed documents', () => {
    it('invalid JSON', () => {
      expect(() => AssetManifest.parse('{ not json')).toThrow(InvalidDataError);
    });

    it('literal null', () => {
      expectInvalid('null', 'document is null');
    });

    it('a non-object document', () => {
      expectInvalid('[1, 2]', 'document must be an object');
      expectInvalid('"text"', 'document must be an object');
    });

    it('assets that are not an array', () => {
      expectInvalid('{"assets":{}}', '"assets" must be an array');
    });

    it('an entry without a path', () => {
      expectInvalid('{"assets":[{"type":"TextAsset","size":3}]}', 'assets[0] is missing "path"');
    });

    it('a fractional or negative size', () => {
      expectInvalid('{"assets":[{"path":"a.txt","size":1.5}]}', 'assets[0].size must be a non-negative integer');
      expectInvalid('{"assets":[{"path":"a.txt","size":-1}]}', 'assets[0].size must be a non-negative integer');
    });

    it('fields of the wrong type', () => {
      expectInvalid('{"version":"1"}', '"version" must be an integer');
      expectInvalid('{"assets":[{"path":"a.txt","size":"3"}]}', 'assets[0].size must be a non-negative integer');
      expectInvalid('{"assets":[{"path":"a.txt","type":7}]}', 'assets[0].type must be a string');
      expectInvalid(
        '{"assets":[{"path":"a.txt"},{"path":"b.txt","dependencies":[1]}]}',
        'assets[1].dependencies must be an array of strings',
      );
    });

    it('names the source in the message', () => {
      expect(() => AssetManifest.parse('null', 'assets/manifest.json')).toThrow(
        'Invalid data in assets/manifest.json: document is null',
      );
    });
  });
});

describe('manifest files', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'stockpile-manifest-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('saves and loads a manifest', async () => {
    const file = join(root, 'out', 'manifest.json');
    await saveManifest(file, AssetManifest.parse(JSON.stringify(VALID_DOCUMENT)));

    const loaded = await loadManifest(file);
    expect(loaded.toJSON()).toEqual(VALID_DOCUMENT);
  });

  it('loadManifest surfaces malformed files as InvalidDataError', async () => {
    const file = join(root, 'manifest.json');
    writeFileSync(file, 'null');
    await expect(loadManifest(file)).rejects.toBeInstanceOf(InvalidDataError);
  });

  it('describeAsset records size and SHA-256 hash', () => {
    mkdirSync(join(root, 'data'));
    writeFileSync(join(root, 'data', 'abc.bin'), 'abc');

    expect(describeAsset(root, 'data\\abc.bin', 'BinaryAsset', ['data\\other.bin'])).toEqual({
      path: 'data/abc.bin',
      type: 'BinaryAsset',
      size: 3,
      hash: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      dependencies: ['data/other.bin'],
    });
  });

  it('describeAsset omits empty dependency lists', () => {
    writeFileSync(join(root, 'empty.txt'), '');
    expect(describeAsset(root, 'empty.txt', 'TextAsset', [])).toEqual({
      path: 'empty.txt',
      type: 'TextAsset',
      size: 0,
      hash: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    });
  });
});
