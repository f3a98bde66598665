import { describe, it, expect } from 'vitest';

import {
  AssetError,
  AssetLoadCancelledError,
  AssetManagerDisposedError,
  AssetNotFoundError,
  AssetParseError,
  DirectoryNotFoundError,
  InvalidArgumentError,
  InvalidDataError,
  UnsupportedFormatError,
  isAssetError,
  toError,
} from './errors.js';

describe('asset errors', () => {
  it('carry a code and a readable message', () => {
    const cases: Array<[AssetError, string, string]> = [
      [new AssetNotFoundError('a.txt'), 'FileNotFound', 'Asset file not found: a.txt'],
      [
        new UnsupportedFormatError('a.xyz', 'Texture', '.xyz'),
        'UnsupportedFormat',
        'Cannot load "a.xyz" as Texture: no loader registered for ".xyz"',
      ],
      [
        new UnsupportedFormatError('README', 'TextAsset', ''),
        'UnsupportedFormat',
        'Cannot load "README" as TextAsset: no loader registered for "(none)"',
      ],
      [new InvalidDataError('manifest.json', 'document is null'), 'InvalidData', 'Invalid data in manifest.json: document is null'],
      [new InvalidArgumentError('path', 'expected a non-empty path'), 'InvalidArgument', 'Invalid argument "path": expected a non-empty path'],
      [new AssetManagerDisposedError('load'), 'Disposed', 'AssetManager is disposed (load)'],
      [new AssetLoadCancelledError('a.txt'), 'Cancelled', 'Load of "a.txt" was cancelled'],
      [new DirectoryNotFoundError('/tmp/none'), 'DirectoryNotFound', 'Directory not found: /tmp/none'],
    ];

    for (const [error, code, message] of cases) {
      expect(error).toBeInstanceOf(AssetError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
    }
  });

  it('parse errors keep the loader error as cause', () => {
    const cause = new SyntaxError('Unexpected end of JSON input');
    const error = new AssetParseError('unit.json', 'JsonAsset', cause);
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('ParseError');
    expect(error.message).toBe('Failed to load "unit.json" as JsonAsset: Unexpected end of JSON input');
    expect(error.name).toBe('AssetParseError');
  });

  it('isAssetError narrows by code', () => {
    const error: unknown = new AssetNotFoundError('a.txt');
    expect(isAssetError(error)).toBe(true);
    expect(isAssetError(error, 'FileNotFound')).toBe(true);
    expect(isAssetError(error, 'ParseError')).toBe(false);
    expect(isAssetError(new Error('plain'))).toBe(false);
    expect(isAssetError('FileNotFound')).toBe(false);
  });

  it('toError wraps non-errors', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});
