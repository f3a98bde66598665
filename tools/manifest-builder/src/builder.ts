/**
 * Directory scanning for the manifest builder.
 */

import { readdirSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';

import {
  AssetManifest,
  InvalidArgumentError,
  describeAsset,
  extensionOf,
  normalizeAssetPath,
  normalizeExtension,
} from '@stockpile/assets';

/** Type names for the extensions the built-in loaders claim. */
export const DEFAULT_TYPE_NAMES: ReadonlyMap<string, string> = new Map([
  ['.txt', 'TextAsset'],
  ['.md', 'TextAsset'],
  ['.csv', 'TextAsset'],
  ['.json', 'JsonAsset'],
  ['.bin', 'BinaryAsset'],
  ['.dat', 'BinaryAsset'],
]);

export const UNKNOWN_TYPE_NAME = 'Unknown';

export interface BuildManifestOptions {
  /** Extension → type name, merged over DEFAULT_TYPE_NAMES. */
  typeNames?: ReadonlyMap<string, string>;
  /** Absolute file paths to leave out (e.g. the output file itself). */
  exclude?: readonly string[];
  /** Timestamp to record. Default: now. */
  generated?: string;
}

/** Parse an `ext=TypeName` override. */
export function parseTypeOverride(value: string): [string, string] {
  const separator = value.indexOf('=');
  const extension = normalizeExtension(separator === -1 ? '' : value.slice(0, separator));
  const typeName = separator === -1 ? '' : value.slice(separator + 1).trim();
  if (extension.length === 0 || typeName.length === 0) {
    throw new InvalidArgumentError('--type', `expected ext=TypeName, got "${value}"`);
  }
  return [extension, typeName];
}

/** Every file below rootDir as a normalized relative path, sorted. */
export function listAssetFiles(rootDir: string): string[] {
  const root = resolve(rootDir);
  const files: string[] = [];

  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile()) {
        files.push(normalizeAssetPath(relative(root, fullPath)));
      }
    }
  };

  walk(root);
  return files.sort();
}

export function buildManifest(rootDir: string, options: BuildManifestOptions = {}): AssetManifest {
  const root = resolve(rootDir);
  const typeNames = new Map(DEFAULT_TYPE_NAMES);
  for (const [extension, typeName] of options.typeNames ?? []) {
    typeNames.set(normalizeExtension(extension), typeName);
  }
  const excluded = new Set((options.exclude ?? []).map((path) => resolve(path)));

  const manifest = new AssetManifest(undefined, options.generated);
  for (const path of listAssetFiles(root)) {
    if (excluded.has(resolve(root, path))) continue;
    const typeName = typeNames.get(extensionOf(path)) ?? UNKNOWN_TYPE_NAME;
    manifest.add(describeAsset(root, path, typeName));
  }
  return manifest;
}
