/**
 * Optional persisted JSON index of known assets: sizes, hashes and
 * dependencies.
 */

import { readFileSync, statSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { InvalidDataError } from './errors.js';
import { sha256Hex } from './hash.js';
import { assetKey, normalizeAssetPath } from './paths.js';

export const MANIFEST_VERSION = 1;

export interface ManifestAssetInfo {
  /** Path relative to the asset root. */
  path: string;
  /** Asset type name. */
  type: string;
  /** File size in bytes. */
  size: number;
  /** SHA-256 hex digest of the file. */
  hash?: string;
  /** Paths of assets this one references. */
  dependencies?: string[];
}

export interface ManifestDocument {
  version: number;
  /** ISO timestamp of generation. */
  generated: string;
  assets: ManifestAssetInfo[];
}

/**
 * Indexed manifest. Lookups are case-insensitive; entries keep the order
 * they were added in.
 */
export class AssetManifest {
  private readonly entries = new Map<string, ManifestAssetInfo>();

  constructor(
    public version: number = MANIFEST_VERSION,
    public generated: string = new Date().toISOString(),
    assets: Iterable<ManifestAssetInfo> = [],
  ) {
    for (const asset of assets) {
      this.add(asset);
    }
  }

  /** Number of assets. */
  get size(): number {
    return this.entries.size;
  }

  /** Add an asset, replacing any entry with the same path. */
  add(info: ManifestAssetInfo): void {
    this.entries.set(assetKey(info.path), cloneInfo(info));
  }

  remove(path: string): boolean {
    return this.entries.delete(assetKey(path));
  }

  exists(path: string): boolean {
    return this.entries.has(assetKey(path));
  }

  getInfo(path: string): ManifestAssetInfo | undefined {
    const info = this.entries.get(assetKey(path));
    return info ? cloneInfo(info) : undefined;
  }

  getDependencies(path: string): string[] {
    return [...(this.entries.get(assetKey(path))?.dependencies ?? [])];
  }

  /** Paths of every asset, in insertion order. */
  paths(): string[] {
    return [...this.entries.values()].map((info) => info.path);
  }

  toJSON(): ManifestDocument {
    return {
      version: this.version,
      generated: this.generated,
      assets: [...this.entries.values()].map(cloneInfo),
    };
  }

  /** Serialize to 2-space indented JSON with a trailing newline. */
  serialize(): string {
    return JSON.stringify(this.toJSON(), null, 2) + '\n';
  }

  /**
   * Parse a manifest document.
   * Throws InvalidDataError when the text is not valid JSON, is null or is
   * not shaped like a manifest.
   */
  static parse(text: string, source = 'manifest'): AssetManifest {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new InvalidDataError(source, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    if (parsed === null) {
      throw new InvalidDataError(source, 'document is null');
    }
    if (!isRecord(parsed)) {
      throw new InvalidDataError(source, 'document must be an object');
    }

    const version = parsed.version ?? MANIFEST_VERSION;
    if (typeof version !== 'number' || !Number.isInteger(version)) {
      throw new InvalidDataError(source, '"version" must be an integer');
    }
    const generated = parsed.generated ?? '';
    if (typeof generated !== 'string') {
      throw new InvalidDataError(source, '"generated" must be a timestamp string');
    }
    const rawAssets = parsed.assets ?? [];
    if (!Array.isArray(rawAssets)) {
      throw new InvalidDataError(source, '"assets" must be an array');
    }

    const assets = rawAssets.map((raw: unknown, index) => parseAssetInfo(raw, index, source));
    return new AssetManifest(version, generated, assets);
  }
}

function parseAssetInfo(raw: unknown, index: number, source: string): ManifestAssetInfo {
  const where = `assets[${index}]`;
  if (!isRecord(raw)) {
    throw new InvalidDataError(source, `${where} must be an object`);
  }

  const { path, type, size, hash, dependencies } = raw;
  if (path === undefined || path === null) {
    throw new InvalidDataError(source, `${where} is missing "path"`);
  }
  if (typeof path !== 'string' || path.length === 0) {
    throw new InvalidDataError(source, `${where}.path must be a non-empty string`);
  }
  if (type !== undefined && typeof type !== 'string') {
    throw new InvalidDataError(source, `${where}.type must be a string`);
  }
  if (size !== undefined && (typeof size !== 'number' || !Number.isInteger(size) || size < 0)) {
    throw new InvalidDataError(source, `${where}.size must be a non-negative integer`);
  }
  if (hash !== undefined && typeof hash !== 'string') {
    throw new InvalidDataError(source, `${where}.hash must be a string`);
  }
  if (
    dependencies !== undefined &&
    (!Array.isArray(dependencies) || !dependencies.every((dep): dep is string => typeof dep === 'string'))
  ) {
    throw new InvalidDataError(source, `${where}.dependencies must be an array of strings`);
  }

  const info: ManifestAssetInfo = {
    path,
    type: type ?? '',
    size: size ?? 0,
  };
  if (hash !== undefined) info.hash = hash;
  if (dependencies !== undefined) info.dependencies = [...dependencies];
  return info;
}

/** Describe one file under rootPath: its size and SHA-256 hash. */
export function describeAsset(
  rootPath: string,
  path: string,
  type: string,
  dependencies?: readonly string[],
): ManifestAssetInfo {
  const normalized = normalizeAssetPath(path);
  const fullPath = resolve(rootPath, normalized);
  const stats = statSync(fullPath);
  const info: ManifestAssetInfo = {
    path: normalized,
    type,
    size: stats.size,
    hash: sha256Hex(readFileSync(fullPath)),
  };
  if (dependencies && dependencies.length > 0) {
    info.dependencies = dependencies.map(normalizeAssetPath);
  }
  return info;
}

export async function saveManifest(filePath: string, manifest: AssetManifest): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, manifest.serialize(), 'utf8');
}

/** Read and parse a manifest file. Missing files surface as the fs error. */
export async function loadManifest(filePath: string): Promise<AssetManifest> {
  const text = await readFile(filePath, 'utf8');
  return AssetManifest.parse(text, filePath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneInfo(info: ManifestAssetInfo): ManifestAssetInfo {
  const copy: ManifestAssetInfo = { path: info.path, type: info.type, size: info.size };
  if (info.hash !== undefined) copy.hash = info.hash;
  if (info.dependencies !== undefined) copy.dependencies = [...info.dependencies];
  return copy;
}
