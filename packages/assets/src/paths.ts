/**
 * Asset path normalization shared by the cache, the registry and the
 * manifest. Keys are case-insensitive and always use forward slashes.
 */

import { extname } from 'node:path';

/** Normalize a relative asset path for display and file access. */
export function normalizeAssetPath(path: string): string {
  let normalized = path.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  return normalized;
}

/** Cache key for a path: normalized and lower-cased. */
export function assetKey(path: string): string {
  return normalizeAssetPath(path).toLowerCase();
}

/**
 * Normalize an extension to lowercase with a leading dot.
 * Returns '' for an empty or dot-only input.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed.length === 0 || trimmed === '.') return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/** Lower-cased extension of a path, including the dot ('' when there is none). */
export function extensionOf(path: string): string {
  return normalizeExtension(extname(normalizeAssetPath(path)));
}
