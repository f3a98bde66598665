/**
 * Asset system types: configuration, priorities, statistics and the
 * loader contract.
 */

import type { AssetType } from './asset-type.js';
import type { AssetManager } from './asset-manager.js';

/** Scheduling hint. Lower values are served first when loads queue up. */
export enum LoadPriority {
  Immediate = 0,
  High = 1,
  Normal = 2,
  Low = 3,
  Streaming = 4,
}

/** What happens to cached assets once nothing references them. */
export enum CachePolicy {
  /** Keep unreferenced assets until the cache is trimmed, oldest first. */
  LRU = 'lru',
  /** Keep everything until it is unloaded explicitly. */
  Manual = 'manual',
  /** Dispose an asset as soon as its last handle is released. */
  Aggressive = 'aggressive',
}

export type LoadErrorCallback = (path: string, error: Error) => void;

/** Configuration for the AssetManager. */
export interface AssetsConfig {
  /** Directory that asset paths are resolved against. Default: 'Assets'. */
  rootPath: string;
  /** Eviction policy. Default: LRU. */
  cachePolicy: CachePolicy;
  /** Byte budget enforced under LRU. Default: 512 MiB. */
  maxCacheBytes: number;
  /** Maximum number of loader invocations running at once. Default: 4. */
  maxConcurrentLoads: number;
  /** Watch rootPath and reload changed assets. Default: false. */
  enableHotReload: boolean;
  /** Quiet period before a changed file is reloaded. Default: 100 ms. */
  hotReloadDebounceMs: number;
  /** Priority used when a caller does not pass one. Default: Normal. */
  defaultPriority: LoadPriority;
  /** Reports every failed load, including failed reloads. */
  onLoadError?: LoadErrorCallback;
  /** Read-only services handed to loaders through their context. */
  services?: ReadonlyMap<string, unknown>;
}

export const DEFAULT_ROOT_PATH = 'Assets';
export const DEFAULT_MAX_CACHE_BYTES = 512 * 1024 * 1024;
export const DEFAULT_MAX_CONCURRENT_LOADS = 4;
export const DEFAULT_HOT_RELOAD_DEBOUNCE_MS = 100;

/** Production defaults. */
export function defaultAssetsConfig(): Readonly<AssetsConfig> {
  return Object.freeze({
    rootPath: DEFAULT_ROOT_PATH,
    cachePolicy: CachePolicy.LRU,
    maxCacheBytes: DEFAULT_MAX_CACHE_BYTES,
    maxConcurrentLoads: DEFAULT_MAX_CONCURRENT_LOADS,
    enableHotReload: false,
    hotReloadDebounceMs: DEFAULT_HOT_RELOAD_DEBOUNCE_MS,
    defaultPriority: LoadPriority.Normal,
  });
}

/** Defaults with hot reload on and assets freed as soon as they are unused. */
export function developmentAssetsConfig(): Readonly<AssetsConfig> {
  return Object.freeze({
    ...defaultAssetsConfig(),
    enableHotReload: true,
    cachePolicy: CachePolicy.Aggressive,
  });
}

/** Passed to every loader call. */
export interface AssetLoadContext {
  /** Normalized asset path, relative to the root. */
  readonly path: string;
  /** The manager performing the load, for dependency loads. */
  readonly manager: AssetManager;
  readonly services?: ReadonlyMap<string, unknown>;
}

/** Decodes one asset type from the bytes of a file. */
export interface AssetLoader<T> {
  readonly type: AssetType<T>;
  /** Claimed extensions, e.g. ['.png', '.jpg']. */
  readonly extensions: readonly string[];
  load(data: Uint8Array, context: AssetLoadContext): T;
  loadAsync(data: Uint8Array, context: AssetLoadContext, signal?: AbortSignal): Promise<T>;
  /** Approximate in-memory footprint, in bytes. */
  estimateSize(asset: T): number;
}

/** Snapshot of cache counters. */
export interface CacheStats {
  readonly totalAssets: number;
  readonly loadedAssets: number;
  readonly pendingAssets: number;
  readonly failedAssets: number;
  readonly totalSizeBytes: number;
  readonly maxSizeBytes: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
  readonly hitRatio: number;
  readonly utilizationRatio: number;
}

/** Read-only view of one cached asset. */
export interface AssetInfo {
  readonly path: string;
  readonly typeName: string;
  readonly sizeBytes: number;
  readonly refCount: number;
  readonly dependencies: readonly string[];
}

/** Values with a dispose() method are disposed when evicted or replaced. */
export interface DisposableAsset {
  dispose(): void;
}

export function isDisposableAsset(value: unknown): value is DisposableAsset {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}
