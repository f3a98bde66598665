/**
 * @stockpile/assets: runtime asset loading, reference-counted caching,
 * background streaming and hot reload.
 */

export { defineAssetType } from './asset-type.js';
export type { AssetType } from './asset-type.js';

export {
  CachePolicy,
  LoadPriority,
  DEFAULT_ROOT_PATH,
  DEFAULT_MAX_CACHE_BYTES,
  DEFAULT_MAX_CONCURRENT_LOADS,
  DEFAULT_HOT_RELOAD_DEBOUNCE_MS,
  defaultAssetsConfig,
  developmentAssetsConfig,
  isDisposableAsset,
} from './types.js';
export type {
  AssetInfo,
  AssetLoadContext,
  AssetLoader,
  AssetsConfig,
  CacheStats,
  DisposableAsset,
  LoadErrorCallback,
} from './types.js';

export {
  AssetError,
  AssetNotFoundError,
  UnsupportedFormatError,
  AssetParseError,
  InvalidDataError,
  InvalidArgumentError,
  AssetManagerDisposedError,
  AssetLoadCancelledError,
  DirectoryNotFoundError,
  isAssetError,
} from './errors.js';
export type { AssetErrorCode } from './errors.js';

export { normalizeAssetPath, normalizeExtension, extensionOf } from './paths.js';
export { LoaderRegistry } from './loader-registry.js';
export type { ErasedLoadResult, ErasedLoader, LoadDelegate } from './loader-registry.js';
export { AssetHandle } from './asset-handle.js';
export { AssetManager } from './asset-manager.js';
export type { AssetManagerEvents, LoadAsyncOptions } from './asset-manager.js';
export { StreamingManager, DEFAULT_STREAMING_CONCURRENCY } from './streaming-manager.js';
export type { StreamingError, StreamingManagerEvents } from './streaming-manager.js';
export { ReloadManager, watchDirectoryTree } from './reload-manager.js';
export type {
  FileChangeListener,
  FileWatcherHandle,
  ReloadManagerEvents,
  ReloadManagerOptions,
  WatchFactory,
} from './reload-manager.js';

export { sha256Hex } from './hash.js';
export {
  AssetManifest,
  MANIFEST_VERSION,
  describeAsset,
  loadManifest,
  saveManifest,
} from './manifest.js';
export type { ManifestAssetInfo, ManifestDocument } from './manifest.js';

export * from './loaders/index.js';
