/**
 * Central runtime asset cache.
 *
 * Implements the Subsystem interface from @stockpile/core. Orchestrates:
 *  - Loader lookup through the LoaderRegistry
 *  - Reference-counted cache entries with LRU / manual / aggressive eviction
 *  - In-flight request deduplication (one loader call per path at a time)
 *  - A priority-ordered cap on concurrent loader invocations
 *  - In-place reloads for hot reload
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { EventBus, createLogger } from '@stockpile/core';
import type { Subsystem } from '@stockpile/core';

import type { AssetType } from './asset-type.js';
import { AssetHandle } from './asset-handle.js';
import type { AssetHandleOwner } from './asset-handle.js';
import { AssetCache, disposeAssetValue } from './cache.js';
import type { CacheEntry } from './cache.js';
import {
  AssetError,
  AssetLoadCancelledError,
  AssetManagerDisposedError,
  AssetNotFoundError,
  AssetParseError,
  InvalidArgumentError,
  UnsupportedFormatError,
  isAssetError,
  toError,
} from './errors.js';
import { LoaderRegistry } from './loader-registry.js';
import type { ErasedLoadResult, ErasedLoader } from './loader-registry.js';
import { LoadSemaphore } from './load-semaphore.js';
import { assetKey, extensionOf, normalizeAssetPath } from './paths.js';
import { ReloadManager } from './reload-manager.js';
import { LoadPriority, defaultAssetsConfig } from './types.js';
import type {
  AssetInfo,
  AssetLoadContext,
  AssetLoader,
  AssetsConfig,
  CacheStats,
} from './types.js';

const log = createLogger('AssetManager');

export interface LoadAsyncOptions {
  /** Position in the queue for a load slot. Default: config.defaultPriority. */
  priority?: LoadPriority;
  /** Cancels this caller's wait. */
  signal?: AbortSignal;
}

export interface AssetManagerEvents {
  /** A cached asset's value was replaced by reloadAsync(). Payload: path. */
  assetReloaded: string;
}

interface ResolvedPath {
  readonly key: string;
  readonly path: string;
  readonly fullPath: string;
}

interface FlightWaiter {
  resolve(entry: CacheEntry): void;
  reject(error: Error): void;
}

/** One shared loader invocation for a path. */
interface LoadFlight {
  readonly target: ResolvedPath;
  readonly type: AssetType<unknown>;
  readonly priority: LoadPriority;
  readonly controller: AbortController;
  readonly waiters: Set<FlightWaiter>;
  /** Settles (never rejects) once the flight is finished. */
  done: Promise<void>;
}

const REPORTED_CODES = new Set(['FileNotFound', 'UnsupportedFormat', 'ParseError']);

export class AssetManager implements Subsystem, AssetHandleOwner {
  readonly name = 'AssetManager';

  private readonly config: AssetsConfig;
  private readonly loaders = new LoaderRegistry();
  private readonly cache: AssetCache;
  private readonly semaphore: LoadSemaphore;
  private readonly events = new EventBus<AssetManagerEvents>();

  /** In-flight deduplication: key → shared load. */
  private readonly inflight = new Map<string, LoadFlight>();
  /** Flights every caller left whose loader has not returned yet. */
  private readonly abandoned = new Map<string, LoadFlight>();
  private readonly reported = new WeakSet<Error>();
  private reloadManager: ReloadManager | null = null;
  private disposed = false;

  constructor(config: Partial<AssetsConfig> = {}) {
    this.config = { ...defaultAssetsConfig(), ...config };

    const { maxConcurrentLoads, maxCacheBytes } = this.config;
    if (!Number.isInteger(maxConcurrentLoads) || maxConcurrentLoads < 1) {
      throw new InvalidArgumentError('maxConcurrentLoads', `expected an integer >= 1, got ${maxConcurrentLoads}`);
    }
    if (!Number.isFinite(maxCacheBytes) || maxCacheBytes < 0) {
      throw new InvalidArgumentError('maxCacheBytes', `expected a finite number >= 0, got ${maxCacheBytes}`);
    }

    this.cache = new AssetCache(this.config.cachePolicy, maxCacheBytes);
    this.semaphore = new LoadSemaphore(maxConcurrentLoads);
  }

  // ===========================================================================
  // Subsystem lifecycle
  // ===========================================================================

  init(): void {
    this.assertUsable('init');
    if (!this.config.enableHotReload || this.reloadManager) return;

    const root = resolve(this.config.rootPath);
    if (!existsSync(root)) {
      log.warn(`hot reload disabled, root "${root}" does not exist`);
      return;
    }
    this.reloadManager = new ReloadManager(this, {
      rootPath: root,
      debounceMs: this.config.hotReloadDebounceMs,
    });
  }

  update(_dt: number): void {
    if (this.disposed) return;
    this.cache.enforceBudget();
  }

  reset(): void {
    if (this.disposed) return;
    this.cache.clear();
  }

  /**
   * Tear down without waiting. In-flight loads are aborted and their callers
   * rejected; values they still produce are disposed on arrival.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.reloadManager?.dispose();
    this.reloadManager = null;

    for (const flight of this.inflight.values()) {
      const error = new AssetManagerDisposedError(`load of "${flight.target.path}"`);
      const waiters = [...flight.waiters];
      flight.waiters.clear();
      for (const waiter of waiters) {
        waiter.reject(error);
      }
      flight.controller.abort(error);
    }
    this.inflight.clear();
    this.abandoned.clear();

    this.cache.clear();
    this.events.removeAllListeners();
  }

  /** Tear down and wait for every aborted load to settle. */
  async disposeAsync(): Promise<void> {
    const pending = [...this.inflight.values(), ...this.abandoned.values()].map((flight) => flight.done);
    this.dispose();
    await Promise.allSettled(pending);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  get rootPath(): string {
    return this.config.rootPath;
  }

  get cachePolicy(): AssetsConfig['cachePolicy'] {
    return this.config.cachePolicy;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** The hot reload watcher started by init(), if any. */
  get hotReload(): ReloadManager | null {
    return this.reloadManager;
  }

  on<K extends keyof AssetManagerEvents>(
    event: K,
    listener: (data: AssetManagerEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  registerLoader<T>(loader: AssetLoader<T>): void {
    this.assertUsable('registerLoader');
    if (!loader) {
      throw new InvalidArgumentError('loader', 'a loader is required');
    }
    if (loader.extensions.length === 0) {
      throw new InvalidArgumentError('loader', `loader for ${loader.type.name} declares no extensions`);
    }
    this.loaders.register(loader);
  }

  getLoader<T>(type: AssetType<T>, extension?: string): AssetLoader<T> | undefined {
    return this.loaders.getLoader(type, extension);
  }

  hasLoader(extension: string): boolean {
    return this.loaders.hasLoader(extension);
  }

  getSupportedExtensions(): ReadonlySet<string> {
    return this.loaders.getSupportedExtensions();
  }

  /**
   * Load an asset synchronously. Blocks on file I/O and does not take a
   * concurrency slot.
   */
  load<T>(type: AssetType<T>, path: string): AssetHandle<T> {
    this.assertUsable('load');
    const target = this.resolvePath(path);

    try {
      const cached = this.cache.get(target.key);
      if (cached) {
        return this.hit(cached, type, target);
      }

      if (!isFileSync(target.fullPath)) {
        throw new AssetNotFoundError(target.path);
      }
      const loader = this.requireLoader(type, target);

      this.cache.misses += 1;
      log.debug('cache miss', target.path);

      let result: ErasedLoadResult;
      try {
        result = loader.loadErased(readFileSync(target.fullPath), this.createContext(target));
      } catch (err) {
        this.cache.failures += 1;
        throw new AssetParseError(target.path, type.name, err);
      }

      // A loader may have pulled the same path in through a dependency load.
      const existing = this.cache.get(target.key);
      if (existing) {
        disposeAssetValue(target.path, result.value);
        return this.hit(existing, type, target);
      }

      const entry = this.cache.insert({
        key: target.key,
        path: target.path,
        type,
        value: result.value,
        sizeBytes: result.sizeBytes,
        refCount: 1,
      });
      this.cache.enforceBudget();
      return new AssetHandle(entry.id, entry.path, type, this);
    } catch (err) {
      throw this.fail(target, err);
    }
  }

  /**
   * Load an asset without blocking. Concurrent calls for the same path share
   * one loader invocation and observe the same result.
   */
  async loadAsync<T>(
    type: AssetType<T>,
    path: string,
    options: LoadAsyncOptions = {},
  ): Promise<AssetHandle<T>> {
    this.assertUsable('loadAsync');
    const target = this.resolvePath(path);
    const { signal } = options;

    try {
      if (signal?.aborted) {
        throw new AssetLoadCancelledError(target.path);
      }

      const cached = this.cache.get(target.key);
      if (cached) {
        return this.hit(cached, type, target);
      }

      let flight = this.inflight.get(target.key);
      if (flight) {
        if (flight.type !== type) {
          throw this.typeMismatch(target, type, flight.type);
        }
        this.cache.hits += 1;
      } else {
        flight = this.startFlight(type, target, options.priority ?? this.config.defaultPriority);
      }

      const entry = await this.joinFlight(flight, signal);
      return new AssetHandle(entry.id, entry.path, type, this);
    } catch (err) {
      throw this.fail(target, err);
    }
  }

  /** load(), additionally recording that parentPath depends on the asset. */
  loadDependency<T>(type: AssetType<T>, parentPath: string, dependencyPath: string): AssetHandle<T> {
    const parent = this.resolvePath(parentPath);
    const handle = this.load(type, dependencyPath);
    this.cache.addDependency(parent.key, handle.path);
    return handle;
  }

  /** loadAsync(), additionally recording that parentPath depends on the asset. */
  async loadDependencyAsync<T>(
    type: AssetType<T>,
    parentPath: string,
    dependencyPath: string,
    options: LoadAsyncOptions = {},
  ): Promise<AssetHandle<T>> {
    const parent = this.resolvePath(parentPath);
    const handle = await this.loadAsync(type, dependencyPath, options);
    this.cache.addDependency(parent.key, handle.path);
    return handle;
  }

  /** Whether the path has a loaded cache entry. */
  isLoaded(path: string): boolean {
    this.assertUsable('isLoaded');
    if (typeof path !== 'string' || path.trim().length === 0) return false;
    return this.cache.get(assetKey(path)) !== undefined;
  }

  /** Whether a load for the path is in flight. */
  isLoading(path: string): boolean {
    this.assertUsable('isLoading');
    if (typeof path !== 'string' || path.trim().length === 0) return false;
    return this.inflight.has(assetKey(path));
  }

  /** Remove and dispose an asset regardless of references. No-op if absent. */
  unload(path: string): void {
    this.assertUsable('unload');
    if (typeof path !== 'string' || path.trim().length === 0) return;
    this.cache.evict(assetKey(path));
  }

  unloadAll(): void {
    this.assertUsable('unloadAll');
    this.cache.clear();
  }

  /**
   * Evict unreferenced assets until the cache holds at most targetBytes.
   * Has no effect under the manual policy. Returns the number evicted.
   */
  trimCache(targetBytes: number): number {
    if (this.disposed) return 0;
    const target = Number.isFinite(targetBytes) ? Math.max(0, targetBytes) : 0;
    return this.cache.trimToSize(target);
  }

  getCacheStats(): CacheStats {
    this.assertUsable('getCacheStats');
    const loadedAssets = this.cache.size;
    const pendingAssets = this.inflight.size;
    const totalSizeBytes = this.cache.totalSizeBytes;
    const maxSizeBytes = this.cache.maxSizeBytes;
    const { hits, misses } = this.cache;
    const lookups = hits + misses;

    return Object.freeze({
      totalAssets: loadedAssets + pendingAssets,
      loadedAssets,
      pendingAssets,
      failedAssets: this.cache.failures,
      totalSizeBytes,
      maxSizeBytes,
      cacheHits: hits,
      cacheMisses: misses,
      hitRatio: lookups === 0 ? 0 : hits / lookups,
      utilizationRatio: maxSizeBytes === 0 || totalSizeBytes === 0 ? 0 : totalSizeBytes / maxSizeBytes,
    });
  }

  getAssetInfo(path: string): AssetInfo | undefined {
    this.assertUsable('getAssetInfo');
    const entry = this.cache.get(assetKey(path));
    if (!entry) return undefined;
    return {
      path: entry.path,
      typeName: entry.type.name,
      sizeBytes: entry.sizeBytes,
      refCount: entry.refCount,
      dependencies: this.cache.getDependencies(entry.key),
    };
  }

  /** Paths recorded as loaded on behalf of parentPath. */
  getDependencies(parentPath: string): string[] {
    this.assertUsable('getDependencies');
    return this.cache.getDependencies(assetKey(parentPath));
  }

  /** Paths of every loaded asset. */
  getLoadedPaths(): string[] {
    this.assertUsable('getLoadedPaths');
    return this.cache.keys().flatMap((key) => {
      const entry = this.cache.get(key);
      return entry ? [entry.path] : [];
    });
  }

  /**
   * Re-run the loader for a loaded asset and swap the value in place.
   * Handles keep working and see the new value. Failures keep the old value
   * and are reported through onLoadError only.
   */
  async reloadAsync(path: string): Promise<void> {
    this.assertUsable('reloadAsync');
    const target = this.resolvePath(path);

    const entry = this.cache.get(target.key);
    if (!entry) return;

    const loader = this.loaders.getErasedLoader(entry.type, extensionOf(target.path));
    if (!loader) {
      this.reportLoadError(
        target.path,
        new UnsupportedFormatError(target.path, entry.type.name, extensionOf(target.path)),
      );
      return;
    }

    let result: ErasedLoadResult;
    const release = await this.semaphore.acquire(LoadPriority.High);
    try {
      const data = await this.readAssetFile(target);
      try {
        result = await loader.loadErasedAsync(data, this.createContext(target));
      } catch (err) {
        throw new AssetParseError(target.path, entry.type.name, err);
      }
    } catch (err) {
      const error = toError(err);
      log.warn(`reload of "${target.path}" failed, keeping previous value:`, error.message);
      this.reportLoadError(target.path, error);
      return;
    } finally {
      release();
    }

    // The entry may have been unloaded or replaced while the loader ran.
    if (this.disposed || this.cache.get(target.key) !== entry) {
      disposeAssetValue(target.path, result.value);
      return;
    }

    this.cache.replaceValue(entry, result.value, result.sizeBytes);
    log.debug('reloaded', entry.path);
    this.events.emit('assetReloaded', entry.path);
    this.cache.enforceBudget();
  }

  // ===========================================================================
  // AssetHandleOwner
  // ===========================================================================

  readAsset<T>(id: number, type: AssetType<T>): T | undefined {
    const entry = this.cache.getById(id);
    if (!entry || entry.type !== type) return undefined;
    // Entries are only created under the token their loader produced.
    return entry.value as T;
  }

  hasEntry(id: number): boolean {
    return this.cache.getById(id) !== undefined;
  }

  refCountOf(id: number): number {
    return this.cache.getById(id)?.refCount ?? 0;
  }

  acquireEntry<T>(id: number, type: AssetType<T>): AssetHandle<T> {
    this.assertUsable('acquire');
    const entry = this.cache.getById(id);
    if (!entry) {
      throw new InvalidArgumentError('handle', 'the asset is no longer loaded');
    }
    this.cache.addRef(entry);
    return new AssetHandle(entry.id, entry.path, type, this);
  }

  releaseEntry(id: number): void {
    if (this.disposed) return;
    const entry = this.cache.getById(id);
    if (!entry) return;
    if (this.cache.release(entry)) {
      log.debug('released last reference, evicted', entry.path);
    }
  }

  // ===========================================================================
  // Core loading logic
  // ===========================================================================

  private hit<T>(entry: CacheEntry, type: AssetType<T>, target: ResolvedPath): AssetHandle<T> {
    if (entry.type !== type) {
      throw this.typeMismatch(target, type, entry.type);
    }
    this.cache.hits += 1;
    this.cache.addRef(entry);
    log.debug('cache hit', entry.path);
    return new AssetHandle(entry.id, entry.path, type, this);
  }

  private startFlight(type: AssetType<unknown>, target: ResolvedPath, priority: LoadPriority): LoadFlight {
    this.cache.misses += 1;
    log.debug('cache miss', target.path);

    const flight: LoadFlight = {
      target,
      type,
      priority,
      controller: new AbortController(),
      waiters: new Set(),
      done: Promise.resolve(),
    };
    this.inflight.set(target.key, flight);
    flight.done = this.runFlight(flight, this.abandoned.get(target.key));
    return flight;
  }

  /**
   * Run one flight. An abandoned flight for the same path may still be inside
   * its loader; wait for it, and take its value when the cache kept it.
   */
  private async runFlight(flight: LoadFlight, previous?: LoadFlight): Promise<void> {
    try {
      if (previous) {
        await previous.done;
        flight.controller.signal.throwIfAborted();
        const settled = this.cache.get(flight.target.key);
        if (settled) {
          this.handOut(flight, settled);
          return;
        }
      }
      const result = await this.executeFlight(flight);
      this.completeFlight(flight, result);
    } catch (err) {
      this.failFlight(flight, err);
    } finally {
      if (this.inflight.get(flight.target.key) === flight) {
        this.inflight.delete(flight.target.key);
      }
      if (this.abandoned.get(flight.target.key) === flight) {
        this.abandoned.delete(flight.target.key);
      }
    }
  }

  private async executeFlight(flight: LoadFlight): Promise<ErasedLoadResult> {
    const { target, type, controller } = flight;
    const signal = controller.signal;

    await this.assertFileExists(target);
    const loader = this.requireLoader(type, target);

    const release = await this.semaphore.acquire(flight.priority, signal);
    try {
      signal.throwIfAborted();
      const data = await this.readAssetFile(target, signal);
      signal.throwIfAborted();
      try {
        return await loader.loadErasedAsync(data, this.createContext(target), signal);
      } catch (err) {
        signal.throwIfAborted();
        throw new AssetParseError(target.path, type.name, err);
      }
    } finally {
      release();
    }
  }

  private completeFlight(flight: LoadFlight, result: ErasedLoadResult): void {
    const { target, type } = flight;

    if (this.disposed) {
      disposeAssetValue(target.path, result.value);
      return;
    }

    let entry = this.cache.get(target.key);
    if (entry) {
      // A synchronous load finished first; hand out that entry instead.
      disposeAssetValue(target.path, result.value);
    } else {
      entry = this.cache.insert({
        key: target.key,
        path: target.path,
        type,
        value: result.value,
        sizeBytes: result.sizeBytes,
        refCount: 0,
      });
    }
    this.handOut(flight, entry);
  }

  private handOut(flight: LoadFlight, entry: CacheEntry): void {
    if (entry.type !== flight.type) {
      this.rejectWaiters(flight, this.typeMismatch(flight.target, flight.type, entry.type));
      return;
    }

    const waiters = [...flight.waiters];
    flight.waiters.clear();
    for (const waiter of waiters) {
      this.cache.addRef(entry);
      waiter.resolve(entry);
    }

    // Every caller cancelled after the loader had already produced a value.
    if (waiters.length === 0) {
      this.cache.evictIfUnreferenced(entry);
    }
    this.cache.enforceBudget();
  }

  private failFlight(flight: LoadFlight, err: unknown): void {
    const { target, type, controller } = flight;
    const error = isAssetError(err) ? err : new AssetParseError(target.path, type.name, err);

    if (this.disposed) return;
    if (controller.signal.aborted && flight.waiters.size === 0) {
      // Abandoned by every caller; nothing to report.
      return;
    }

    this.cache.failures += 1;
    this.reportLoadError(target.path, error);
    this.rejectWaiters(flight, error);
  }

  private rejectWaiters(flight: LoadFlight, error: Error): void {
    const waiters = [...flight.waiters];
    flight.waiters.clear();
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private joinFlight(flight: LoadFlight, signal?: AbortSignal): Promise<CacheEntry> {
    return new Promise<CacheEntry>((resolvePromise, rejectPromise) => {
      const onAbort = (): void => {
        if (!flight.waiters.delete(waiter)) return;
        rejectPromise(new AssetLoadCancelledError(flight.target.path));
        if (flight.waiters.size === 0) {
          this.abandonFlight(flight);
        }
      };

      const waiter: FlightWaiter = {
        resolve: (entry) => {
          signal?.removeEventListener('abort', onAbort);
          resolvePromise(entry);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          rejectPromise(error);
        },
      };

      flight.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * The last waiter left: signal the loader to stop. The flight stays tracked
   * until it settles so a later request never overlaps its loader.
   */
  private abandonFlight(flight: LoadFlight): void {
    if (this.inflight.get(flight.target.key) === flight) {
      this.inflight.delete(flight.target.key);
      this.abandoned.set(flight.target.key, flight);
    }
    log.debug('load abandoned by every caller', flight.target.path);
    flight.controller.abort(new AssetLoadCancelledError(flight.target.path));
  }

  // ===========================================================================
  // Internal helpers
  // ===========================================================================

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new AssetManagerDisposedError(operation);
    }
  }

  private resolvePath(path: string): ResolvedPath {
    if (typeof path !== 'string' || path.trim().length === 0) {
      throw new InvalidArgumentError('path', 'expected a non-empty path');
    }
    const normalized = normalizeAssetPath(path);
    return {
      key: normalized.toLowerCase(),
      path: normalized,
      fullPath: resolve(this.config.rootPath, normalized),
    };
  }

  private requireLoader(type: AssetType<unknown>, target: ResolvedPath): ErasedLoader {
    const extension = extensionOf(target.path);
    const loader = this.loaders.getErasedLoader(type, extension);
    if (!loader) {
      throw new UnsupportedFormatError(target.path, type.name, extension);
    }
    return loader;
  }

  private typeMismatch(
    target: ResolvedPath,
    requested: AssetType<unknown>,
    cached: AssetType<unknown>,
  ): UnsupportedFormatError {
    return new UnsupportedFormatError(
      target.path,
      requested.name,
      extensionOf(target.path),
      `already loaded as ${cached.name}`,
    );
  }

  private async assertFileExists(target: ResolvedPath): Promise<void> {
    try {
      const stats = await stat(target.fullPath);
      if (stats.isFile()) return;
    } catch (err) {
      if (!isMissingFileError(err)) throw err;
    }
    throw new AssetNotFoundError(target.path);
  }

  private async readAssetFile(target: ResolvedPath, signal?: AbortSignal): Promise<Uint8Array> {
    try {
      return await readFile(target.fullPath, signal ? { signal } : undefined);
    } catch (err) {
      signal?.throwIfAborted();
      if (isMissingFileError(err)) {
        throw new AssetNotFoundError(target.path);
      }
      throw err;
    }
  }

  private createContext(target: ResolvedPath): AssetLoadContext {
    return {
      path: target.path,
      manager: this,
      ...(this.config.services ? { services: this.config.services } : {}),
    };
  }

  /** Report a load failure once and hand the error back for rethrowing. */
  private fail(target: ResolvedPath, err: unknown): Error {
    const error = toError(err);
    this.reportLoadError(target.path, error);
    return error;
  }

  private reportLoadError(path: string, error: Error): void {
    if (this.reported.has(error)) return;
    if (!(error instanceof AssetError) || !REPORTED_CODES.has(error.code)) return;
    this.reported.add(error);

    const callback = this.config.onLoadError;
    if (!callback) return;
    try {
      callback(path, error);
    } catch (callbackError) {
      log.warn('onLoadError callback threw:', callbackError);
    }
  }
}

function isFileSync(fullPath: string): boolean {
  try {
    return statSync(fullPath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch (err) {
    if (isMissingFileError(err)) return false;
    throw err;
  }
}

function isMissingFileError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}
