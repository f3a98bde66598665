/**
 * In-memory entry table for loaded assets.
 *
 * Owns reference counts, last-access ordering, byte accounting and the
 * eviction policy. Entries only exist in the Loaded state; loads in flight
 * are tracked by the AssetManager.
 */

import { createLogger } from '@stockpile/core';
import type { AssetType } from './asset-type.js';
import { CachePolicy, isDisposableAsset } from './types.js';

const log = createLogger('AssetCache');

export interface CacheEntry {
  /** Shared by every handle referencing this entry. */
  readonly id: number;
  /** Normalized, lower-cased lookup key. */
  readonly key: string;
  /** Normalized path as first requested. */
  readonly path: string;
  readonly type: AssetType<unknown>;
  value: unknown;
  sizeBytes: number;
  refCount: number;
  /** Monotonic access counter (for LRU eviction). */
  lastAccess: number;
}

export interface NewCacheEntry {
  readonly key: string;
  readonly path: string;
  readonly type: AssetType<unknown>;
  readonly value: unknown;
  readonly sizeBytes: number;
  readonly refCount: number;
}

export class AssetCache {
  private readonly byKey = new Map<string, CacheEntry>();
  private readonly byId = new Map<number, CacheEntry>();
  /** parent key → normalized paths of assets loaded on its behalf */
  private readonly dependencies = new Map<string, Set<string>>();
  private nextId = 1;
  private accessClock = 0;
  private totalBytes = 0;

  hits = 0;
  misses = 0;
  failures = 0;

  constructor(
    readonly policy: CachePolicy,
    readonly maxSizeBytes: number,
  ) {}

  get size(): number {
    return this.byKey.size;
  }

  get totalSizeBytes(): number {
    return this.totalBytes;
  }

  get(key: string): CacheEntry | undefined {
    return this.byKey.get(key);
  }

  getById(id: number): CacheEntry | undefined {
    return this.byId.get(id);
  }

  keys(): string[] {
    return [...this.byKey.keys()];
  }

  insert(init: NewCacheEntry): CacheEntry {
    const entry: CacheEntry = {
      id: this.nextId++,
      key: init.key,
      path: init.path,
      type: init.type,
      value: init.value,
      sizeBytes: init.sizeBytes,
      refCount: init.refCount,
      lastAccess: ++this.accessClock,
    };
    this.byKey.set(entry.key, entry);
    this.byId.set(entry.id, entry);
    this.totalBytes += entry.sizeBytes;
    return entry;
  }

  touch(entry: CacheEntry): void {
    entry.lastAccess = ++this.accessClock;
  }

  addRef(entry: CacheEntry, count = 1): void {
    entry.refCount += count;
    this.touch(entry);
  }

  /**
   * Drop one reference. Under the aggressive policy an entry that reaches
   * zero is evicted before this returns. Returns true if it was evicted.
   */
  release(entry: CacheEntry): boolean {
    if (entry.refCount > 0) {
      entry.refCount -= 1;
    }
    return this.evictIfUnreferenced(entry);
  }

  /** Evict an entry nobody references, when the aggressive policy asks for it. */
  evictIfUnreferenced(entry: CacheEntry): boolean {
    if (entry.refCount === 0 && this.policy === CachePolicy.Aggressive && this.byId.has(entry.id)) {
      this.evict(entry.key);
      return true;
    }
    return false;
  }

  /** Swap the value of an existing entry in place and dispose the old one. */
  replaceValue(entry: CacheEntry, value: unknown, sizeBytes: number): void {
    const previous = entry.value;
    this.totalBytes += sizeBytes - entry.sizeBytes;
    entry.value = value;
    entry.sizeBytes = sizeBytes;
    if (previous !== value) {
      disposeAssetValue(entry.path, previous);
    }
  }

  /** Remove and dispose an entry regardless of its reference count. */
  evict(key: string): boolean {
    const entry = this.byKey.get(key);
    if (!entry) return false;

    this.byKey.delete(key);
    this.byId.delete(entry.id);
    this.dependencies.delete(key);
    this.totalBytes -= entry.sizeBytes;
    log.debug('evicted', entry.path, `${entry.sizeBytes} bytes`);
    disposeAssetValue(entry.path, entry.value);
    return true;
  }

  clear(): void {
    for (const key of this.keys()) {
      this.evict(key);
    }
    this.dependencies.clear();
  }

  /**
   * Evict unreferenced entries, oldest access first, until the total is at
   * or below targetBytes. The manual policy never evicts here.
   * Returns the number of evicted entries.
   */
  trimToSize(targetBytes: number): number {
    if (this.policy === CachePolicy.Manual) return 0;
    if (this.totalBytes <= targetBytes) return 0;

    const candidates = [...this.byKey.values()]
      .filter((entry) => entry.refCount === 0)
      .sort((a, b) => a.lastAccess - b.lastAccess);

    let evicted = 0;
    for (const entry of candidates) {
      if (this.totalBytes <= targetBytes) break;
      this.evict(entry.key);
      evicted += 1;
    }
    return evicted;
  }

  /** Enforce the byte budget under LRU. */
  enforceBudget(): number {
    if (this.policy !== CachePolicy.LRU) return 0;
    return this.trimToSize(this.maxSizeBytes);
  }

  addDependency(parentKey: string, dependencyPath: string): void {
    let set = this.dependencies.get(parentKey);
    if (!set) {
      set = new Set();
      this.dependencies.set(parentKey, set);
    }
    set.add(dependencyPath);
  }

  getDependencies(parentKey: string): string[] {
    return [...(this.dependencies.get(parentKey) ?? [])];
  }
}

export function disposeAssetValue(path: string, value: unknown): void {
  if (!isDisposableAsset(value)) return;
  try {
    value.dispose();
  } catch (err) {
    log.warn(`dispose() threw for "${path}":`, err);
  }
}
