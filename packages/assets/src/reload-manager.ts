/**
 * Turns file change notifications under the asset root into
 * AssetManager.reloadAsync() calls for assets that are currently loaded.
 */

import { statSync, watch as watchFileSystem } from 'node:fs';
import { relative, resolve, sep } from 'node:path';

import { EventBus, createLogger } from '@stockpile/core';

import type { AssetManager } from './asset-manager.js';
import { DirectoryNotFoundError } from './errors.js';
import { extensionOf, normalizeAssetPath } from './paths.js';
import { DEFAULT_HOT_RELOAD_DEBOUNCE_MS } from './types.js';

const log = createLogger('ReloadManager');

/** Callback receiving a changed file name relative to the watched directory. */
export type FileChangeListener = (filename: string) => void;

export interface FileWatcherHandle {
  close(): void;
}

/** Starts watching a directory tree. */
export type WatchFactory = (directory: string, onChange: FileChangeListener) => FileWatcherHandle;

export interface ReloadManagerOptions {
  /** Directory to watch. Default: the manager's root path. */
  rootPath?: string;
  /** Quiet period per file before reloading. 0 reloads on the first event. */
  debounceMs?: number;
  /** Watcher implementation. Default: recursive node:fs watch. */
  watch?: WatchFactory;
}

export interface ReloadManagerEvents {
  /** An asset under the watched root was reloaded. Payload: path. */
  assetReloaded: string;
}

export const watchDirectoryTree: WatchFactory = (directory, onChange) => {
  const watcher = watchFileSystem(directory, { recursive: true, persistent: false }, (_event, filename) => {
    if (filename) onChange(filename.toString());
  });
  watcher.on('error', (err) => {
    log.warn(`watcher error for "${directory}":`, err);
  });
  return watcher;
};

export class ReloadManager {
  readonly rootPath: string;

  private readonly debounceMs: number;
  private readonly events = new EventBus<ReloadManagerEvents>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly pending = new Set<Promise<void>>();
  private readonly unsubscribe: () => void;
  private watcher: FileWatcherHandle | null;

  constructor(
    private readonly manager: AssetManager,
    options: ReloadManagerOptions = {},
  ) {
    this.rootPath = resolve(options.rootPath ?? manager.rootPath);
    if (!isDirectory(this.rootPath)) {
      throw new DirectoryNotFoundError(this.rootPath);
    }
    this.debounceMs = Math.max(0, options.debounceMs ?? DEFAULT_HOT_RELOAD_DEBOUNCE_MS);

    this.unsubscribe = manager.on('assetReloaded', (path) => {
      this.events.emit('assetReloaded', path);
    });

    const watch = options.watch ?? watchDirectoryTree;
    this.watcher = watch(this.rootPath, (filename) => this.handleChange(filename));
    log.debug('watching', this.rootPath);
  }

  get isWatching(): boolean {
    return this.watcher !== null;
  }

  on<K extends keyof ReloadManagerEvents>(
    event: K,
    listener: (data: ReloadManagerEvents[K]) => void,
  ): () => void {
    return this.events.on(event, listener);
  }

  /** Resolves once every scheduled reload has run. */
  async whenIdle(): Promise<void> {
    while (this.timers.size > 0 || this.pending.size > 0) {
      if (this.pending.size > 0) {
        await Promise.allSettled([...this.pending]);
      } else {
        await new Promise((resolveDelay) => setTimeout(resolveDelay, this.debounceMs));
      }
    }
  }

  dispose(): void {
    if (!this.watcher) return;
    this.watcher.close();
    this.watcher = null;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.unsubscribe();
    this.events.removeAllListeners();
  }

  /**
   * React to a change notification. `filename` is relative to the watched
   * root (absolute paths inside the root are accepted too).
   */
  handleChange(filename: string): void {
    if (!this.watcher) return;

    const path = this.toAssetPath(filename);
    if (!path) return;
    if (!this.manager.hasLoader(extensionOf(path))) return;

    if (this.debounceMs === 0) {
      this.reloadIfLoaded(path);
      return;
    }

    const key = path.toLowerCase();
    const existing = this.timers.get(key);
    if (existing) clearTimeout(existing);
    this.timers.set(
      key,
      setTimeout(() => {
        this.timers.delete(key);
        this.reloadIfLoaded(path);
      }, this.debounceMs),
    );
  }

  private reloadIfLoaded(path: string): void {
    if (!this.watcher || this.manager.isDisposed) return;
    if (!this.manager.isLoaded(path)) return;

    log.debug('change detected', path);
    const reload: Promise<void> = this.manager
      .reloadAsync(path)
      .catch((err: unknown) => {
        log.warn(`reload of "${path}" failed:`, err);
      })
      .finally(() => {
        this.pending.delete(reload);
      });
    this.pending.add(reload);
  }

  private toAssetPath(filename: string): string | null {
    // Asset paths are relative to the manager's root, which may sit above ours.
    const absolute = resolve(this.rootPath, filename);
    const rel = relative(resolve(this.manager.rootPath), absolute);
    if (rel.length === 0 || rel.startsWith('..') || rel.split(sep).includes('..')) {
      return null;
    }
    return normalizeAssetPath(rel);
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch {
    return false;
  }
}
