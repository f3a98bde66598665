/**
 * A caller's reference to a cached asset.
 *
 * Each handle owns exactly one unit of its entry's reference count. The
 * released flag lives on the handle, so releasing twice is a local no-op.
 */

import type { AssetType } from './asset-type.js';
import { InvalidArgumentError } from './errors.js';

/** The manager-side operations a handle needs. */
export interface AssetHandleOwner {
  readAsset<T>(id: number, type: AssetType<T>): T | undefined;
  hasEntry(id: number): boolean;
  refCountOf(id: number): number;
  acquireEntry<T>(id: number, type: AssetType<T>): AssetHandle<T>;
  releaseEntry(id: number): void;
}

export class AssetHandle<T> {
  private released = false;

  constructor(
    /** Entry id, identical for every handle to the same cached asset. */
    readonly id: number,
    /** Normalized asset path. */
    readonly path: string,
    readonly type: AssetType<T>,
    private readonly owner: AssetHandleOwner,
  ) {}

  /**
   * Current value of the entry. Reflects hot reloads; undefined once the
   * handle is released or the entry has been unloaded.
   */
  get asset(): T | undefined {
    if (this.released) return undefined;
    return this.owner.readAsset(this.id, this.type);
  }

  get isLoaded(): boolean {
    return !this.released && this.owner.hasEntry(this.id);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** References held on the entry by all handles (0 once unloaded). */
  get refCount(): number {
    return this.owner.refCountOf(this.id);
  }

  /** New handle to the same entry, adding one reference. */
  acquire(): AssetHandle<T> {
    if (this.released) {
      throw new InvalidArgumentError('handle', `handle for "${this.path}" is already released`);
    }
    return this.owner.acquireEntry(this.id, this.type);
  }

  /** Give back this handle's reference. Further calls do nothing. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.owner.releaseEntry(this.id);
  }

  /** Alias of release(). */
  dispose(): void {
    this.release();
  }
}
