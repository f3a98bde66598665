/**
 * Maps (extension, asset type) pairs to loaders.
 *
 * Loaders are wrapped in bindings that expose both the typed loader, for
 * callers holding the asset type token, and an erased form for callers that
 * only know the type at run time (streaming, hot reload).
 */

import type { AssetType } from './asset-type.js';
import type { AssetLoadContext, AssetLoader } from './types.js';
import { normalizeExtension } from './paths.js';

/** Result of an erased load: the decoded value and its estimated size. */
export interface ErasedLoadResult {
  readonly value: unknown;
  readonly sizeBytes: number;
}

/** Type-erased view of a loader. */
export interface ErasedLoader {
  readonly type: AssetType<unknown>;
  readonly extensions: readonly string[];
  loadErased(data: Uint8Array, context: AssetLoadContext): ErasedLoadResult;
  loadErasedAsync(
    data: Uint8Array,
    context: AssetLoadContext,
    signal?: AbortSignal,
  ): Promise<ErasedLoadResult>;
}

export type LoadDelegate = (
  data: Uint8Array,
  context: AssetLoadContext,
  signal?: AbortSignal,
) => Promise<ErasedLoadResult>;

class LoaderBinding<T> implements ErasedLoader {
  readonly extensions: readonly string[];

  constructor(readonly loader: AssetLoader<T>) {
    this.extensions = loader.extensions.map(normalizeExtension).filter((ext) => ext.length > 0);
  }

  get type(): AssetType<unknown> {
    return this.loader.type;
  }

  loadErased(data: Uint8Array, context: AssetLoadContext): ErasedLoadResult {
    const value = this.loader.load(data, context);
    return { value, sizeBytes: this.loader.estimateSize(value) };
  }

  async loadErasedAsync(
    data: Uint8Array,
    context: AssetLoadContext,
    signal?: AbortSignal,
  ): Promise<ErasedLoadResult> {
    const value = await this.loader.loadAsync(data, context, signal);
    return { value, sizeBytes: this.loader.estimateSize(value) };
  }
}

export class LoaderRegistry {
  /** extension → type token → binding */
  private readonly byExtension = new Map<string, Map<AssetType<unknown>, LoaderBinding<unknown>>>();
  /** type token → most recently registered binding, for erased dispatch */
  private readonly byType = new Map<AssetType<unknown>, LoaderBinding<unknown>>();

  /**
   * Register a loader under each of its extensions. A loader registered
   * later for the same (extension, type) pair replaces the earlier one.
   */
  register<T>(loader: AssetLoader<T>): void {
    const binding = new LoaderBinding(loader);
    for (const extension of binding.extensions) {
      let forExtension = this.byExtension.get(extension);
      if (!forExtension) {
        forExtension = new Map();
        this.byExtension.set(extension, forExtension);
      }
      forExtension.set(loader.type, binding);
    }
    this.byType.set(loader.type, binding);
  }

  /**
   * Loader bound to (extension, type). Without an extension, the loader most
   * recently registered for the type.
   */
  getLoader<T>(type: AssetType<T>, extension?: string): AssetLoader<T> | undefined {
    const binding = extension === undefined
      ? this.byType.get(type)
      : this.byExtension.get(normalizeExtension(extension))?.get(type);
    if (!binding) return undefined;
    // Bindings are keyed by their own loader's token, so the stored loader produces T.
    return binding.loader as AssetLoader<T>;
  }

  /** Erased loader bound to (extension, type), for run-time dispatch. */
  getErasedLoader(type: AssetType<unknown>, extension: string): ErasedLoader | undefined {
    return this.byExtension.get(normalizeExtension(extension))?.get(type);
  }

  /** Whether any loader claims the extension (with or without the dot, any case). */
  hasLoader(extension: string): boolean {
    const normalized = normalizeExtension(extension);
    if (normalized.length === 0) return false;
    const forExtension = this.byExtension.get(normalized);
    return forExtension !== undefined && forExtension.size > 0;
  }

  /** Every registered extension across all types. */
  getSupportedExtensions(): ReadonlySet<string> {
    return new Set(this.byExtension.keys());
  }

  /** Type-erased load entry point for a run-time type, or undefined. */
  getLoadDelegate(type: AssetType<unknown>): LoadDelegate | undefined {
    const binding = this.byType.get(type);
    if (!binding) return undefined;
    return (data, context, signal) => binding.loadErasedAsync(data, context, signal);
  }
}
