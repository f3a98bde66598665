import { defineAssetType } from '../asset-type.js';
import type { AssetLoadContext, AssetLoader } from '../types.js';

/** Parsed JSON document. */
export interface JsonAsset {
  readonly data: unknown;
  /** Size of the source file in bytes. */
  readonly byteLength: number;
}

export const JsonAssetType = defineAssetType<JsonAsset>('JsonAsset');

const utf8 = new TextDecoder('utf-8');

export class JsonLoader implements AssetLoader<JsonAsset> {
  readonly type = JsonAssetType;
  readonly extensions = ['.json'] as const;

  /** Throws the SyntaxError from JSON.parse on malformed input. */
  load(data: Uint8Array, _context: AssetLoadContext): JsonAsset {
    const parsed: unknown = JSON.parse(utf8.decode(data));
    return { data: parsed, byteLength: data.byteLength };
  }

  async loadAsync(data: Uint8Array, context: AssetLoadContext, signal?: AbortSignal): Promise<JsonAsset> {
    signal?.throwIfAborted();
    return this.load(data, context);
  }

  estimateSize(asset: JsonAsset): number {
    return asset.byteLength;
  }
}
