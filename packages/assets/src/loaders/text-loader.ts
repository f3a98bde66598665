import { defineAssetType } from '../asset-type.js';
import type { AssetLoadContext, AssetLoader } from '../types.js';

/** Decoded UTF-8 text file. */
export interface TextAsset {
  readonly text: string;
  /** Size of the source file in bytes. */
  readonly byteLength: number;
}

export const TextAssetType = defineAssetType<TextAsset>('TextAsset');

const utf8 = new TextDecoder('utf-8');

/** Decodes .txt, .md and .csv files as UTF-8 (a leading BOM is dropped). */
export class TextLoader implements AssetLoader<TextAsset> {
  readonly type = TextAssetType;
  readonly extensions = ['.txt', '.md', '.csv'] as const;

  load(data: Uint8Array, _context: AssetLoadContext): TextAsset {
    return { text: utf8.decode(data), byteLength: data.byteLength };
  }

  async loadAsync(data: Uint8Array, context: AssetLoadContext, signal?: AbortSignal): Promise<TextAsset> {
    signal?.throwIfAborted();
    return this.load(data, context);
  }

  estimateSize(asset: TextAsset): number {
    return asset.byteLength;
  }
}
