import { defineAssetType } from '../asset-type.js';
import type { AssetLoadContext, AssetLoader } from '../types.js';

/** Raw file contents. */
export interface BinaryAsset {
  readonly bytes: Uint8Array;
}

export const BinaryAssetType = defineAssetType<BinaryAsset>('BinaryAsset');

export class BinaryLoader implements AssetLoader<BinaryAsset> {
  readonly type = BinaryAssetType;
  readonly extensions = ['.bin', '.dat'] as const;

  load(data: Uint8Array, _context: AssetLoadContext): BinaryAsset {
    // Copy so the asset does not pin a pooled read buffer.
    return { bytes: new Uint8Array(data) };
  }

  async loadAsync(data: Uint8Array, context: AssetLoadContext, signal?: AbortSignal): Promise<BinaryAsset> {
    signal?.throwIfAborted();
    return this.load(data, context);
  }

  estimateSize(asset: BinaryAsset): number {
    return asset.bytes.byteLength;
  }
}
