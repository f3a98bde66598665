import type { AssetManager } from '../asset-manager.js';
import { BinaryLoader } from './binary-loader.js';
import { JsonLoader } from './json-loader.js';
import { TextLoader } from './text-loader.js';

export { TextLoader, TextAssetType } from './text-loader.js';
export type { TextAsset } from './text-loader.js';
export { JsonLoader, JsonAssetType } from './json-loader.js';
export type { JsonAsset } from './json-loader.js';
export { BinaryLoader, BinaryAssetType } from './binary-loader.js';
export type { BinaryAsset } from './binary-loader.js';

/** Register the text, JSON and binary loaders on a manager. */
export function registerBuiltinLoaders(manager: AssetManager): void {
  manager.registerLoader(new TextLoader());
  manager.registerLoader(new JsonLoader());
  manager.registerLoader(new BinaryLoader());
}
