/**
 * Runtime tokens standing in for asset result types.
 *
 * TypeScript erases generics, so every typed operation takes a token that
 * carries `T` at compile time and an identity at run time.
 */

export interface AssetType<T> {
  /** Display name used in errors, logs and manifests. */
  readonly name: string;
  /** Phantom marker tying the token to its result type. Never set at run time. */
  readonly __result?: () => T;
}

/** Create a new, unique asset type token. */
export function defineAssetType<T>(name: string): AssetType<T> {
  return Object.freeze({ name });
}
