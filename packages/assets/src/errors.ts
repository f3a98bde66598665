/**
 * Typed error classes for the asset system.
 */

export type AssetErrorCode =
  | 'FileNotFound'
  | 'UnsupportedFormat'
  | 'ParseError'
  | 'InvalidData'
  | 'InvalidArgument'
  | 'Disposed'
  | 'Cancelled'
  | 'DirectoryNotFound';

/** Base class for all asset-system errors. */
export class AssetError extends Error {
  constructor(
    public readonly code: AssetErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AssetError';
  }
}

/** The asset file does not exist under the root path. */
export class AssetNotFoundError extends AssetError {
  constructor(public readonly path: string) {
    super('FileNotFound', `Asset file not found: ${path}`);
    this.name = 'AssetNotFoundError';
  }
}

/** No loader is registered for the extension and requested type. */
export class UnsupportedFormatError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly typeName: string,
    public readonly extension: string,
    detail?: string,
  ) {
    super(
      'UnsupportedFormat',
      `Cannot load "${path}" as ${typeName}: ${detail ?? `no loader registered for "${extension || '(none)'}"`}`,
    );
    this.name = 'UnsupportedFormatError';
  }
}

/** A loader threw while decoding an asset. The loader's error is the cause. */
export class AssetParseError extends AssetError {
  constructor(
    public readonly path: string,
    public readonly typeName: string,
    cause: unknown,
  ) {
    super('ParseError', `Failed to load "${path}" as ${typeName}: ${describeCause(cause)}`, { cause });
    this.name = 'AssetParseError';
  }
}

/** A manifest document is malformed. */
export class InvalidDataError extends AssetError {
  constructor(
    public readonly source: string,
    public readonly reason: string,
  ) {
    super('InvalidData', `Invalid data in ${source}: ${reason}`);
    this.name = 'InvalidDataError';
  }
}

/** A caller passed an empty path, a missing loader or a bad option. */
export class InvalidArgumentError extends AssetError {
  constructor(
    public readonly argument: string,
    reason: string,
  ) {
    super('InvalidArgument', `Invalid argument "${argument}": ${reason}`);
    this.name = 'InvalidArgumentError';
  }
}

/** The owning manager has been torn down. */
export class AssetManagerDisposedError extends AssetError {
  constructor(operation: string) {
    super('Disposed', `AssetManager is disposed (${operation})`);
    this.name = 'AssetManagerDisposedError';
  }
}

/** A caller's cancellation signal fired before its load finished. */
export class AssetLoadCancelledError extends AssetError {
  constructor(public readonly path: string) {
    super('Cancelled', `Load of "${path}" was cancelled`);
    this.name = 'AssetLoadCancelledError';
  }
}

/** The directory to watch does not exist. */
export class DirectoryNotFoundError extends AssetError {
  constructor(public readonly directory: string) {
    super('DirectoryNotFound', `Directory not found: ${directory}`);
    this.name = 'DirectoryNotFoundError';
  }
}

export function isAssetError(value: unknown, code?: AssetErrorCode): value is AssetError {
  return value instanceof AssetError && (code === undefined || value.code === code);
}

/** Coerce anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
