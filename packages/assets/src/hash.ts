/**
 * SHA-256 hashing via node:crypto.
 */

import { createHash } from 'node:crypto';

/** Compute the SHA-256 hex digest of a byte buffer. */
export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
