import * as crypto from 'crypto';

/**
 * Compute the SHA-256 hex digest of data
 */
export function computeHash(data: Buffer | string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Generate a short hash (first 8 characters) for display
 */
export function shortHash(hash: string, length: number = 8): string {
  return hash.slice(0, length);
}
