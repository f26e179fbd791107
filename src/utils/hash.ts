import * as crypto from 'crypto';

/**
 * Supported hash algorithms
 * SHA-1 is what git repositories use unless created with --object-format=sha256
 */
export type HashAlgorithm = 'sha1' | 'sha256';

/**
 * Hash configuration
 */
interface HashConfig {
  algorithm: HashAlgorithm;
  digestLength: number;
}

const HASH_CONFIGS: Record<HashAlgorithm, HashConfig> = {
  sha1: { algorithm: 'sha1', digestLength: 40 },
  sha256: { algorithm: 'sha256', digestLength: 64 },
};

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha1';

/**
 * Get the expected digest length for an algorithm (hex string length)
 */
export function getDigestLength(algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): number {
  return HASH_CONFIGS[algorithm].digestLength;
}

/**
 * Get the raw byte length for an algorithm
 * SHA-1 = 20 bytes, SHA-256 = 32 bytes
 */
export function getHashByteLength(algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): number {
  return HASH_CONFIGS[algorithm].digestLength / 2;
}

/**
 * Check if a string is a valid hash for the given algorithm
 */
export function isValidHash(hash: string, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): boolean {
  const length = getDigestLength(algorithm);
  const regex = new RegExp(`^[0-9a-f]{${length}}$`);
  return regex.test(hash);
}

/**
 * Compute hash of data
 */
export function computeHash(data: Buffer | string, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM): string {
  return crypto.createHash(algorithm).update(data).digest('hex');
}

/**
 * Generate a short hash (first 7-8 characters) for display
 */
export function shortHash(hash: string, length: number = 8): string {
  return hash.slice(0, length);
}
