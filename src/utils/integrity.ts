/**
 * Checksum parsing and verification for downloaded archives
 */

import { createHash } from 'crypto';

export type DigestAlgorithm = 'sha1' | 'sha256' | 'sha512';

export interface ExpectedDigest {
  algorithm: DigestAlgorithm;
  /** Lowercase hex */
  hex: string;
}

const HEX_LENGTHS: Record<DigestAlgorithm, number> = {
  sha1: 40,
  sha256: 64,
  sha512: 128,
};

function isAlgorithm(value: string): value is DigestAlgorithm {
  return value === 'sha1' || value === 'sha256' || value === 'sha512';
}

function isHexOfLength(value: string, length: number): boolean {
  return value.length === length && /^[0-9a-f]+$/i.test(value);
}

/**
 * Parse a checksum string.
 *
 * Accepted forms: `sha256:<hex>`, `sha512:<hex>`, `sha1:<hex>`, a bare
 * 64-character hex digest (sha256), and SRI strings such as `sha512-<base64>`.
 * Returns null when the string is not a recognised checksum.
 */
export function parseChecksum(checksum: string): ExpectedDigest | null {
  const value = checksum.trim();

  const prefixed = /^(sha1|sha256|sha512):([0-9a-fA-F]+)$/.exec(value);
  if (prefixed) {
    const algorithm = prefixed[1];
    const hex = prefixed[2].toLowerCase();
    if (isAlgorithm(algorithm) && isHexOfLength(hex, HEX_LENGTHS[algorithm])) {
      return { algorithm, hex };
    }
    return null;
  }

  if (isHexOfLength(value, HEX_LENGTHS.sha256)) {
    return { algorithm: 'sha256', hex: value.toLowerCase() };
  }

  const sri = /^(sha1|sha256|sha512)-([A-Za-z0-9+/]+={0,2})$/.exec(value);
  if (sri) {
    const algorithm = sri[1];
    if (!isAlgorithm(algorithm)) {
      return null;
    }
    const hex = Buffer.from(sri[2], 'base64').toString('hex');
    return isHexOfLength(hex, HEX_LENGTHS[algorithm]) ? { algorithm, hex } : null;
  }

  return null;
}

export function digest(data: Uint8Array, algorithm: DigestAlgorithm): string {
  return createHash(algorithm).update(data).digest('hex');
}

/**
 * Short stable hash used to name cache directories
 */
export function cacheHash(...parts: ReadonlyArray<string | undefined>): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    // NUL keeps ("a", "bc") and ("ab", "c") apart
    hash.update(part ?? '').update('\0');
  }
  return hash.digest('hex').slice(0, 16);
}

/**
 * Canonical `algorithm:hex` form, used for integrity markers
 */
export function formatDigest(expected: ExpectedDigest): string {
  return `${expected.algorithm}:${expected.hex}`;
}
