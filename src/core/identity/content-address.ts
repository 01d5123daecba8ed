/**
 * Content-Addressable Identity for Retention PDP
 *
 * Every hash in the system (audit chain links, derived duty IDs) is computed
 * over the same canonical encoding, so two processes serializing the same
 * value always agree on its address:
 * - Object keys sorted by UTF-16 code unit, no whitespace
 * - Strings JSON-escaped
 * - Finite numbers in shortest JSON form, non-finite numbers as null
 * - Keys whose value is undefined omitted (a JSON round-trip drops them too)
 */

import { createHash } from 'crypto';

/**
 * Content address format: {algorithm}:{hash}
 * Example: sha256:abc123...
 */
export type ContentAddress = `${string}:${string}`;

/**
 * Supported hash algorithms
 */
export const HashAlgorithm = {
  SHA256: 'sha256',
  SHA384: 'sha384',
  SHA512: 'sha512',
} as const;

export type HashAlgorithmValue = (typeof HashAlgorithm)[keyof typeof HashAlgorithm];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithmValue = HashAlgorithm.SHA256;

const HEX_LENGTH: Record<HashAlgorithmValue, number> = {
  sha256: 64,
  sha384: 96,
  sha512: 128,
};

/**
 * Canonicalize a value for hashing.
 * The same logical value always produces the same string regardless of key order.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(value) : 'null';
  }

  if (typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const pairs = entries.map(([key, v]) => `${JSON.stringify(key)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }

  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
}

function digest(algorithm: HashAlgorithmValue, data: string): ContentAddress {
  const hash = createHash(algorithm).update(data, 'utf8').digest('hex');
  return `${algorithm}:${hash}`;
}

/**
 * Compute a content address for any serializable value
 */
export function computeContentAddress(
  content: unknown,
  algorithm: HashAlgorithmValue = DEFAULT_HASH_ALGORITHM
): ContentAddress {
  return digest(algorithm, canonicalize(content));
}

/**
 * Chain hash: digest(previous ‖ canonical(content)).
 * The previous address is concatenated verbatim, prefix included.
 */
export function computeChainHash(
  previous: ContentAddress,
  content: unknown,
  algorithm: HashAlgorithmValue = DEFAULT_HASH_ALGORITHM
): ContentAddress {
  return digest(algorithm, previous + canonicalize(content));
}

/**
 * Parse a content address into its components
 */
export function parseContentAddress(
  address: string
): { algorithm: string; hash: string } | null {
  const colonIndex = address.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  const algorithm = address.slice(0, colonIndex);
  const hash = address.slice(colonIndex + 1);

  if (!algorithm || !hash) {
    return null;
  }

  return { algorithm, hash };
}

function isHashAlgorithm(value: string): value is HashAlgorithmValue {
  return Object.values<string>(HashAlgorithm).includes(value);
}

/**
 * Validate a content address: supported algorithm and a full-length lowercase hex digest
 */
export function isValidContentAddress(address: string): address is ContentAddress {
  const parsed = parseContentAddress(address);
  if (!parsed || !isHashAlgorithm(parsed.algorithm)) {
    return false;
  }

  return (
    parsed.hash.length === HEX_LENGTH[parsed.algorithm] && /^[a-f0-9]+$/.test(parsed.hash)
  );
}
