import { keccak_256 } from '@noble/hashes/sha3';
import { MerkleInputError } from './errors';

export const HASH_BYTES = 32;

const HASH_HEX_PATTERN = /^[0-9a-fA-F]{64}$/;

/**
 * Keccak-256 over the concatenation of the given parts
 */
export function keccak256(...parts: Uint8Array[]): Buffer {
  const hasher = keccak_256.create();
  for (const part of parts) {
    hasher.update(part);
  }
  return Buffer.from(hasher.digest());
}

/**
 * Lowercase hex form of a hash (64 chars for 32 bytes)
 */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function isHashHex(value: unknown): value is string {
  return typeof value === 'string' && HASH_HEX_PATTERN.test(value);
}

/**
 * Decode a 64-char hex hash into 32 bytes
 */
export function parseHash(value: string, label = 'hash'): Buffer {
  if (!isHashHex(value)) {
    throw new MerkleInputError(`Invalid ${label}: expected 64 hex characters`);
  }
  return Buffer.from(value, 'hex');
}

/**
 * Compare two hashes as big-endian unsigned integers.
 * For equal-length inputs this is plain byte-wise ordering.
 */
export function compareHashes(a: Uint8Array, b: Uint8Array): number {
  return Buffer.compare(a, b);
}

/**
 * Hash two sibling nodes into their parent.
 * The smaller value always goes first, so hashPair(a, b) == hashPair(b, a)
 * and verifiers do not need to know which side a sibling sat on.
 */
export function hashPair(a: Uint8Array, b: Uint8Array): Buffer {
  return compareHashes(a, b) <= 0 ? keccak256(a, b) : keccak256(b, a);
}
