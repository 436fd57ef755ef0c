import bs58 from 'bs58';
import { MerkleInputError } from './errors';
import { keccak256 } from './hash';

export const RECIPIENT_BYTES = 32;

/** index (4) + recipient (32) + amount (8) */
export const LEAF_BYTES = 4 + RECIPIENT_BYTES + 8;

const MAX_U32 = 0xffff_ffff;
const MAX_U64 = (1n << 64n) - 1n;

/**
 * One recipient's commitment input
 */
export interface AirdropLeaf {
  /** 0-based position in the recipient list */
  index: number;
  /** Raw 32-byte public key, not its base-58 text */
  recipient: Uint8Array;
  /** Base units (already scaled by the token decimals) */
  amount: bigint;
}

/**
 * Decode a base-58 public key into its 32 raw bytes
 */
export function decodeRecipient(address: string): Uint8Array {
  let decoded: Uint8Array;
  try {
    decoded = bs58.decode(address);
  } catch {
    throw new MerkleInputError(`Invalid recipient: ${address} is not base-58`);
  }
  if (decoded.length !== RECIPIENT_BYTES) {
    throw new MerkleInputError(
      `Invalid recipient: ${address} decodes to ${decoded.length} bytes, expected ${RECIPIENT_BYTES}`
    );
  }
  return decoded;
}

export function isValidRecipient(address: string): boolean {
  try {
    decodeRecipient(address);
    return true;
  } catch {
    return false;
  }
}

export function encodeRecipient(recipient: Uint8Array): string {
  return bs58.encode(recipient);
}

/**
 * Fixed 44-byte layout: index u32 LE ‖ recipient ‖ amount u64 LE
 */
export function encodeLeaf(leaf: AirdropLeaf): Buffer {
  if (!Number.isInteger(leaf.index) || leaf.index < 0 || leaf.index > MAX_U32) {
    throw new MerkleInputError(`Invalid leaf index: ${leaf.index}`);
  }
  if (leaf.recipient.length !== RECIPIENT_BYTES) {
    throw new MerkleInputError(
      `Invalid recipient length: ${leaf.recipient.length} bytes, expected ${RECIPIENT_BYTES}`
    );
  }
  if (leaf.amount < 0n || leaf.amount > MAX_U64) {
    throw new MerkleInputError(`Invalid leaf amount: ${leaf.amount}`);
  }

  const buffer = Buffer.alloc(LEAF_BYTES);
  buffer.writeUInt32LE(leaf.index, 0);
  buffer.set(leaf.recipient, 4);
  buffer.writeBigUInt64LE(leaf.amount, 4 + RECIPIENT_BYTES);
  return buffer;
}

/**
 * Leaf commitment: H(H(encodeLeaf(leaf))).
 * The second hash keeps leaf values out of the 64-byte preimage space
 * used by internal nodes.
 */
export function commitLeaf(leaf: AirdropLeaf): Buffer {
  return keccak256(keccak256(encodeLeaf(leaf)));
}
