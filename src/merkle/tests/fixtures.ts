import { AirdropLeaf, encodeRecipient } from '../leaf';

/**
 * Deterministic 32-byte recipient whose bytes are all `seed`
 */
export function makeRecipient(seed: number): Uint8Array {
  return new Uint8Array(32).fill(seed);
}

export function makeAddress(seed: number): string {
  return encodeRecipient(makeRecipient(seed));
}

export function makeLeaves(count: number, amount = 100_000_000n): AirdropLeaf[] {
  return Array.from({ length: count }, (_, i) => ({
    index: i,
    recipient: makeRecipient(i + 1),
    amount,
  }));
}
