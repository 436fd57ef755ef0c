import { MerkleInputError } from './errors';
import { isHashHex } from './hash';
import { fromLevels, MerkleTree } from './merkleTree';

/**
 * Published snapshot document: { "root": hex, "tree": hex[][] }, level 0 first
 */
export interface TreeSnapshot {
  root: string;
  tree: string[][];
}

export function toSnapshot(tree: MerkleTree): TreeSnapshot {
  return {
    root: tree.root,
    tree: tree.tree.map(level => [...level]),
  };
}

/**
 * Serialize a tree to its published text form
 */
export function dumpTree(tree: MerkleTree): string {
  return JSON.stringify(toSnapshot(tree));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed snapshot and restore the tree.
 *
 * Checks level shapes (each level is ceil(previous / 2) long, the last
 * holds only the root); hashes themselves are not recomputed.
 */
export function fromSnapshot(value: unknown): MerkleTree {
  if (!isRecord(value)) {
    throw new MerkleInputError('Invalid tree snapshot: expected an object');
  }

  const { root, tree } = value;
  if (!isHashHex(root)) {
    throw new MerkleInputError('Invalid tree snapshot: root must be 64 hex characters');
  }
  if (!Array.isArray(tree) || tree.length === 0) {
    throw new MerkleInputError('Invalid tree snapshot: tree must be a non-empty array of levels');
  }

  const levels: string[][] = [];
  for (let i = 0; i < tree.length; i++) {
    const level: unknown = tree[i];
    if (!Array.isArray(level) || level.length === 0) {
      throw new MerkleInputError(`Invalid tree snapshot: level ${i} must be a non-empty array`);
    }
    const hashes: string[] = [];
    for (const node of level) {
      if (!isHashHex(node)) {
        throw new MerkleInputError(`Invalid tree snapshot: level ${i} contains a malformed hash`);
      }
      hashes.push(node.toLowerCase());
    }
    if (hashes.length === 1 && i < tree.length - 1) {
      throw new MerkleInputError(`Invalid tree snapshot: level ${i} has a single node but is not the last level`);
    }
    if (i > 0 && hashes.length !== Math.ceil(levels[i - 1].length / 2)) {
      throw new MerkleInputError(
        `Invalid tree snapshot: level ${i} has ${hashes.length} nodes, expected ${Math.ceil(levels[i - 1].length / 2)}`
      );
    }
    levels.push(hashes);
  }

  const normalizedRoot = root.toLowerCase();
  const top = levels[levels.length - 1];
  if (top.length !== 1 || top[0] !== normalizedRoot) {
    throw new MerkleInputError('Invalid tree snapshot: last level must contain only the root');
  }

  return fromLevels(normalizedRoot, levels);
}

/**
 * Parse the published text form back into a tree
 */
export function loadTree(text: string): MerkleTree {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new MerkleInputError('Invalid tree snapshot: not valid JSON');
  }
  return fromSnapshot(parsed);
}
