import { EmptyTreeError } from './errors';
import { hashPair, keccak256, parseHash, toHex } from './hash';
import { AirdropLeaf, commitLeaf } from './leaf';

/**
 * Merkle tree over airdrop leaves.
 *
 * tree[0] holds the leaf commitments in input order, each following level
 * holds the parents of the previous one, and the last level holds the root.
 * All hashes are lowercase hex.
 */
export interface MerkleTree {
  readonly root: string;
  readonly tree: ReadonlyArray<ReadonlyArray<string>>;
}

/**
 * Parent level of a level of nodes.
 * Full pairs are hashed smaller-first; a trailing unpaired node is hashed
 * with itself.
 */
function nextLevel(level: Buffer[]): Buffer[] {
  const parents: Buffer[] = [];
  for (let i = 0; i < level.length; i += 2) {
    if (i + 1 < level.length) {
      parents.push(hashPair(level[i], level[i + 1]));
    } else {
      parents.push(keccak256(level[i], level[i]));
    }
  }
  return parents;
}

function freezeTree(root: string, levels: string[][]): MerkleTree {
  return Object.freeze({
    root,
    tree: Object.freeze(levels.map(level => Object.freeze(level))),
  });
}

/**
 * Build a Merkle tree from leaves in the given order.
 *
 * Order is significant and is never re-sorted: the leaf index, not the
 * recipient, defines the tree topology.
 *
 * @throws EmptyTreeError when leaves is empty
 */
export function buildMerkleTree(leaves: ReadonlyArray<AirdropLeaf>): MerkleTree {
  if (leaves.length === 0) {
    throw new EmptyTreeError();
  }

  let current = leaves.map(commitLeaf);
  const levels: string[][] = [current.map(toHex)];

  while (current.length > 1) {
    current = nextLevel(current);
    levels.push(current.map(toHex));
  }

  return freezeTree(levels[levels.length - 1][0], levels);
}

/**
 * Compute just the root, without keeping the levels
 */
export function computeMerkleRoot(leaves: ReadonlyArray<AirdropLeaf>): string {
  if (leaves.length === 0) {
    throw new EmptyTreeError();
  }

  let current = leaves.map(commitLeaf);
  while (current.length > 1) {
    current = nextLevel(current);
  }
  return toHex(current[0]);
}

/**
 * Restore a tree from already-validated levels (used by the snapshot codec)
 */
export function fromLevels(root: string, levels: ReadonlyArray<ReadonlyArray<string>>): MerkleTree {
  return freezeTree(root, levels.map(level => [...level]));
}

export function getLeafCount(tree: MerkleTree): number {
  return tree.tree[0].length;
}

/**
 * Sibling path for the leaf at `index`, leaf-adjacent first.
 *
 * A trailing node of an odd-length level was hashed with itself during
 * construction, so its own hash is emitted for that level; replaying
 * hashPair(x, x) in the verifier then reproduces H(x ‖ x). Every proof in a
 * tree of L levels therefore has L - 1 entries.
 *
 * Returns undefined when index is outside the leaf level.
 */
export function getProof(tree: MerkleTree, index: number): string[] | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= getLeafCount(tree)) {
    return undefined;
  }

  const proof: string[] = [];
  let current = index;

  for (let level = 0; level < tree.tree.length - 1; level++) {
    const nodes = tree.tree[level];
    const sibling = current ^ 1;

    if (sibling < nodes.length) {
      proof.push(nodes[sibling]);
    } else {
      // Self-paired trailing node
      proof.push(nodes[current]);
    }

    current = Math.floor(current / 2);
  }

  return proof;
}

/**
 * Verify that `leaf` is committed under `root` using `proof`.
 *
 * Returns false when the proof does not reconstruct the root.
 *
 * @throws MerkleInputError when the leaf fields, the root or a proof entry
 *   are malformed
 */
export function verifyMerkleProof(
  leaf: AirdropLeaf,
  root: string,
  proof: ReadonlyArray<string>
): boolean {
  const expectedRoot = parseHash(root, 'root');
  const siblings = proof.map((entry, i) => parseHash(entry, `proof entry ${i}`));

  let computed = commitLeaf(leaf);
  for (const sibling of siblings) {
    computed = hashPair(computed, sibling);
  }

  return computed.equals(expectedRoot);
}
