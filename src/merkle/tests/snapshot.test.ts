import { dumpTree, loadTree, fromSnapshot, toSnapshot } from '../snapshot';
import { buildMerkleTree, getProof, verifyMerkleProof } from '../merkleTree';
import { MerkleInputError } from '../errors';
import { makeLeaves } from './fixtures';

describe('dumpTree', () => {
  it('should write root and levels as JSON', () => {
    const tree = buildMerkleTree(makeLeaves(2));
    const parsed = JSON.parse(dumpTree(tree));

    expect(Object.keys(parsed)).toEqual(['root', 'tree']);
    expect(parsed.root).toBe(tree.root);
    expect(parsed.tree).toEqual([[...tree.tree[0]], [tree.root]]);
  });

  it('should produce mutable plain arrays from toSnapshot', () => {
    const tree = buildMerkleTree(makeLeaves(3));
    const snapshot = toSnapshot(tree);
    expect(Object.isFrozen(snapshot.tree)).toBe(false);
    expect(snapshot.tree).toEqual(tree.tree);
  });
});

describe('loadTree', () => {
  it('should round-trip trees of various sizes', () => {
    for (const n of [1, 2, 3, 4, 5, 9, 16, 17]) {
      const tree = buildMerkleTree(makeLeaves(n));
      const loaded = loadTree(dumpTree(tree));
      expect(loaded.root).toBe(tree.root);
      expect(loaded.tree).toEqual(tree.tree);
    }
  });

  it('should give the same proofs after reloading', () => {
    const leaves = makeLeaves(5);
    const tree = buildMerkleTree(leaves);
    const loaded = loadTree(dumpTree(tree));

    leaves.forEach((leaf, i) => {
      const proof = getProof(loaded, i);
      expect(proof).toEqual(getProof(tree, i));
      expect(verifyMerkleProof(leaf, loaded.root, proof ?? [])).toBe(true);
    });
  });

  it('should reject text that is not JSON', () => {
    expect(() => loadTree('not json')).toThrow('Invalid tree snapshot: not valid JSON');
  });

  it('should reject a malformed root', () => {
    expect(() => loadTree(JSON.stringify({ root: 'root', tree: [['root']] })))
      .toThrow('Invalid tree snapshot: root must be 64 hex characters');
  });

  it('should reject an empty level list', () => {
    expect(() => fromSnapshot({ root: 'aa'.repeat(32), tree: [] })).toThrow(MerkleInputError);
  });

  it('should reject malformed hashes inside a level', () => {
    const root = 'aa'.repeat(32);
    expect(() => fromSnapshot({ root, tree: [['bb'], [root]] }))
      .toThrow('Invalid tree snapshot: level 0 contains a malformed hash');
  });

  it('should reject levels with the wrong length', () => {
    const root = 'aa'.repeat(32);
    const node = 'bb'.repeat(32);
    expect(() => fromSnapshot({ root, tree: [[node, node, node], [root]] }))
      .toThrow('Invalid tree snapshot: level 1 has 1 nodes, expected 2');
  });

  it('should reject a last level that is not the root', () => {
    const root = 'aa'.repeat(32);
    const node = 'bb'.repeat(32);
    expect(() => fromSnapshot({ root, tree: [[node]] }))
      .toThrow('Invalid tree snapshot: last level must contain only the root');
  });

  it('should reject a single-node level below the top', () => {
    const root = 'aa'.repeat(32);
    const node = 'bb'.repeat(32);
    expect(() => fromSnapshot({ root, tree: [[node], [root]] }))
      .toThrow('Invalid tree snapshot: level 0 has a single node but is not the last level');
    expect(() => fromSnapshot({ root, tree: [[node, node], [node], [root]] }))
      .toThrow('Invalid tree snapshot: level 1 has a single node but is not the last level');
  });

  it('should load uppercase hashes as lowercase', () => {
    const tree = buildMerkleTree(makeLeaves(3));
    const loaded = fromSnapshot({
      root: tree.root.toUpperCase(),
      tree: tree.tree.map((level) => level.map((hash) => hash.toUpperCase())),
    });
    expect(loaded.root).toBe(tree.root);
    expect(loaded.tree).toEqual(tree.tree);
    expect(getProof(loaded, 2)).toEqual(getProof(tree, 2));
  });

  it('should reject non-object documents', () => {
    expect(() => fromSnapshot([])).toThrow('Invalid tree snapshot: expected an object');
    expect(() => fromSnapshot(null)).toThrow(MerkleInputError);
  });
});
