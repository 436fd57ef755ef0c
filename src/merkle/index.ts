// Hashing
export { keccak256, hashPair, compareHashes, parseHash, isHashHex, toHex, HASH_BYTES } from './hash';

// Leaf codec
export {
  AirdropLeaf,
  RECIPIENT_BYTES,
  LEAF_BYTES,
  decodeRecipient,
  encodeRecipient,
  isValidRecipient,
  encodeLeaf,
  commitLeaf,
} from './leaf';

// Core Merkle tree
export {
  MerkleTree,
  buildMerkleTree,
  computeMerkleRoot,
  getLeafCount,
  getProof,
  verifyMerkleProof,
} from './merkleTree';

// Snapshot codec
export { TreeSnapshot, dumpTree, loadTree, toSnapshot, fromSnapshot } from './snapshot';

// Errors
export { MerkleInputError, EmptyTreeError } from './errors';
