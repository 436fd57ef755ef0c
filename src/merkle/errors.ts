/**
 * Errors raised by the Merkle engine.
 *
 * A proof that simply does not reconstruct the root is not an error:
 * verification returns false for that case.
 */

/**
 * Thrown when a leaf field, hash string or snapshot document is malformed.
 */
export class MerkleInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MerkleInputError';
  }
}

/**
 * Thrown when a tree is requested for zero leaves. Upstream validation
 * rejects empty recipient lists, so reaching this is a contract violation.
 */
export class EmptyTreeError extends Error {
  constructor() {
    super('Cannot build a Merkle tree from zero leaves');
    this.name = 'EmptyTreeError';
  }
}
