/**
 * Merkle Errors
 * Error hierarchy for tree construction and proof handling
 */

/**
 * Merkle Error
 * Base error for all library failures
 */
export class MerkleError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "MerkleError";
  }
}

/**
 * Merkle Usage Error
 * Thrown when the caller drives a tree or reader incorrectly
 * (e.g. selecting a proof range after leaves were pushed)
 */
export class MerkleUsageError extends MerkleError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = "MerkleUsageError";
  }
}

/**
 * Merkle Invariant Error
 * Thrown when tree construction reaches a state that correct input cannot produce
 */
export class MerkleInvariantError extends MerkleError {
  constructor(message: string) {
    super(message);
    this.name = "MerkleInvariantError";
  }
}

/**
 * Proof Encoding Error
 * Thrown when a proof bundle cannot be decoded
 */
export class ProofEncodingError extends MerkleError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = "ProofEncodingError";
  }
}
