/**
 * streaming-merkle
 * Incremental Merkle roots, range proofs and cached subtrees
 */

export {
  type Hasher,
  LEAF_HASH_PREFIX,
  NODE_HASH_PREFIX,
  createHasher,
  isSupportedAlgorithm,
  rawHash,
  leafHash,
  nodeHash,
  areEqual,
} from "./lib/merkle/hash.ts";
export { ProofLadder } from "./lib/merkle/proof-ladder.ts";
export {
  type SubtreeNode,
  type LeafTransform,
  type ProofResult,
  SubtreeStack,
} from "./lib/merkle/subtree-stack.ts";
export { MerkleTree } from "./lib/merkle/tree.ts";
export { CachedTree } from "./lib/merkle/cached-tree.ts";
export { verifyProof, verifyProofOfSlice, verifyProofOfCachedElements } from "./lib/merkle/verify.ts";
export {
  MerkleError,
  MerkleUsageError,
  MerkleInvariantError,
  ProofEncodingError,
} from "./lib/merkle/errors.ts";
export {
  type ByteSource,
  type LeafSink,
  type ReaderProof,
  segments,
  readAll,
  readerRoot,
  buildReaderProof,
} from "./lib/readers/segment-reader.ts";
export {
  type ProofBundle,
  PROOF_BUNDLE_VERSION,
  encodeProofBundle,
  decodeProofBundle,
} from "./lib/encoding/proof-bundle.ts";
