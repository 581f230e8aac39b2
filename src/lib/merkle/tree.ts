/**
 * Merkle Tree
 * RFC 6962 Merkle tree built one leaf at a time
 */

import { type Hasher, leafHash } from "./hash.ts";
import { SubtreeStack } from "./subtree-stack.ts";

/**
 * Merkle tree over raw leaf data
 *
 * Each push adds one leaf, hashed as H(0x00 || data). The tree keeps only
 * O(log n) subtree roots, plus what the proof for the range selected with
 * setIndex or setSlice needs.
 */
export class MerkleTree extends SubtreeStack {
  constructor(hasher: Hasher) {
    super(hasher, (data) => leafHash(hasher, data));
  }
}
