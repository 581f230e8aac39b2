/**
 * Cached Merkle Tree
 * Roots and proofs from the cached roots of fixed-height subtrees
 */

import type { Hasher } from "./hash.ts";
import { SubtreeStack, assertRange, type ProofResult } from "./subtree-stack.ts";
import { MerkleUsageError } from "./errors.ts";

/**
 * Cached Merkle tree
 *
 * Every pushed element is the root of a full tree of 2^cachedNodeHeight
 * leaves, so unchanged regions of a dataset are never rehashed. The resulting
 * root equals the root of a MerkleTree over the original leaves. Proof ranges
 * are given in original leaves, not in cached elements.
 */
export class CachedTree {
  private readonly stack: SubtreeStack;
  private readonly leavesPerCachedNode: number;
  private trueProofBegin = 0;
  private trueProofEnd = 1;
  private cachedBegin = 0;
  private cachedEnd = 1;

  constructor(hasher: Hasher, readonly cachedNodeHeight: number) {
    if (!isCachedNodeHeight(cachedNodeHeight)) {
      throw new MerkleUsageError(`Invalid cached node height: ${cachedNodeHeight}`);
    }
    this.leavesPerCachedNode = 2 ** cachedNodeHeight;
    this.stack = new SubtreeStack(hasher, (sum) => new Uint8Array(sum));
  }

  /**
   * Number of cached elements pushed so far
   */
  get size(): number {
    return this.stack.size;
  }

  /**
   * Number of original leaves covered by the pushed elements
   */
  get numLeaves(): number {
    return this.leavesPerCachedNode * this.stack.size;
  }

  /**
   * Select the original leaf whose proof will be built
   */
  setIndex(index: number): void {
    this.setSlice(index, index + 1);
  }

  /**
   * Select the original leaves [begin, end) whose proof will be built
   * A range touching several cached elements must cover each of them entirely
   */
  setSlice(begin: number, end: number): void {
    if (this.stack.size > 0) {
      throw new MerkleUsageError("Cannot set the proof range after leaves have been pushed; reset the tree first");
    }
    assertRange(begin, end);

    const per = this.leavesPerCachedNode;
    const cachedBegin = Math.floor(begin / per);
    const cachedEnd = Math.floor((end - 1) / per) + 1;
    if (cachedEnd !== cachedBegin + 1 && (begin % per !== 0 || end % per !== 0)) {
      throw new MerkleUsageError(
        `Proof range [${begin}, ${end}) spans several cached elements without covering them entirely`
      );
    }

    this.stack.setSlice(cachedBegin, cachedEnd);
    this.trueProofBegin = begin;
    this.trueProofEnd = end;
    this.cachedBegin = cachedBegin;
    this.cachedEnd = cachedEnd;
  }

  /**
   * Return to the freshly constructed state
   */
  reset(): void {
    this.stack.reset();
    this.trueProofBegin = 0;
    this.trueProofEnd = 1;
    this.cachedBegin = 0;
    this.cachedEnd = 1;
  }

  /**
   * Append the root of the next cached subtree
   */
  push(cachedRoot: Uint8Array): void {
    if (!Number.isSafeInteger(this.leavesPerCachedNode * (this.stack.size + 1))) {
      throw new MerkleUsageError(`Leaf count would exceed ${Number.MAX_SAFE_INTEGER}`);
    }
    this.stack.push(cachedRoot);
  }

  /**
   * Merkle root, null for an empty tree
   */
  root(): Uint8Array | null {
    return this.stack.root();
  }

  /**
   * Build a proof over the original leaves
   *
   * `cachedProofSet` proves the selected range inside its cached element, as
   * produced by a MerkleTree over that element's leaves. When the range covers
   * several whole elements it is their leaves, in order. The stack's own
   * leading elements are cached roots that this proof replaces, so they are
   * cut from its tail.
   */
  prove(cachedProofSet: readonly Uint8Array[]): ProofResult {
    const numLeaves = this.numLeaves;
    const cut = this.cachedEnd - this.cachedBegin;

    const { merkleRoot, proofSet: tail } = this.stack.prove();
    if (tail === null || tail.length < cut) {
      return { merkleRoot, proofSet: null, proofBegin: this.trueProofBegin, numLeaves };
    }

    return {
      merkleRoot,
      proofSet: [...cachedProofSet, ...tail.slice(cut)],
      proofBegin: this.trueProofBegin,
      numLeaves,
    };
  }

  /**
   * Build a proof whose leading elements are cached roots
   * Only valid when the range covers whole cached elements; verify it with
   * verifyProofOfCachedElements
   */
  proveCached(): ProofResult {
    const numLeaves = this.numLeaves;

    const { merkleRoot, proofSet } = this.stack.prove();
    if (proofSet === null || proofSet.length < 1) {
      return { merkleRoot, proofSet: null, proofBegin: this.trueProofBegin, numLeaves };
    }
    if ((this.trueProofEnd - this.trueProofBegin) % this.leavesPerCachedNode !== 0) {
      // Part of a single cached element
      return { merkleRoot, proofSet: null, proofBegin: this.trueProofBegin, numLeaves };
    }

    return { merkleRoot, proofSet, proofBegin: this.trueProofBegin, numLeaves };
  }
}

/**
 * Heights whose element size 2^height is a safe integer
 */
export function isCachedNodeHeight(height: number): boolean {
  return Number.isSafeInteger(height) && height >= 0 && Number.isSafeInteger(2 ** height);
}
