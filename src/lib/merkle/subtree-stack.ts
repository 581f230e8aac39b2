/**
 * Subtree Stack
 * Incremental Merkle root and range proof construction in O(log n) memory
 */

import { type Hasher, nodeHash } from "./hash.ts";
import { ProofLadder } from "./proof-ladder.ts";
import { MerkleInvariantError, MerkleUsageError } from "./errors.ts";

/**
 * Join and ordering checks run outside production
 */
const DEBUG = process.env.NODE_ENV !== "production";

/**
 * Complete subtree of 2^height leaves covering [begin, end)
 */
export interface SubtreeNode {
  height: number;
  begin: number;
  end: number;
  sum: Uint8Array;
}

/**
 * Turns pushed data into the sum of a height-0 subtree
 */
export type LeafTransform = (data: Uint8Array) => Uint8Array;

/**
 * Result of a proof request
 * proofSet is null until the selected range has been fully pushed
 */
export interface ProofResult {
  merkleRoot: Uint8Array | null;
  proofSet: Uint8Array[] | null;
  proofBegin: number;
  numLeaves: number;
}

/**
 * Subtree stack
 *
 * The tree is held as a stack of complete subtrees. A tree of 11 leaves is a
 * subtree of height 3 (8 leaves), one of height 1 (2 leaves) and one of
 * height 0. The last array element is the head, the smallest subtree. A
 * pushed leaf enters as a subtree of height 0 and is joined with the head for
 * as long as both have the same height.
 *
 * While leaves are pushed, the stack also records the leaves inside the proof
 * range (`bases`) and the sibling hashes the range proof needs (`ladder`).
 * Pushed data is copied in, and roots and proof elements are copied out.
 */
export class SubtreeStack {
  private nodes: SubtreeNode[] = [];
  private currentIndex = 0;
  private proofBegin = 0;
  private proofEnd = 1;
  private bases: Uint8Array[] = [];
  private ladder = new ProofLadder();

  constructor(
    protected readonly hasher: Hasher,
    private readonly leafTransform: LeafTransform
  ) {}

  /**
   * Number of leaves pushed so far
   */
  get size(): number {
    return this.currentIndex;
  }

  /**
   * Select the leaf whose proof will be built
   * Must be called before the first push
   */
  setIndex(index: number): void {
    this.setSlice(index, index + 1);
  }

  /**
   * Select the leaves [begin, end) whose proof will be built
   * Must be called before the first push
   */
  setSlice(begin: number, end: number): void {
    if (this.nodes.length > 0) {
      throw new MerkleUsageError("Cannot set the proof range after leaves have been pushed; reset the tree first");
    }
    assertRange(begin, end);

    this.proofBegin = begin;
    this.proofEnd = end;
    this.bases = [];
    this.ladder.clear();
  }

  /**
   * Return to the freshly constructed state
   */
  reset(): void {
    this.nodes = [];
    this.currentIndex = 0;
    this.proofBegin = 0;
    this.proofEnd = 1;
    this.bases = [];
    this.ladder.clear();
  }

  /**
   * Append a leaf
   */
  push(data: Uint8Array): void {
    // Leaves inside the proof range open the proof set
    if (this.proofBegin <= this.currentIndex && this.currentIndex < this.proofEnd) {
      this.bases.push(new Uint8Array(data));
    }

    let head: SubtreeNode = {
      height: 0,
      begin: this.currentIndex,
      end: this.currentIndex + 1,
      sum: this.leafTransform(data),
    };

    while (this.nodes.length > 0) {
      const next = this.nodes[this.nodes.length - 1];
      if (next.height !== head.height) {
        break;
      }
      this.nodes.pop();

      // A hash goes into the proof iff exactly one side overlaps the range
      const headInRange = this.overlaps(head);
      const nextInRange = this.overlaps(next);
      if (headInRange && !nextInRange) {
        this.ladder.add(head.height, next.sum);
      } else if (!headInRange && nextInRange) {
        this.ladder.add(head.height, head.sum);
      }

      head = this.join(next, head);
    }

    this.nodes.push(head);
    this.currentIndex++;

    if (DEBUG) {
      this.assertOrdered();
    }
  }

  /**
   * Merkle root of the leaves pushed so far, null for an empty tree
   */
  root(): Uint8Array | null {
    if (this.nodes.length === 0) {
      return null;
    }

    // Fold from the smallest subtree upwards; the taller one is always the left operand
    let current = this.nodes[this.nodes.length - 1];
    for (let i = this.nodes.length - 2; i >= 0; i--) {
      current = this.join(this.nodes[i], current);
    }
    return new Uint8Array(current.sum);
  }

  /**
   * Build the proof for the selected range
   * Does not modify the stack and may be called repeatedly
   */
  prove(): ProofResult {
    if (this.nodes.length === 0 || this.currentIndex < this.proofEnd) {
      return {
        merkleRoot: this.root(),
        proofSet: null,
        proofBegin: this.proofBegin,
        numLeaves: this.currentIndex,
      };
    }

    const proofSet = this.bases.map((base) => new Uint8Array(base));

    // Collapse the remaining subtrees into one root. The head may be shorter
    // than its neighbour here; it is treated as the same height.
    const ladder = this.ladder.clone();
    let current = this.nodes[this.nodes.length - 1];
    for (let i = this.nodes.length - 2; i >= 0; i--) {
      const next = this.nodes[i];
      const currentInRange = this.overlaps(current);
      const nextInRange = this.overlaps(next);
      if (currentInRange && !nextInRange) {
        ladder.add(next.height, next.sum);
      } else if (!currentInRange && nextInRange) {
        ladder.add(next.height, current.sum);
      }
      current = this.join(next, current);
    }
    proofSet.push(...ladder.fold().map((hash) => new Uint8Array(hash)));

    if (DEBUG && !this.overlaps(current)) {
      throw new MerkleInvariantError("Collapsed tree does not contain the proof range");
    }

    return {
      merkleRoot: new Uint8Array(current.sum),
      proofSet,
      proofBegin: this.proofBegin,
      numLeaves: this.currentIndex,
    };
  }

  /**
   * Check whether a subtree overlaps [proofBegin, proofEnd)
   */
  private overlaps(node: SubtreeNode): boolean {
    return (
      (node.begin <= this.proofBegin && this.proofBegin < node.end) ||
      (this.proofBegin <= node.begin && node.begin < this.proofEnd)
    );
  }

  /**
   * Join two subtrees; `left` covers the leaves directly before `right`
   */
  private join(left: SubtreeNode, right: SubtreeNode): SubtreeNode {
    if (DEBUG) {
      if (left.height < right.height) {
        throw new MerkleInvariantError(
          `Invalid subtree join: left height ${left.height} below right height ${right.height}`
        );
      }
      if (left.end !== right.begin) {
        throw new MerkleInvariantError(
          `Invalid subtree join: [${left.begin}, ${left.end}) and [${right.begin}, ${right.end}) are not adjacent`
        );
      }
    }

    return {
      height: left.height + 1,
      begin: left.begin,
      end: right.end,
      sum: nodeHash(this.hasher, left.sum, right.sum),
    };
  }

  /**
   * Heights must strictly increase from head to tail
   */
  private assertOrdered(): void {
    for (let i = 1; i < this.nodes.length; i++) {
      if (this.nodes[i - 1].height <= this.nodes[i].height) {
        throw new MerkleInvariantError("Subtrees are out of order");
      }
    }
  }
}

/**
 * Validate a half-open leaf range
 */
export function assertRange(begin: number, end: number): void {
  if (!Number.isSafeInteger(begin) || begin < 0) {
    throw new MerkleUsageError(`Invalid proof range begin: ${begin}`);
  }
  if (!Number.isSafeInteger(end) || end < 0) {
    throw new MerkleUsageError(`Invalid proof range end: ${end}`);
  }
  if (begin >= end) {
    throw new MerkleUsageError(`Empty proof range: [${begin}, ${end})`);
  }
}
