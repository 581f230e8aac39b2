/**
 * Proof Ladder
 * Per-height record of the sibling hashes a range proof needs
 */

import { MerkleInvariantError } from "./errors.ts";

/**
 * At most one hash per height comes from push-time folding and one from the
 * final collapse
 */
export const MAX_RUNG_WIDTH = 2;

/**
 * Proof ladder
 * rungs[height] holds the hashes of subtrees of that height in leaf order
 */
export class ProofLadder {
  private rungs: Uint8Array[][] = [];

  /**
   * Record a sibling hash at the given height
   */
  add(height: number, hash: Uint8Array): void {
    if (this.width(height) >= MAX_RUNG_WIDTH) {
      throw new MerkleInvariantError(`More than ${MAX_RUNG_WIDTH} proof hashes at height ${height}`);
    }
    while (this.rungs.length <= height) {
      this.rungs.push([]);
    }
    this.rungs[height].push(hash);
  }

  /**
   * Deep copy, so a proof can extend the ladder without touching the tree
   */
  clone(): ProofLadder {
    const copy = new ProofLadder();
    copy.rungs = this.rungs.map((rung) => rung.slice());
    return copy;
  }

  /**
   * Drop every recorded hash
   */
  clear(): void {
    this.rungs = [];
  }

  /**
   * Number of hashes recorded at a height
   */
  width(height: number): number {
    return this.rungs[height]?.length ?? 0;
  }

  /**
   * Flatten into the proof tail: ascending height, then leaf order
   */
  fold(): Uint8Array[] {
    const tail: Uint8Array[] = [];
    for (const rung of this.rungs) {
      tail.push(...rung);
    }
    return tail;
  }
}
