/**
 * Merkle Proof Verification
 * Rebuilds a root from a proof set and the claimed range using index arithmetic only
 */

import { type Hasher, areEqual, leafHash, nodeHash } from "./hash.ts";
import { isCachedNodeHeight } from "./cached-tree.ts";

/**
 * Verify that the first element of the proof set is the leaf at `proofIndex`
 * in a tree of `numLeaves` leaves with the given root
 */
export function verifyProof(
  hasher: Hasher,
  merkleRoot: Uint8Array | null,
  proofSet: readonly Uint8Array[] | null,
  proofIndex: number,
  numLeaves: number
): boolean {
  return verifyProofOfSlice(hasher, merkleRoot, proofSet, proofIndex, proofIndex + 1, numLeaves);
}

/**
 * Verify that the first proofEnd - proofBegin elements of the proof set are
 * the leaves [proofBegin, proofEnd) of the tree with the given root
 * Accepts proofs from MerkleTree.prove and CachedTree.prove
 */
export function verifyProofOfSlice(
  hasher: Hasher,
  merkleRoot: Uint8Array | null,
  proofSet: readonly Uint8Array[] | null,
  proofBegin: number,
  proofEnd: number,
  numLeaves: number
): boolean {
  return verifyRange(hasher, merkleRoot, proofSet, proofBegin, proofEnd, numLeaves, (data) =>
    leafHash(hasher, data)
  );
}

/**
 * Verify a proof returned by CachedTree.proveCached
 * Bounds are in leaves and must fall on cached element boundaries; the
 * leading proof elements are the cached element roots themselves
 */
export function verifyProofOfCachedElements(
  hasher: Hasher,
  merkleRoot: Uint8Array | null,
  proofSet: readonly Uint8Array[] | null,
  proofBegin: number,
  proofEnd: number,
  numLeaves: number,
  cachedNodeHeight: number
): boolean {
  if (!isCachedNodeHeight(cachedNodeHeight)) {
    return false;
  }

  const leavesPerCachedNode = 2 ** cachedNodeHeight;
  if (
    proofBegin % leavesPerCachedNode !== 0 ||
    proofEnd % leavesPerCachedNode !== 0 ||
    numLeaves % leavesPerCachedNode !== 0
  ) {
    return false;
  }

  return verifyRange(
    hasher,
    merkleRoot,
    proofSet,
    proofBegin / leavesPerCachedNode,
    proofEnd / leavesPerCachedNode,
    numLeaves / leavesPerCachedNode,
    (sum) => sum
  );
}

/**
 * Shared verification loop
 * Never throws: malformed input yields false
 */
function verifyRange(
  hasher: Hasher,
  merkleRoot: Uint8Array | null,
  proofSet: readonly Uint8Array[] | null,
  proofBegin: number,
  proofEnd: number,
  numLeaves: number,
  seed: (element: Uint8Array) => Uint8Array
): boolean {
  if (merkleRoot === null || merkleRoot.length !== hasher.size || proofSet === null) {
    return false;
  }
  if (!isIndex(proofBegin) || !isIndex(proofEnd) || !isIndex(numLeaves)) {
    return false;
  }
  if (proofBegin >= proofEnd || proofEnd > numLeaves) {
    return false;
  }

  let cursor = 0;
  const next = (): Uint8Array | undefined =>
    cursor < proofSet.length ? proofSet[cursor++] : undefined;

  // Hashes of the claimed range on the leaf level
  let sums: Uint8Array[] = [];
  for (let i = proofBegin; i < proofEnd; i++) {
    const element = next();
    if (element === undefined) {
      return false;
    }
    sums.push(seed(element));
  }

  // One iteration per level. proofBegin, proofEnd and numLeaves keep their
  // meaning on each level; sums holds the hashes of the range on that level.
  while (numLeaves > 1) {
    if (proofBegin % 2 === 1) {
      // Left neighbour of the range
      const left = next();
      if (left === undefined || left.length !== hasher.size) {
        return false;
      }
      sums.unshift(left);
      proofBegin -= 1;
    }
    if (sums.length % 2 === 1 && proofEnd < numLeaves) {
      // Right neighbour of the range
      const right = next();
      if (right === undefined || right.length !== hasher.size) {
        return false;
      }
      sums.push(right);
      proofEnd += 1;
    }

    const parents: Uint8Array[] = [];
    for (let i = 0; i + 1 < sums.length; i += 2) {
      parents.push(nodeHash(hasher, sums[i], sums[i + 1]));
    }
    if (sums.length % 2 === 1) {
      // Orphan: promoted unchanged
      parents.push(sums[sums.length - 1]);
    }
    sums = parents;

    proofBegin = Math.floor(proofBegin / 2);
    // End bounds are exclusive
    proofEnd = Math.floor((proofEnd + 1) / 2);
    numLeaves = Math.floor((numLeaves + 1) / 2);
  }

  if (cursor !== proofSet.length) {
    return false;
  }

  return areEqual(sums[0], merkleRoot);
}

function isIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
