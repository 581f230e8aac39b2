/**
 * Segment Reader
 * Splits byte streams into fixed-size leaves and feeds them to a tree
 *
 * No padding is added: every segment is `segmentSize` bytes except the last,
 * which holds whatever remains.
 */

import type { Hasher } from "../merkle/hash.ts";
import { MerkleTree } from "../merkle/tree.ts";
import { MerkleUsageError } from "../merkle/errors.ts";

/**
 * Byte source: a Node stream, an async generator or a plain array of chunks
 */
export type ByteSource = AsyncIterable<Uint8Array> | Iterable<Uint8Array>;

/**
 * Anything leaves can be pushed into
 */
export interface LeafSink {
  push(data: Uint8Array): void;
}

/**
 * Reader proof
 */
export interface ReaderProof {
  merkleRoot: Uint8Array;
  proofSet: Uint8Array[];
  numLeaves: number;
}

/**
 * Yield consecutive segments of the source
 */
export async function* segments(source: ByteSource, segmentSize: number): AsyncGenerator<Uint8Array> {
  assertSegmentSize(segmentSize);

  let pending = new Uint8Array(segmentSize);
  let filled = 0;

  for await (const chunk of source) {
    let offset = 0;
    while (offset < chunk.length) {
      const take = Math.min(segmentSize - filled, chunk.length - offset);
      pending.set(chunk.subarray(offset, offset + take), filled);
      filled += take;
      offset += take;

      if (filled === segmentSize) {
        yield pending;
        pending = new Uint8Array(segmentSize);
        filled = 0;
      }
    }
  }

  // Short final segment
  if (filled > 0) {
    yield pending.slice(0, filled);
  }
}

/**
 * Push every segment of the source into the sink
 * Returns the number of segments pushed
 */
export async function readAll(sink: LeafSink, source: ByteSource, segmentSize: number): Promise<number> {
  let count = 0;
  for await (const segment of segments(source, segmentSize)) {
    sink.push(segment);
    count++;
  }
  return count;
}

/**
 * Merkle root of the source's segments, null for an empty source
 */
export async function readerRoot(
  source: ByteSource,
  hasher: Hasher,
  segmentSize: number
): Promise<Uint8Array | null> {
  const tree = new MerkleTree(hasher);
  await readAll(tree, source, segmentSize);
  return tree.root();
}

/**
 * Proof that the segment at `index` is part of the source's Merkle tree
 */
export async function buildReaderProof(
  source: ByteSource,
  hasher: Hasher,
  segmentSize: number,
  index: number
): Promise<ReaderProof> {
  const tree = new MerkleTree(hasher);
  tree.setIndex(index);
  await readAll(tree, source, segmentSize);

  const { merkleRoot, proofSet, numLeaves } = tree.prove();
  if (merkleRoot === null || proofSet === null) {
    throw new MerkleUsageError(`Index ${index} was not reached while reading ${numLeaves} segments`);
  }

  return { merkleRoot, proofSet, numLeaves };
}

function assertSegmentSize(segmentSize: number): void {
  if (!Number.isSafeInteger(segmentSize) || segmentSize <= 0) {
    throw new MerkleUsageError(`Segment size must be a positive integer, got ${segmentSize}`);
  }
}
