/**
 * Segment Reader Tests
 * Chunking byte streams into leaves without padding
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { createHasher } from "../../../src/lib/merkle/hash.ts";
import { MerkleTree } from "../../../src/lib/merkle/tree.ts";
import { verifyProof } from "../../../src/lib/merkle/verify.ts";
import { MerkleUsageError } from "../../../src/lib/merkle/errors.ts";
import {
  segments,
  readAll,
  readerRoot,
  buildReaderProof,
} from "../../../src/lib/readers/segment-reader.ts";

const hasher = createHasher();
const hex = (bytes: Uint8Array | null) => (bytes === null ? null : Buffer.from(bytes).toString("hex"));

function bytes(count: number, start: number = 0): Uint8Array {
  return Uint8Array.from({ length: count }, (_, i) => (start + i) % 256);
}

async function collect(source: AsyncIterable<Uint8Array>): Promise<Uint8Array[]> {
  const out: Uint8Array[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

describe("segments", () => {
  test("leaves the last segment short", async () => {
    const out = await collect(segments([bytes(10)], 4));

    expect(out).toEqual([bytes(4, 0), bytes(4, 4), bytes(2, 8)]);
  });

  test("does not emit an empty trailing segment", async () => {
    const out = await collect(segments([bytes(8)], 4));

    expect(out.map((segment) => segment.length)).toEqual([4, 4]);
  });

  test("reassembles segments across chunk boundaries", async () => {
    const out = await collect(segments([bytes(3, 0), bytes(1, 3), bytes(6, 4), bytes(0), bytes(1, 10)], 5));

    expect(out).toEqual([bytes(5, 0), bytes(5, 5), bytes(1, 10)]);
  });

  test("accepts async sources", async () => {
    async function* source() {
      yield bytes(2, 0);
      yield bytes(2, 2);
    }

    const out = await collect(segments(source(), 3));

    expect(out).toEqual([bytes(3, 0), bytes(1, 3)]);
  });

  test("yields nothing for an empty source", async () => {
    expect(await collect(segments([], 4))).toEqual([]);
  });

  test("rejects non-positive segment sizes", async () => {
    await expect(collect(segments([bytes(4)], 0))).rejects.toThrow(MerkleUsageError);
    await expect(collect(segments([bytes(4)], -2))).rejects.toThrow(MerkleUsageError);
  });
});

describe("readerRoot", () => {
  test("matches pushing the segments by hand", async () => {
    const tree = new MerkleTree(hasher);
    tree.push(bytes(4, 0));
    tree.push(bytes(4, 4));
    tree.push(bytes(2, 8));

    const root = await readerRoot([bytes(10)], hasher, 4);

    expect(hex(root)).toBe(hex(tree.root()));
  });

  test("does not zero-pad the last segment", async () => {
    const unpadded = await readerRoot([bytes(10)], hasher, 4);
    const padded = await readerRoot([bytes(10), new Uint8Array(2)], hasher, 4);

    expect(hex(unpadded)).not.toBe(hex(padded));
  });

  test("one-byte segments reproduce the eight-leaf root", async () => {
    const root = await readerRoot([bytes(8, 1)], hasher, 1);

    expect(hex(root)).toBe("c1ad6548cb4c7663110df219ec8b36ca63b01158956f4be31a38a88d0c7f7071");
  });

  test("is null for an empty source", async () => {
    expect(await readerRoot([], hasher, 64)).toBeNull();
  });
});

describe("buildReaderProof", () => {
  test("proves a segment", async () => {
    const data = bytes(100);

    const { merkleRoot, proofSet, numLeaves } = await buildReaderProof([data], hasher, 16, 6);

    expect(numLeaves).toBe(7);
    expect(proofSet[0]).toEqual(bytes(4, 96));
    expect(verifyProof(hasher, merkleRoot, proofSet, 6, numLeaves)).toBe(true);
  });

  test("fails when the index is never reached", async () => {
    await expect(buildReaderProof([bytes(100)], hasher, 16, 7)).rejects.toThrow(MerkleUsageError);
  });
});

describe("readAll from files", () => {
  const testDir = "./.test-segment-reader";

  beforeEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
    fs.mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
  });

  test("streams a file into a tree", async () => {
    const file = path.join(testDir, "data.bin");
    const data = bytes(1000);
    fs.writeFileSync(file, data);

    const tree = new MerkleTree(hasher);
    const count = await readAll(tree, fs.createReadStream(file, { highWaterMark: 100 }), 64);

    expect(count).toBe(16);
    expect(tree.size).toBe(16);
    expect(hex(tree.root())).toBe(hex(await readerRoot([data], hasher, 64)));
  });
});
