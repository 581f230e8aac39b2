/**
 * CLI Command Contract Tests
 * root, prove and verify against files on disk
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { root } from "../../src/cli/commands/root.ts";
import { prove } from "../../src/cli/commands/prove.ts";
import { verify } from "../../src/cli/commands/verify.ts";
import { decodeProofBundle, encodeProofBundle } from "../../src/lib/encoding/proof-bundle.ts";
import { CachedTree } from "../../src/lib/merkle/cached-tree.ts";
import { createHasher } from "../../src/lib/merkle/hash.ts";
import { MerkleTree } from "../../src/lib/merkle/tree.ts";

const testDir = path.resolve("./.test-commands");

describe("CLI commands", () => {
  const originalHome = process.env.HOME;

  beforeEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
    fs.mkdirSync(testDir, { recursive: true });
    // No config file: defaults apply
    process.env.HOME = testDir;
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    process.env.HOME = originalHome;
    vi.restoreAllMocks();
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true });
    }
  });

  function writeData(name: string, data: Uint8Array): string {
    const file = path.join(testDir, name);
    fs.writeFileSync(file, data);
    return file;
  }

  test("root reports the root of one-byte segments", async () => {
    const file = writeData("eight.bin", new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));

    const summary = await root({ file, overrides: { segmentSize: 1 } });

    expect(summary).toEqual({
      file,
      algorithm: "sha256",
      segmentSize: 1,
      leaves: 8,
      root: "c1ad6548cb4c7663110df219ec8b36ca63b01158956f4be31a38a88d0c7f7071",
    });
  });

  test("root of an empty file is null", async () => {
    const file = writeData("empty.bin", new Uint8Array(0));

    const summary = await root({ file });

    expect(summary.leaves).toBe(0);
    expect(summary.root).toBeNull();
  });

  test("root rejects a missing file", async () => {
    await expect(root({ file: path.join(testDir, "missing.bin") })).rejects.toThrow("File not found");
  });

  test("prove writes a bundle that verify accepts", async () => {
    const file = writeData("data.bin", Uint8Array.from({ length: 500 }, (_, i) => i % 251));

    const bundlePath = await prove({ file, begin: 3, end: 5 });
    const bundle = decodeProofBundle(new Uint8Array(fs.readFileSync(bundlePath)));

    expect(bundlePath).toBe(`${file}.proof`);
    expect(bundle.proofBegin).toBe(3);
    expect(bundle.proofEnd).toBe(5);
    expect(bundle.numLeaves).toBe(8);
    expect(await verify({ bundle: bundlePath })).toBe(true);
  });

  test("prove honours --out and the segment size", async () => {
    const file = writeData("data.bin", new Uint8Array(100).fill(7));
    const out = path.join(testDir, "custom.proof");

    await prove({ file, begin: 9, end: 10, out, overrides: { segmentSize: 10, outputFormat: "json" } });

    const bundle = decodeProofBundle(new Uint8Array(fs.readFileSync(out)));
    expect(bundle.numLeaves).toBe(10);
    expect(bundle.proofSet[0]).toEqual(new Uint8Array(10).fill(7));
  });

  test("prove rejects a range past the end of the file", async () => {
    const file = writeData("small.bin", new Uint8Array(64));

    await expect(prove({ file, begin: 1, end: 2 })).rejects.toThrow("not reached");
  });

  test("verify rejects a tampered bundle", async () => {
    const file = writeData("data.bin", new Uint8Array(300).fill(1));
    const bundlePath = await prove({ file, begin: 0, end: 1 });

    const bundle = decodeProofBundle(new Uint8Array(fs.readFileSync(bundlePath)));
    bundle.proofSet[0] = new Uint8Array(64).fill(2);
    fs.writeFileSync(bundlePath, encodeProofBundle(bundle));

    expect(await verify({ bundle: bundlePath, format: "json" })).toBe(false);
  });

  test("verify checks bundles of cached elements", async () => {
    const hasher = createHasher();
    const cached = new CachedTree(hasher, 2);
    cached.setSlice(4, 12);
    for (let unit = 0; unit < 5; unit++) {
      const block = new MerkleTree(hasher);
      for (let i = 0; i < 4; i++) {
        block.push(new Uint8Array([unit, i]));
      }
      const blockRoot = block.root();
      if (blockRoot === null) {
        throw new Error("block root must not be null");
      }
      cached.push(blockRoot);
    }

    const { merkleRoot, proofSet, proofBegin, numLeaves } = cached.proveCached();
    if (merkleRoot === null || proofSet === null) {
      throw new Error("proof must be ready");
    }
    const bundlePath = path.join(testDir, "cached.proof");
    fs.writeFileSync(
      bundlePath,
      encodeProofBundle({ algorithm: "sha256", merkleRoot, proofSet, proofBegin, proofEnd: 12, numLeaves, cachedNodeHeight: 2 })
    );

    expect(numLeaves).toBe(20);
    expect(await verify({ bundle: bundlePath })).toBe(true);

    // Same proof read as plain leaves does not verify
    fs.writeFileSync(
      bundlePath,
      encodeProofBundle({ algorithm: "sha256", merkleRoot, proofSet, proofBegin, proofEnd: 12, numLeaves })
    );
    expect(await verify({ bundle: bundlePath })).toBe(false);
  });
});
