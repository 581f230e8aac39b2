/**
 * Root Command
 * Computes the Merkle root of a file split into fixed-size segments
 */

import * as fs from "fs";
import { createHasher } from "../../lib/merkle/hash.ts";
import { MerkleTree } from "../../lib/merkle/tree.ts";
import { readAll } from "../../lib/readers/segment-reader.ts";
import type { ToolConfig } from "../../types/config.ts";
import { resolveConfig } from "../utils/config.ts";
import { printObject, toHex } from "../utils/output.ts";

/**
 * Root command options
 */
export interface RootOptions {
  file: string;
  overrides?: Partial<ToolConfig>;
  config?: string;
}

/**
 * Root command result
 */
export interface RootSummary {
  file: string;
  algorithm: string;
  segmentSize: number;
  leaves: number;
  root: string | null;
}

/**
 * Compute and print the root of a file
 */
export async function root(options: RootOptions): Promise<RootSummary> {
  const config = resolveConfig(options.overrides ?? {}, options.config);

  if (!fs.existsSync(options.file)) {
    throw new Error(`File not found: ${options.file}`);
  }

  const hasher = createHasher(config.hashAlgorithm);
  const tree = new MerkleTree(hasher);
  const leaves = await readAll(tree, fs.createReadStream(options.file), config.segmentSize);
  const merkleRoot = tree.root();

  const summary: RootSummary = {
    file: options.file,
    algorithm: hasher.algorithm,
    segmentSize: config.segmentSize,
    leaves,
    root: merkleRoot ? toHex(merkleRoot) : null,
  };

  printObject({ ...summary }, config.outputFormat);
  return summary;
}
