/**
 * Prove Command
 * Builds a proof bundle for one segment or a range of segments of a file
 */

import * as fs from "fs";
import { createHasher } from "../../lib/merkle/hash.ts";
import { MerkleTree } from "../../lib/merkle/tree.ts";
import { readAll } from "../../lib/readers/segment-reader.ts";
import { encodeProofBundle, type ProofBundle } from "../../lib/encoding/proof-bundle.ts";
import type { ToolConfig } from "../../types/config.ts";
import { resolveConfig } from "../utils/config.ts";
import { header, info, keyValue, printObject, printTable, success, toHex } from "../utils/output.ts";

/**
 * Prove command options
 */
export interface ProveOptions {
  file: string;
  begin: number;
  end: number;
  out?: string;
  overrides?: Partial<ToolConfig>;
  config?: string;
}

/**
 * Build, write and describe a proof bundle
 * Returns the path the bundle was written to
 */
export async function prove(options: ProveOptions): Promise<string> {
  const config = resolveConfig(options.overrides ?? {}, options.config);

  if (!fs.existsSync(options.file)) {
    throw new Error(`File not found: ${options.file}`);
  }

  const hasher = createHasher(config.hashAlgorithm);
  const tree = new MerkleTree(hasher);
  tree.setSlice(options.begin, options.end);
  await readAll(tree, fs.createReadStream(options.file), config.segmentSize);

  const { merkleRoot, proofSet, proofBegin, numLeaves } = tree.prove();
  if (merkleRoot === null || proofSet === null) {
    throw new Error(
      `Segments [${options.begin}, ${options.end}) not reached: file has ${numLeaves} segments of ${config.segmentSize} bytes`
    );
  }

  const bundle: ProofBundle = {
    algorithm: hasher.algorithm,
    merkleRoot,
    proofSet,
    proofBegin,
    proofEnd: options.end,
    numLeaves,
  };

  const outPath = options.out ?? `${options.file}.proof`;
  fs.writeFileSync(outPath, encodeProofBundle(bundle));

  const segmentCount = options.end - options.begin;
  if (config.outputFormat === "json") {
    printObject({
      file: options.file,
      proof: outPath,
      algorithm: bundle.algorithm,
      root: toHex(merkleRoot),
      begin: proofBegin,
      end: options.end,
      leaves: numLeaves,
      elements: proofSet.map(toHex),
    }, "json");
  } else {
    header("Proof");
    keyValue("Root", toHex(merkleRoot));
    keyValue("Range", `[${proofBegin}, ${options.end})`);
    keyValue("Leaves", numLeaves);
    info("Elements:");
    printTable(
      ["#", "Kind", "Bytes", "Prefix"],
      proofSet.map((element, i) => [
        String(i),
        i < segmentCount ? "segment" : "hash",
        String(element.length),
        toHex(element.subarray(0, 8)),
      ])
    );
    success(`Proof written to ${outPath}`);
  }

  return outPath;
}
