/**
 * Verify Command
 * Checks a proof bundle written by the prove command
 */

import * as fs from "fs";
import { createHasher, isSupportedAlgorithm } from "../../lib/merkle/hash.ts";
import { verifyProofOfCachedElements, verifyProofOfSlice } from "../../lib/merkle/verify.ts";
import { decodeProofBundle } from "../../lib/encoding/proof-bundle.ts";
import type { OutputFormat } from "../../types/config.ts";
import { error, keyValue, printObject, success, toHex } from "../utils/output.ts";

/**
 * Verify command options
 */
export interface VerifyOptions {
  bundle: string;
  format?: OutputFormat;
}

/**
 * Verify a proof bundle file
 * Returns whether the proof holds
 */
export async function verify(options: VerifyOptions): Promise<boolean> {
  if (!fs.existsSync(options.bundle)) {
    throw new Error(`Proof bundle not found: ${options.bundle}`);
  }

  const bundle = decodeProofBundle(new Uint8Array(fs.readFileSync(options.bundle)));
  if (!isSupportedAlgorithm(bundle.algorithm)) {
    throw new Error(`Proof bundle uses unsupported hash algorithm: ${bundle.algorithm}`);
  }

  const hasher = createHasher(bundle.algorithm);
  const valid =
    bundle.cachedNodeHeight === undefined
      ? verifyProofOfSlice(hasher, bundle.merkleRoot, bundle.proofSet, bundle.proofBegin, bundle.proofEnd, bundle.numLeaves)
      : verifyProofOfCachedElements(
          hasher,
          bundle.merkleRoot,
          bundle.proofSet,
          bundle.proofBegin,
          bundle.proofEnd,
          bundle.numLeaves,
          bundle.cachedNodeHeight
        );

  if (options.format === "json") {
    printObject({
      bundle: options.bundle,
      valid,
      root: toHex(bundle.merkleRoot),
      begin: bundle.proofBegin,
      end: bundle.proofEnd,
      leaves: bundle.numLeaves,
    }, "json");
    return valid;
  }

  keyValue("Root", toHex(bundle.merkleRoot));
  keyValue("Range", `[${bundle.proofBegin}, ${bundle.proofEnd})`);
  keyValue("Leaves", bundle.numLeaves);
  if (valid) {
    success("Proof is valid");
  } else {
    error("Proof is invalid");
  }
  return valid;
}
