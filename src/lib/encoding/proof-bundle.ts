/**
 * Proof Bundle Encoding
 * CBOR container for a proof set with everything needed to verify it
 */

import { encode as cborEncode, decode as cborDecode } from "cbor-x";
import { ProofEncodingError } from "../merkle/errors.ts";

/**
 * Current bundle format version
 */
export const PROOF_BUNDLE_VERSION = 1;

/**
 * Proof Bundle
 * proofSet is verified against leaves [proofBegin, proofEnd) of a tree with numLeaves leaves
 */
export interface ProofBundle {
  algorithm: string;
  merkleRoot: Uint8Array;
  proofSet: Uint8Array[];
  proofBegin: number;
  proofEnd: number;
  numLeaves: number;
  cachedNodeHeight?: number; // Set when the leading elements are cached roots
}

/**
 * Encode a proof bundle as a CBOR map
 */
export function encodeProofBundle(bundle: ProofBundle): Uint8Array {
  const map: Record<string, unknown> = {
    v: PROOF_BUNDLE_VERSION,
    alg: bundle.algorithm,
    // Buffer keeps cbor-x from tagging typed arrays (d840)
    root: Buffer.from(bundle.merkleRoot),
    proof: bundle.proofSet.map((element) => Buffer.from(element)),
    begin: bundle.proofBegin,
    end: bundle.proofEnd,
    leaves: bundle.numLeaves,
  };
  if (bundle.cachedNodeHeight !== undefined) {
    map.cached = bundle.cachedNodeHeight;
  }

  return new Uint8Array(cborEncode(map));
}

/**
 * Decode and validate a CBOR proof bundle
 */
export function decodeProofBundle(data: Uint8Array): ProofBundle {
  let decoded: unknown;
  try {
    decoded = cborDecode(data);
  } catch (error) {
    throw new ProofEncodingError(
      "Proof bundle is not valid CBOR",
      error instanceof Error ? error : undefined
    );
  }

  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded) || decoded instanceof Uint8Array) {
    throw new ProofEncodingError("Proof bundle must be a CBOR map");
  }
  const fields: Map<unknown, unknown> =
    decoded instanceof Map ? decoded : new Map<unknown, unknown>(Object.entries(decoded));

  const version = fields.get("v");
  if (version !== PROOF_BUNDLE_VERSION) {
    throw new ProofEncodingError(`Unsupported proof bundle version: ${String(version)}`);
  }

  const algorithm = fields.get("alg");
  if (typeof algorithm !== "string" || algorithm.length === 0) {
    throw new ProofEncodingError("Proof bundle algorithm must be a non-empty string");
  }

  const proof = fields.get("proof");
  if (!Array.isArray(proof)) {
    throw new ProofEncodingError("Proof bundle proof set must be an array");
  }

  const bundle: ProofBundle = {
    algorithm,
    merkleRoot: toBytes(fields.get("root"), "root"),
    proofSet: proof.map((element: unknown, i: number) => toBytes(element, `proof[${i}]`)),
    proofBegin: toIndex(fields.get("begin"), "begin"),
    proofEnd: toIndex(fields.get("end"), "end"),
    numLeaves: toIndex(fields.get("leaves"), "leaves"),
  };

  if (fields.has("cached")) {
    bundle.cachedNodeHeight = toIndex(fields.get("cached"), "cached");
  }

  return bundle;
}

/**
 * Copy into a plain Uint8Array (cbor-x yields Buffers under Node)
 */
function toBytes(value: unknown, field: string): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new ProofEncodingError(`Proof bundle field ${field} must be a byte string`);
  }
  return new Uint8Array(value);
}

function toIndex(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new ProofEncodingError(`Proof bundle field ${field} must be a non-negative integer`);
  }
  return value;
}
