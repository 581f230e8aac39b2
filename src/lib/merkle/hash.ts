/**
 * Merkle Hashing Primitives
 * RFC 6962 domain-separated leaf and node hashes over an injected hash function
 */

import { createHash, getHashes } from "node:crypto";
import { MerkleUsageError } from "./errors.ts";

/**
 * RFC 6962 leaf prefix (0x00)
 */
export const LEAF_HASH_PREFIX = new Uint8Array([0x00]);

/**
 * RFC 6962 node prefix (0x01)
 */
export const NODE_HASH_PREFIX = new Uint8Array([0x01]);

/**
 * Hash function collaborator
 * Must be deterministic, produce `size`-byte digests and keep no state between calls
 */
export interface Hasher {
  readonly algorithm: string;
  readonly size: number;
  digest(...parts: Uint8Array[]): Uint8Array;
}

/**
 * Create a hasher backed by node:crypto
 */
export function createHasher(algorithm: string = "sha256"): Hasher {
  const normalized = algorithm.toLowerCase();
  if (!isSupportedAlgorithm(normalized)) {
    throw new MerkleUsageError(`Unsupported hash algorithm: ${algorithm}`);
  }

  const digest = (...parts: Uint8Array[]): Uint8Array => {
    const hash = createHash(normalized);
    for (const part of parts) {
      hash.update(part);
    }
    return new Uint8Array(hash.digest());
  };

  return {
    algorithm: normalized,
    size: digest().length,
    digest,
  };
}

/**
 * Check whether node:crypto provides the algorithm
 */
export function isSupportedAlgorithm(algorithm: string): boolean {
  return getHashes().includes(algorithm.toLowerCase());
}

/**
 * Hash raw data without a domain prefix
 */
export function rawHash(hasher: Hasher, ...parts: Uint8Array[]): Uint8Array {
  return hasher.digest(...parts);
}

/**
 * Hash a leaf with RFC 6962 prefix (0x00)
 */
export function leafHash(hasher: Hasher, data: Uint8Array): Uint8Array {
  return hasher.digest(LEAF_HASH_PREFIX, data);
}

/**
 * Hash an internal node with RFC 6962 prefix (0x01)
 */
export function nodeHash(hasher: Hasher, left: Uint8Array, right: Uint8Array): Uint8Array {
  return hasher.digest(NODE_HASH_PREFIX, left, right);
}

/**
 * Compare two Uint8Arrays for equality
 */
export function areEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}
