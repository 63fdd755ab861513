/**
 * HashFunction boundary.
 *
 * hashLeaf(d)        = H(0x00 || d)
 * hashInternal(l, r) = H(0x01 || l || r)
 *
 * The tree only ever calls these two entry points. A leaf digest and an
 * internal digest never share a preimage.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { INTERNAL_PREFIX, LEAF_PREFIX } from "./constants.js";

/** Fixed-size hash output. Length is the hasher's digestSize. */
export type Digest = Uint8Array;

/** Leaf payload. Strings are UTF-8 encoded before hashing. */
export type LeafData = Uint8Array | string;

export interface HashFunction {
  /** Length in bytes of every digest this hasher produces. */
  readonly digestSize: number;
  hashLeaf(data: Uint8Array): Digest;
  hashInternal(left: Digest, right: Digest): Digest;
}

/** Any raw one-shot byte hash, e.g. sha256 from @noble/hashes. */
export type RawHash = (input: Uint8Array) => Uint8Array;

/**
 * Wrap a raw byte hash into a domain-separated HashFunction.
 * hashInternal throws if either child is not digestSize bytes.
 */
export function createHasher(hash: RawHash, digestSize: number): HashFunction {
  if (!Number.isInteger(digestSize) || digestSize <= 0) {
    throw new Error(`createHasher: invalid digest size ${digestSize}`);
  }

  return {
    digestSize,
    hashLeaf(data: Uint8Array): Digest {
      const input = new Uint8Array(1 + data.length);
      input[0] = LEAF_PREFIX;
      input.set(data, 1);
      return hash(input);
    },
    hashInternal(left: Digest, right: Digest): Digest {
      if (left.length !== digestSize || right.length !== digestSize) {
        throw new Error(
          `hashInternal: expected ${digestSize}-byte children, got ${left.length} and ${right.length}`,
        );
      }
      const input = new Uint8Array(1 + 2 * digestSize);
      input[0] = INTERNAL_PREFIX;
      input.set(left, 1);
      input.set(right, 1 + digestSize);
      return hash(input);
    },
  };
}

/** Default hasher: SHA-256, 32-byte digests. */
export const sha256Hasher: HashFunction = createHasher(sha256, 32);

// ── Helpers ────────────────────────────────────────────────────────

/** Normalize leaf data to bytes. */
export function leafBytes(data: LeafData): Uint8Array {
  return typeof data === "string" ? utf8ToBytes(data) : data;
}

/** Digest of the padding leaf: hashLeaf(<empty bytes>). */
export function emptyLeaf(hasher: HashFunction): Digest {
  return hasher.hashLeaf(new Uint8Array(0));
}

export function equalDigests(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i]! ^ b[i]!;
  }
  return diff === 0;
}

/** Convert bytes to lower-case hex. */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** Convert hex string to bytes. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}
