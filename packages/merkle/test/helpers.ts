/**
 * Reference hashing for test vectors, computed straight from SHA-256
 * with the prefix bytes spelled out.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, concatBytes, utf8ToBytes } from "@noble/hashes/utils";

export function refLeaf(data: string): Uint8Array {
  return sha256(concatBytes(new Uint8Array([0x00]), utf8ToBytes(data)));
}

export function refNode(left: Uint8Array, right: Uint8Array): Uint8Array {
  return sha256(concatBytes(new Uint8Array([0x01]), left, right));
}

export const hex = bytesToHex;

/** 4-byte FNV-1a. Not cryptographic; proves the tree only needs the contract. */
export function fnv1a32(input: Uint8Array): Uint8Array {
  let h = 0x811c9dc5;
  for (const byte of input) {
    h ^= byte;
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, h, false);
  return out;
}

/** Error code of whatever `fn` throws, "none" if it returns. */
export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    return "non-merkle";
  }
  return "none";
}
