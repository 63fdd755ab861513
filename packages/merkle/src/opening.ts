/**
 * Inclusion openings: self-contained proofs that a leaf value sits at
 * a given index under a root.
 *
 * acc = hashLeaf(leafValue)
 * for each step, leaf to root:
 *   acc = side === "left" ? hashInternal(step, acc) : hashInternal(acc, step)
 * valid iff acc == root
 */

import { equalDigests, sha256Hasher, type Digest, type HashFunction } from "./hash.js";
import { MAX_HEIGHT_CEILING } from "./constants.js";

/** Side the sibling occupies relative to the path node. */
export type Side = "left" | "right";

export interface PathStep {
  readonly digest: Digest;
  readonly side: Side;
}

export interface Opening {
  readonly leafIndex: number;
  readonly leafValue: Uint8Array;
  /** Exactly `height` steps, leaf level first. */
  readonly siblingPath: readonly PathStep[];
}

export interface VerifyOptions {
  /** Must match the hasher the tree was built with. Defaults to sha256Hasher. */
  hasher?: HashFunction;
  /** When given, a path of any other length is rejected. */
  height?: number;
}

/** Sibling side implied by bit `level` of the leaf index. */
export function expectedSide(leafIndex: number, level: number): Side {
  return Math.floor(leafIndex / 2 ** level) % 2 === 1 ? "left" : "right";
}

/**
 * Check an opening against a root. Malformed openings (wrong path
 * length, wrong digest size, index outside the path's range, sides that
 * disagree with the index) return false. Never throws.
 */
export function verifyOpening(
  opening: Opening,
  root: Digest,
  options: VerifyOptions = {},
): boolean {
  const hasher = options.hasher ?? sha256Hasher;
  const { leafIndex, leafValue, siblingPath } = opening;
  const depth = siblingPath.length;

  if (depth > MAX_HEIGHT_CEILING) return false;
  if (options.height !== undefined && depth !== options.height) return false;
  if (root.length !== hasher.digestSize) return false;
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= 2 ** depth) return false;

  let acc = hasher.hashLeaf(leafValue);

  for (let level = 0; level < depth; level++) {
    const step = siblingPath[level]!;
    if (step.digest.length !== hasher.digestSize) return false;
    if (step.side !== expectedSide(leafIndex, level)) return false;

    acc =
      step.side === "left"
        ? hasher.hashInternal(step.digest, acc)
        : hasher.hashInternal(acc, step.digest);
  }

  return equalDigests(acc, root);
}
