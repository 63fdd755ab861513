/**
 * Tree nodes and level-order index arithmetic.
 *
 * A tree of height h is a flat array of 2^(h+1) - 1 slots:
 *   root        = 0
 *   children(i) = 2i + 1, 2i + 2
 *   leaves      = [2^h - 1, 2^(h+1) - 1)
 */

import type { Digest, HashFunction } from "./hash.js";

export type NodeKind = "leaf" | "internal";

export interface TreeNode {
  readonly kind: NodeKind;
  readonly digest: Digest;
}

export function leafNode(hasher: HashFunction, data: Uint8Array): TreeNode {
  return { kind: "leaf", digest: hasher.hashLeaf(data) };
}

/** Left/right order is positional and never swapped. */
export function internalNode(hasher: HashFunction, left: TreeNode, right: TreeNode): TreeNode {
  return { kind: "internal", digest: hasher.hashInternal(left.digest, right.digest) };
}

// ── Index arithmetic ───────────────────────────────────────────────

export function nodeCount(height: number): number {
  return 2 ** (height + 1) - 1;
}

/** Slot of leaf 0. */
export function firstLeafIndex(height: number): number {
  return 2 ** height - 1;
}

export function leftChildOf(index: number): number {
  return 2 * index + 1;
}

export function parentOf(index: number): number {
  return Math.floor((index - 1) / 2);
}

/** Left children sit at odd slots. The root has no sibling. */
export function isLeftChild(index: number): boolean {
  return index % 2 === 1;
}

export function siblingOf(index: number): number {
  return isLeftChild(index) ? index + 1 : index - 1;
}
