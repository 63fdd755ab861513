/**
 * MerkleTree: dense binary hash tree of fixed height over 2^height leaves.
 *
 * Nodes live in one level-order array (see node.ts). Unwritten leaf
 * slots hold the empty byte string, so two trees built from the same
 * height and the same leading leaves always share a root.
 *
 * Writes are two-phase:
 *   insert(i, d)              overwrite leaf i only
 *   updateInternalNodes(i)    recompute the height ancestors of leaf i
 *
 * Between the two calls getRoot() and getOpening() return digests that
 * do not reflect the new leaf. That is a caller precondition and is not
 * guarded; use set() for a single write or commit() after a batch.
 */

import type { Logger } from "pino";
import {
  emptyLeaf,
  leafBytes,
  sha256Hasher,
  toHex,
  type Digest,
  type HashFunction,
  type LeafData,
} from "./hash.js";
import {
  firstLeafIndex,
  internalNode,
  isLeftChild,
  leafNode,
  leftChildOf,
  nodeCount,
  parentOf,
  siblingOf,
  type TreeNode,
} from "./node.js";
import type { Opening, PathStep } from "./opening.js";
import { MerkleError } from "./errors.js";
import { config } from "./config.js";
import { MAX_HEIGHT_CEILING } from "./constants.js";
import { log } from "./log.js";

export interface MerkleTreeOptions {
  /** Defaults to sha256Hasher. */
  hasher?: HashFunction;
  /** Defaults to config.maxHeight. Integer in [0, MAX_HEIGHT_CEILING]. */
  maxHeight?: number;
  logger?: Logger;
}

/** JSON snapshot, digests hex-encoded. */
export interface MerkleTreeJSON {
  height: number;
  length: number;
  root: string;
  leaves: string[];
}

const EMPTY = new Uint8Array(0);

export class MerkleTree {
  readonly height: number;
  readonly capacity: number;
  readonly hasher: HashFunction;

  private readonly nodes: TreeNode[];
  private readonly values: Uint8Array[];
  private readonly pending = new Set<number>();
  private readonly logger: Logger;
  private written: number;

  private constructor(
    height: number,
    hasher: HashFunction,
    nodes: TreeNode[],
    values: Uint8Array[],
    written: number,
    logger: Logger,
  ) {
    this.height = height;
    this.capacity = 2 ** height;
    this.hasher = hasher;
    this.nodes = nodes;
    this.values = values;
    this.written = written;
    this.logger = logger;
  }

  /**
   * Build a tree of the given height from up to 2^height leaves.
   * Missing trailing leaves are padded with the empty byte string.
   * Every internal node is computed once, bottom-up.
   */
  static fromHeight(
    height: number,
    leaves: readonly LeafData[] = [],
    options: MerkleTreeOptions = {},
  ): MerkleTree {
    const maxHeight = options.maxHeight ?? config.maxHeight;
    if (!Number.isInteger(maxHeight) || maxHeight < 0 || maxHeight > MAX_HEIGHT_CEILING) {
      throw new MerkleError(
        "INVALID_HEIGHT",
        `fromHeight: maxHeight ${maxHeight} must be an integer in [0, ${MAX_HEIGHT_CEILING}]`,
      );
    }
    if (!Number.isInteger(height) || height < 0 || height > maxHeight) {
      throw new MerkleError(
        "INVALID_HEIGHT",
        `fromHeight: height ${height} must be an integer in [0, ${maxHeight}]`,
      );
    }

    const capacity = 2 ** height;
    if (leaves.length > capacity) {
      throw new MerkleError(
        "TOO_MANY_LEAVES",
        `fromHeight: ${leaves.length} leaves exceed capacity ${capacity} at height ${height}`,
      );
    }

    const hasher = options.hasher ?? sha256Hasher;
    const logger = options.logger ?? log;
    const first = firstLeafIndex(height);
    const nodes = new Array<TreeNode>(nodeCount(height));
    const values = new Array<Uint8Array>(capacity);
    const padding: TreeNode = { kind: "leaf", digest: emptyLeaf(hasher) };

    for (let i = 0; i < capacity; i++) {
      const leaf = leaves[i];
      if (leaf === undefined) {
        values[i] = EMPTY;
        nodes[first + i] = padding;
      } else {
        const bytes = leafBytes(leaf).slice();
        values[i] = bytes;
        nodes[first + i] = leafNode(hasher, bytes);
      }
    }

    for (let i = first - 1; i >= 0; i--) {
      const left = leftChildOf(i);
      nodes[i] = internalNode(hasher, nodes[left]!, nodes[left + 1]!);
    }

    const tree = new MerkleTree(height, hasher, nodes, values, leaves.length, logger);
    logger.debug({ height, leaves: leaves.length, root: toHex(tree.getRoot()) }, "merkle tree built");
    return tree;
  }

  /** One past the highest leaf slot ever written. */
  get length(): number {
    return this.written;
  }

  /** Leaf indices written but not yet propagated, ascending. */
  get pendingLeaves(): number[] {
    return [...this.pending].sort((a, b) => a - b);
  }

  get isConsistent(): boolean {
    return this.pending.size === 0;
  }

  // ── Writes ───────────────────────────────────────────────────────

  /**
   * Overwrite leaf `index` with hashLeaf(data). Ancestors are NOT
   * recomputed; call updateInternalNodes(index) or commit() before
   * relying on getRoot() or getOpening().
   */
  insert(index: number, data: LeafData): void {
    this.assertLeafIndex("insert", index);
    const bytes = leafBytes(data).slice();
    this.values[index] = bytes;
    this.nodes[firstLeafIndex(this.height) + index] = leafNode(this.hasher, bytes);
    this.pending.add(index);
    if (index >= this.written) this.written = index + 1;
  }

  /**
   * Write the next free leaf slot (slot `length`). Two-phase like insert.
   * @returns the leaf index written
   */
  append(data: LeafData): number {
    const index = this.written;
    if (index >= this.capacity) {
      throw new MerkleError("TREE_FULL", `append: tree of capacity ${this.capacity} is full`);
    }
    this.insert(index, data);
    return index;
  }

  /**
   * Recompute the ancestors of leaf `index`, leaf to root, each from its
   * current children. Visits exactly `height` nodes.
   */
  updateInternalNodes(index: number): void {
    this.assertLeafIndex("updateInternalNodes", index);
    let node = firstLeafIndex(this.height) + index;
    for (let level = 0; level < this.height; level++) {
      node = parentOf(node);
      const left = leftChildOf(node);
      this.nodes[node] = internalNode(this.hasher, this.nodes[left]!, this.nodes[left + 1]!);
    }
    this.pending.delete(index);
  }

  /** insert() then updateInternalNodes() for a single leaf. */
  set(index: number, data: LeafData): void {
    this.insert(index, data);
    this.updateInternalNodes(index);
  }

  /**
   * Propagate every pending leaf in one pass. Each ancestor shared by
   * several pending leaves is recomputed once.
   * @returns the number of leaves propagated
   */
  commit(): number {
    const count = this.pending.size;
    if (count === 0) return 0;

    const first = firstLeafIndex(this.height);
    const dirty = new Set<number>();
    for (const index of this.pending) {
      let node = first + index;
      while (node > 0) {
        node = parentOf(node);
        if (dirty.has(node)) break;
        dirty.add(node);
      }
    }

    // Level order puts every child at a higher slot than its parent.
    for (const node of [...dirty].sort((a, b) => b - a)) {
      const left = leftChildOf(node);
      this.nodes[node] = internalNode(this.hasher, this.nodes[left]!, this.nodes[left + 1]!);
    }
    this.pending.clear();
    return count;
  }

  // ── Reads ────────────────────────────────────────────────────────

  getRoot(): Digest {
    this.notePending("getRoot");
    return this.nodes[0]!.digest.slice();
  }

  /** Leaf digest at `index`. */
  getValue(index: number): Digest {
    this.assertLeafIndex("getValue", index);
    return this.nodes[firstLeafIndex(this.height) + index]!.digest.slice();
  }

  /** Raw bytes last written to leaf `index` (empty for padding). */
  getLeafData(index: number): Uint8Array {
    this.assertLeafIndex("getLeafData", index);
    return this.values[index]!.slice();
  }

  /**
   * Inclusion proof for leaf `index`: one sibling per level, leaf to
   * root. The result holds copies and no reference back into the tree.
   */
  getOpening(index: number): Opening {
    this.assertLeafIndex("getOpening", index);
    this.notePending("getOpening");

    const siblingPath: PathStep[] = [];
    let node = firstLeafIndex(this.height) + index;
    for (let level = 0; level < this.height; level++) {
      siblingPath.push({
        digest: this.nodes[siblingOf(node)]!.digest.slice(),
        side: isLeftChild(node) ? "right" : "left",
      });
      node = parentOf(node);
    }

    return {
      leafIndex: index,
      leafValue: this.values[index]!.slice(),
      siblingPath,
    };
  }

  toJSON(): MerkleTreeJSON {
    return {
      height: this.height,
      length: this.written,
      root: toHex(this.nodes[0]!.digest),
      leaves: this.nodes.filter((node) => node.kind === "leaf").map((node) => toHex(node.digest)),
    };
  }

  // ── Internals ────────────────────────────────────────────────────

  private assertLeafIndex(op: string, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      throw new MerkleError(
        "INDEX_OUT_OF_BOUNDS",
        `${op}: index ${index} out of bounds [0, ${this.capacity})`,
      );
    }
  }

  private notePending(op: string): void {
    if (this.pending.size > 0) {
      this.logger.debug({ op, pending: this.pendingLeaves }, "read with unpropagated leaf writes");
    }
  }
}
