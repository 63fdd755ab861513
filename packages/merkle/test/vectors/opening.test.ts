/**
 * Inclusion openings — generation, verification, tamper sensitivity.
 */

import { describe, it, expect } from "vitest";
import {
  MerkleTree,
  createHasher,
  expectedSide,
  verifyOpening,
  type Opening,
  type PathStep,
} from "../../src/index.js";
import { fnv1a32, hex, refLeaf, refNode } from "../helpers.js";

const LEAVES = ["alpha", "beta", "gamma", "delta", "epsilon", "zeta"];

function flipByte(bytes: Uint8Array, at: number): Uint8Array {
  const copy = bytes.slice();
  copy[at] = copy[at]! ^ 0x01;
  return copy;
}

function withStep(opening: Opening, level: number, step: PathStep): Opening {
  const siblingPath = opening.siblingPath.map((s, i) => (i === level ? step : s));
  return { ...opening, siblingPath };
}

// ── Generation ─────────────────────────────────────────────────────

describe("getOpening", () => {
  it("height 1, index 0: sibling is leaf 1 on the right", () => {
    const tree = MerkleTree.fromHeight(1, ["x", "y"]);
    const opening = tree.getOpening(0);

    expect(opening.leafIndex).toBe(0);
    expect(new TextDecoder().decode(opening.leafValue)).toBe("x");
    expect(opening.siblingPath).toHaveLength(1);
    expect(hex(opening.siblingPath[0]!.digest)).toBe(hex(refLeaf("y")));
    expect(opening.siblingPath[0]!.side).toBe("right");
    expect(verifyOpening(opening, tree.getRoot())).toBe(true);
  });

  it("records siblings leaf to root with their sides", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const opening = tree.getOpening(2);

    expect(opening.siblingPath.map((s) => s.side)).toEqual(["right", "left"]);
    expect(hex(opening.siblingPath[0]!.digest)).toBe(hex(refLeaf("d")));
    expect(hex(opening.siblingPath[1]!.digest)).toBe(hex(refNode(refLeaf("a"), refLeaf("b"))));
  });

  it("path length equals height", () => {
    const tree = MerkleTree.fromHeight(5, LEAVES);
    expect(tree.getOpening(17).siblingPath).toHaveLength(5);
  });

  it("height 0 opening has an empty path and verifies", () => {
    const tree = MerkleTree.fromHeight(0, ["solo"]);
    const opening = tree.getOpening(0);
    expect(opening.siblingPath).toHaveLength(0);
    expect(verifyOpening(opening, tree.getRoot(), { height: 0 })).toBe(true);
  });

  it("is detached from the tree", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const root = tree.getRoot();
    const opening = tree.getOpening(1);

    tree.set(0, "changed");
    expect(verifyOpening(opening, root)).toBe(true);
    expect(verifyOpening(opening, tree.getRoot())).toBe(false);

    opening.leafValue[0] = 0;
    expect(Array.from(tree.getLeafData(1))).toEqual([0x62]);
  });

  it("expectedSide follows the leaf index bits", () => {
    // 6 = 0b110: left child at level 0, right child at levels 1 and 2
    expect([0, 1, 2].map((level) => expectedSide(6, level))).toEqual(["right", "left", "left"]);
  });
});

// ── Verification ───────────────────────────────────────────────────

describe("verifyOpening", () => {
  it("every leaf of a padded tree verifies", () => {
    const tree = MerkleTree.fromHeight(3, LEAVES);
    const root = tree.getRoot();
    for (let i = 0; i < tree.capacity; i++) {
      expect(verifyOpening(tree.getOpening(i), root, { height: 3 })).toBe(true);
    }
  });

  it("verifies after insert + updateInternalNodes", () => {
    const tree = MerkleTree.fromHeight(3, LEAVES);
    tree.insert(7, "eta");
    tree.updateInternalNodes(7);
    expect(verifyOpening(tree.getOpening(7), tree.getRoot())).toBe(true);
    expect(verifyOpening(tree.getOpening(0), tree.getRoot())).toBe(true);
  });

  it("an opening taken before propagation does not verify against the new root", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    tree.insert(0, "q");
    const stale = tree.getOpening(3);
    tree.commit();
    expect(verifyOpening(stale, tree.getRoot())).toBe(false);
  });

  it("rejects a different leaf value", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const opening = tree.getOpening(1);
    const forged = { ...opening, leafValue: new TextEncoder().encode("B") };
    expect(verifyOpening(forged, tree.getRoot())).toBe(false);
  });

  it("rejects a single flipped byte anywhere in the opening", () => {
    const tree = MerkleTree.fromHeight(3, LEAVES);
    const root = tree.getRoot();
    const opening = tree.getOpening(5);

    for (let at = 0; at < opening.leafValue.length; at++) {
      const forged = { ...opening, leafValue: flipByte(opening.leafValue, at) };
      expect(verifyOpening(forged, root)).toBe(false);
    }

    opening.siblingPath.forEach((step, level) => {
      for (let at = 0; at < step.digest.length; at++) {
        const forged = withStep(opening, level, { ...step, digest: flipByte(step.digest, at) });
        expect(verifyOpening(forged, root)).toBe(false);
      }
    });
  });

  it("rejects a flipped side", () => {
    const tree = MerkleTree.fromHeight(3, LEAVES);
    const root = tree.getRoot();
    const opening = tree.getOpening(5);

    opening.siblingPath.forEach((step, level) => {
      const side = step.side === "left" ? "right" : "left";
      expect(verifyOpening(withStep(opening, level, { ...step, side }), root)).toBe(false);
    });
  });

  it("rejects a leaf index that disagrees with the sides", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const opening = tree.getOpening(1);
    expect(verifyOpening({ ...opening, leafIndex: 3 }, tree.getRoot())).toBe(false);
  });

  it("rejects the wrong root", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const other = MerkleTree.fromHeight(2, ["a", "b", "c", "e"]);
    expect(verifyOpening(tree.getOpening(0), other.getRoot())).toBe(false);
  });

  describe("malformed openings return false", () => {
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c", "d"]);
    const root = tree.getRoot();
    const opening = tree.getOpening(2);

    it("path length differs from the expected height", () => {
      expect(verifyOpening(opening, root, { height: 2 })).toBe(true);
      expect(verifyOpening(opening, root, { height: 3 })).toBe(false);
      const truncated = { ...opening, siblingPath: opening.siblingPath.slice(0, 1) };
      expect(verifyOpening(truncated, root, { height: 2 })).toBe(false);
      expect(verifyOpening(truncated, root)).toBe(false);
    });

    it("leaf index out of range for the path", () => {
      expect(verifyOpening({ ...opening, leafIndex: 4 }, root)).toBe(false);
      expect(verifyOpening({ ...opening, leafIndex: -2 }, root)).toBe(false);
      expect(verifyOpening({ ...opening, leafIndex: 2.5 }, root)).toBe(false);
    });

    it("sibling digest or root of the wrong size", () => {
      const short = withStep(opening, 0, { ...opening.siblingPath[0]!, digest: new Uint8Array(31) });
      expect(verifyOpening(short, root)).toBe(false);
      expect(verifyOpening(opening, root.slice(0, 16))).toBe(false);
    });

    it("path longer than any tree can be", () => {
      const step = opening.siblingPath[0]!;
      const huge = { leafIndex: 0, leafValue: opening.leafValue, siblingPath: Array.from({ length: 31 }, () => step) };
      expect(verifyOpening(huge, root)).toBe(false);
    });
  });

  it("uses the hasher the tree was built with", () => {
    const fnv = createHasher(fnv1a32, 4);
    const tree = MerkleTree.fromHeight(2, ["a", "b", "c"], { hasher: fnv });
    const opening = tree.getOpening(2);

    expect(verifyOpening(opening, tree.getRoot(), { hasher: fnv })).toBe(true);
    expect(verifyOpening(opening, tree.getRoot())).toBe(false);
  });
});
