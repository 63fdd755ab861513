/**
 * Opening serialization.
 *
 * Two forms of the same OpeningV1 object:
 *   openingToWire / openingFromWire   JSON-safe object (hex strings)
 *   encodeOpening / decodeOpening     canonical CBOR bytes of that object
 *
 * Canonical CBOR: map keys sorted lexicographically, integers only,
 * same opening → identical bytes.
 *
 * Decoding validates against the OpeningV1 schema and throws
 * MerkleError("MALFORMED_OPENING"). Whether the opening actually proves
 * anything is verifyOpening's job.
 */

import { Encoder } from "cbor-x";
import { Value } from "@sinclair/typebox/value";
import { OpeningV1 } from "./schemas/opening.js";
import { fromHex, toHex } from "./hash.js";
import { MerkleError } from "./errors.js";
import { OPENING_VERSION } from "./constants.js";
import type { Opening } from "./opening.js";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

// ── Canonical ordering ─────────────────────────────────────────────

/** Rebuild plain objects with their keys in lexicographic order. */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value === null || typeof value !== "object" || value instanceof Uint8Array) return value;
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries.map(([key, inner]) => [key, sortKeys(inner)]));
}

// ── Wire form ──────────────────────────────────────────────────────

export function openingToWire(opening: Opening): OpeningV1 {
  return {
    v: OPENING_VERSION,
    index: opening.leafIndex,
    leaf: toHex(opening.leafValue),
    path: opening.siblingPath.map((step) => ({ hash: toHex(step.digest), side: step.side })),
  };
}

/** Validate an untrusted value as OpeningV1 and convert it. */
export function openingFromWire(value: unknown): Opening {
  if (!Value.Check(OpeningV1, value)) {
    const first = Value.Errors(OpeningV1, value).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "schema mismatch";
    throw new MerkleError("MALFORMED_OPENING", `openingFromWire: ${where}`);
  }

  return {
    leafIndex: value.index,
    leafValue: fromHex(value.leaf),
    siblingPath: value.path.map((step) => ({ digest: fromHex(step.hash), side: step.side })),
  };
}

// ── Bytes ──────────────────────────────────────────────────────────

export function encodeOpening(opening: Opening): Uint8Array {
  return encoder.encode(sortKeys(openingToWire(opening)));
}

export function decodeOpening(bytes: Uint8Array): Opening {
  let decoded: unknown;
  try {
    decoded = encoder.decode(bytes);
  } catch (err) {
    throw new MerkleError("MALFORMED_OPENING", "decodeOpening: invalid CBOR", { cause: err });
  }
  return openingFromWire(decoded);
}
