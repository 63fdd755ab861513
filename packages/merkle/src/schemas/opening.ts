/**
 * OpeningV1 — wire form of an inclusion opening.
 *
 * Hex strings are lower-case. `path` is ordered leaf level first and
 * `side` is the side the sibling occupies.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_HEIGHT_CEILING } from "../constants.js";

const Hex = Type.String({ pattern: "^(?:[0-9a-f]{2})*$" });

export const PathSide = Type.Union([Type.Literal("left"), Type.Literal("right")]);

export type PathSide = Static<typeof PathSide>;

export const PathStepV1 = Type.Object(
  {
    /** Sibling digest. */
    hash: Hex,
    side: PathSide,
  },
  { additionalProperties: false },
);

export type PathStepV1 = Static<typeof PathStepV1>;

export const OpeningV1 = Type.Object(
  {
    /** Version byte. Always 1. */
    v: Type.Literal(1),
    /** Leaf index in [0, 2^path.length). */
    index: Type.Integer({ minimum: 0 }),
    /** Raw leaf bytes (not the leaf digest). */
    leaf: Hex,
    path: Type.Array(PathStepV1, { maxItems: MAX_HEIGHT_CEILING }),
  },
  { additionalProperties: false },
);

export type OpeningV1 = Static<typeof OpeningV1>;
