/**
 * Tree constants.
 *
 * FROZEN constants are part of every root and opening ever produced;
 * changing one changes every digest.
 */

// ── Frozen (never change) ──────────────────────────────────────────
export const LEAF_PREFIX = 0x00; // hashLeaf(d) = H(0x00 || d)
export const INTERNAL_PREFIX = 0x01; // hashInternal(l, r) = H(0x01 || l || r)
export const OPENING_VERSION = 1; // OpeningV1 wire form

// ── Height bounds ──────────────────────────────────────────────────
export const MAX_HEIGHT_CEILING = 30; // 2^31 - 1 node slots, no config goes past this
export const MAX_HEIGHT_DEFAULT = 20; // ~2M node slots
