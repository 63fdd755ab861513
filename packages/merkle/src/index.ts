/**
 * @hashtree/merkle — dense binary Merkle tree with inclusion openings.
 *
 * No I/O. The hash primitive is injected through HashFunction; the
 * default is domain-separated SHA-256.
 */

// Hashing
export {
  createHasher,
  sha256Hasher,
  emptyLeaf,
  leafBytes,
  equalDigests,
  toHex,
  fromHex,
  type Digest,
  type LeafData,
  type HashFunction,
  type RawHash,
} from "./hash.js";

// Nodes + index arithmetic
export {
  leafNode,
  internalNode,
  nodeCount,
  firstLeafIndex,
  leftChildOf,
  parentOf,
  siblingOf,
  isLeftChild,
  type TreeNode,
  type NodeKind,
} from "./node.js";

// Tree
export { MerkleTree, type MerkleTreeOptions, type MerkleTreeJSON } from "./tree.js";

// Openings
export {
  verifyOpening,
  expectedSide,
  type Opening,
  type PathStep,
  type Side,
  type VerifyOptions,
} from "./opening.js";

// Serialization
export { openingToWire, openingFromWire, encodeOpening, decodeOpening } from "./codec.js";

// Errors, config, logging
export { MerkleError, isMerkleError, type MerkleErrorCode } from "./errors.js";
export { config, loadConfig, type MerkleConfig, type LogLevel } from "./config.js";
export { log, type Logger } from "./log.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
