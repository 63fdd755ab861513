/**
 * Error kinds raised by the tree and the opening codec.
 */

export type MerkleErrorCode =
  | "INVALID_HEIGHT"
  | "TOO_MANY_LEAVES"
  | "INDEX_OUT_OF_BOUNDS"
  | "TREE_FULL"
  | "MALFORMED_OPENING";

export class MerkleError extends Error {
  readonly code: MerkleErrorCode;

  constructor(code: MerkleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MerkleError";
    this.code = code;
  }
}

/** Narrow an unknown throwable to a MerkleError, optionally of one code. */
export function isMerkleError(err: unknown, code?: MerkleErrorCode): err is MerkleError {
  if (!(err instanceof MerkleError)) return false;
  return code === undefined || err.code === code;
}
