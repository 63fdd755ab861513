/**
 * Package configuration (env overrides on top of defaults).
 *
 *   MERKLE_MAX_HEIGHT  largest height fromHeight() accepts (default 20, at most 30)
 *   MERKLE_LOG_LEVEL   pino level for the package logger (default "warn")
 *
 * Per-tree options take priority over these.
 */

import { MAX_HEIGHT_CEILING, MAX_HEIGHT_DEFAULT } from "./constants.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface MerkleConfig {
  maxHeight: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function env(vars: Env, key: string, fallback: string): string {
  return vars[key] ?? fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadConfig(vars: Env = process.env): MerkleConfig {
  const rawHeight = env(vars, "MERKLE_MAX_HEIGHT", String(MAX_HEIGHT_DEFAULT));
  const maxHeight = rawHeight.trim() === "" ? Number.NaN : Number(rawHeight);
  if (!Number.isInteger(maxHeight) || maxHeight < 0 || maxHeight > MAX_HEIGHT_CEILING) {
    throw new Error(
      `Invalid env: MERKLE_MAX_HEIGHT must be an integer in [0, ${MAX_HEIGHT_CEILING}], got "${rawHeight}"`,
    );
  }

  const logLevel = env(vars, "MERKLE_LOG_LEVEL", "warn");
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid env: MERKLE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
  }

  return { maxHeight, logLevel };
}

export const config: MerkleConfig = loadConfig();
