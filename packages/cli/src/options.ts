/**
 * CLI - Default Values and Normalization
 */

import { DEBUG_ENV_VAR, type InsertionLocation } from "@flakepatch/core";
import { CliError, CliErrorCode } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/** Options as they arrive from the command line; everything optional. */
export interface AddOptions {
  flakePath?: string;
  inputName?: string;
  insertionLocation?: string;
  dryRun?: boolean;
}

export interface ResolvedAddOptions {
  flakePath: string;
  inputName: string | null;
  insertionLocation: InsertionLocation;
  dryRun: boolean;
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_ADD_OPTIONS: ResolvedAddOptions = {
  flakePath: "./flake.nix",
  inputName: null,
  insertionLocation: "top",
  dryRun: false,
};

export const INSERTION_LOCATIONS: readonly InsertionLocation[] = ["top", "bottom"];

// ============================================================================
// Normalization
// ============================================================================

export function normalizeAddOptions(options: AddOptions | undefined): ResolvedAddOptions {
  if (!options) {
    return { ...DEFAULT_ADD_OPTIONS };
  }

  const insertionLocation = options.insertionLocation ?? DEFAULT_ADD_OPTIONS.insertionLocation;
  if (!isInsertionLocation(insertionLocation)) {
    throw new CliError(
      `invalid --insertion-location \`${insertionLocation}\`; expected one of ${INSERTION_LOCATIONS.join(", ")}`,
      CliErrorCode.INVALID_OPTION
    );
  }

  const inputName = options.inputName?.trim();
  return {
    flakePath: options.flakePath ?? DEFAULT_ADD_OPTIONS.flakePath,
    inputName: inputName ? inputName : null,
    insertionLocation,
    dryRun: options.dryRun ?? DEFAULT_ADD_OPTIONS.dryRun,
  };
}

/**
 * Debug channel list to enable: the `--debug` flag wins over the
 * environment variable.
 */
export function resolveDebugFromEnv(
  flag: string | undefined,
  env: string | undefined = process.env[DEBUG_ENV_VAR]
): string | undefined {
  if (flag !== undefined && flag.length > 0) return flag;
  return env;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isInsertionLocation(value: string): value is InsertionLocation {
  return value === "top" || value === "bottom";
}
