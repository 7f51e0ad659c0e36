/**
 * Core Package - Errors
 *
 * Every failure aborts the whole edit; callers never see partially patched
 * text.
 */

import type { Position } from "@flakepatch/syntax";

/**
 * Error during an input upsert.
 */
export class FlakeEditError extends Error {
  constructor(
    message: string,
    public readonly code: FlakeEditErrorCodeType,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message);
    this.name = "FlakeEditError";
  }

  /** Build an error whose message ends with the `(at line:column)` location. */
  static at(message: string, code: FlakeEditErrorCodeType, position: Position): FlakeEditError {
    return new FlakeEditError(
      `${message} (at ${position.line}:${position.column})`,
      code,
      position.line,
      position.column
    );
  }
}

/** Error codes */
export const FlakeEditErrorCode = {
  INHERIT_NOT_SUPPORTED: "FLAKE_INHERIT_NOT_SUPPORTED",
  UNSUPPORTED_EXPRESSION_KIND: "FLAKE_UNSUPPORTED_EXPRESSION_KIND",
  MULTI_PART_VALUE: "FLAKE_MULTI_PART_VALUE",
  MISSING_OUTPUTS: "FLAKE_MISSING_OUTPUTS",
  MISSING_INPUTS: "FLAKE_MISSING_INPUTS",
  MISSING_INPUTS_AND_OUTPUTS: "FLAKE_MISSING_INPUTS_AND_OUTPUTS",
  POSITION_NOT_FOUND: "FLAKE_POSITION_NOT_FOUND",
  EMPTY_PARAMETER_LIST: "FLAKE_EMPTY_PARAMETER_LIST",
  UNKNOWN_VALUE_SHAPE: "FLAKE_UNKNOWN_VALUE_SHAPE",
  PARAMETER_LIST_MISMATCH: "FLAKE_PARAMETER_LIST_MISMATCH",
  EDIT_CONFLICT: "FLAKE_EDIT_CONFLICT",
} as const;

export type FlakeEditErrorCodeType = (typeof FlakeEditErrorCode)[keyof typeof FlakeEditErrorCode];
