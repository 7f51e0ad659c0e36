import { FlakeEditError } from "@flakepatch/core";
import { ParseError } from "@flakepatch/syntax";

/**
 * Error raised by the command line front end itself (bad options, a flake
 * reference it cannot turn into an input).
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCodeType
  ) {
    super(message);
    this.name = "CliError";
  }
}

export const CliErrorCode = {
  INVALID_OPTION: "CLI_INVALID_OPTION",
  MISSING_ARGUMENT: "CLI_MISSING_ARGUMENT",
  UNKNOWN_COMMAND: "CLI_UNKNOWN_COMMAND",
  INVALID_FLAKE_REF: "CLI_INVALID_FLAKE_REF",
  INVALID_VERSION: "CLI_INVALID_VERSION",
  INPUT_NAME_REQUIRED: "CLI_INPUT_NAME_REQUIRED",
  FLAKE_REF_UNRESOLVABLE: "CLI_FLAKE_REF_UNRESOLVABLE",
} as const;

export type CliErrorCodeType = (typeof CliErrorCode)[keyof typeof CliErrorCode];

/**
 * `error[<code>]: <message>` for errors the tool raises on purpose, null for
 * anything else.
 */
export function describeError(error: unknown): string | null {
  if (error instanceof CliError || error instanceof FlakeEditError || error instanceof ParseError) {
    return `error[${error.code}]: ${error.message}`;
  }
  return null;
}
