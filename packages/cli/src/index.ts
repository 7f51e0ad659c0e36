/**
 * @flakepatch/cli
 *
 * Command implementations, usable without the `flakepatch` entry point.
 */

export { runAdd } from "./commands/add.js";
export type { AddCommandOptions, AddResult } from "./commands/add.js";
export { runInputs } from "./commands/inputs.js";
export type { InputsCommandOptions } from "./commands/inputs.js";
export { inferInputNameAndUrl } from "./flake-ref.js";
export type { FlakeRefResolver, InferredInput } from "./flake-ref.js";
export { loadFlake, FALLBACK_FLAKE_CONTENTS } from "./load.js";
export type { LoadedFlake } from "./load.js";
export {
  DEFAULT_ADD_OPTIONS,
  INSERTION_LOCATIONS,
  normalizeAddOptions,
  resolveDebugFromEnv,
  isInsertionLocation,
} from "./options.js";
export type { AddOptions, ResolvedAddOptions } from "./options.js";
export { CliError, CliErrorCode, describeError } from "./errors.js";
export type { CliErrorCodeType } from "./errors.js";
export { createConsoleLogger } from "./logger.js";
export type { OutputStreams } from "./logger.js";
