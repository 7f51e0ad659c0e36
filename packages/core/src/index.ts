/**
 * @flakepatch/core
 *
 * Minimal-diff editing of flake manifests: upsert an input's URL and keep
 * the `outputs` parameters in step.
 *
 * @example
 * ```typescript
 * import { parse } from "@flakepatch/syntax";
 * import { upsertInput } from "@flakepatch/core";
 *
 * const { expression } = parse(source);
 * const next = upsertInput({ expression, source, inputName: "home-manager", inputValue: url });
 * ```
 */

// Upsert
export { upsertInput, replaceInputValue } from "./upsert/upsert.js";
export { insertInput, classify, findInputAnchor } from "./upsert/insert.js";
export { patchOutputsFunction } from "./upsert/outputs.js";
export { scanParameterList } from "./upsert/parameter-list.js";
export type { ParameterEntry, ParameterListLayout } from "./upsert/parameter-list.js";
export {
  escapeStringContent,
  escapeIndentedStringContent,
  escapeLiteralContent,
  quoteString,
  quoteLiteral,
} from "./upsert/literal.js";
export type { LiteralKind } from "./upsert/literal.js";
export type {
  UpsertInputOptions,
  InsertInputOptions,
  InsertionLocation,
  InputAnchor,
  AttrClassification,
} from "./upsert/types.js";

// Resolution
export { findFirst, findAll, keySegments, matchKey, expectMap } from "./resolve/attr-path.js";
export type { AttrPath, KeyMatch } from "./resolve/attr-path.js";
export { collectAllInputs, readInputUrl, listInputs } from "./resolve/inputs.js";
export type { CollectedInput, DeclarationForm, InputSummary } from "./resolve/inputs.js";

// Text
export { applyEdits, validateEdits, replace, insert } from "./text/edit.js";
export type { OffsetSpan, TextEdit, Replacement, Insertion } from "./text/edit.js";
export {
  offsetAt,
  spanToOffsets,
  lineStartOffset,
  lineEndOffset,
  isIndentation,
  detectNewline,
} from "./text/position-index.js";

// Shared
export { FlakeEditError, FlakeEditErrorCode } from "./shared/errors.js";
export type { FlakeEditErrorCodeType } from "./shared/errors.js";
export { nullLogger } from "./shared/logger.js";
export type { Logger } from "./shared/logger.js";
export {
  debug,
  refreshDebugChannels,
  parseDebugChannels,
  DEBUG_ENV_VAR,
} from "./shared/debug.js";
export type { DebugChannel, DebugData } from "./shared/debug.js";
