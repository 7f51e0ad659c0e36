/**
 * Core Package - Input Upsert
 *
 * Entry point: update the URL of an input the manifest already declares, or
 * insert the input when it is missing.
 */

import type { Expression } from "@flakepatch/syntax";
import { findFirst } from "../resolve/attr-path.js";
import { debug } from "../shared/debug.js";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import { applyEdits, replace, type TextEdit } from "../text/edit.js";
import { spanToOffsets } from "../text/position-index.js";
import { insertInput } from "./insert.js";
import { escapeLiteralContent, quoteLiteral, quoteString } from "./literal.js";
import type { UpsertInputOptions } from "./types.js";

/**
 * Set `inputs.<inputName>.url` (or `attrPath`) to `inputValue`.
 *
 * Only the bytes of the value change when the input exists; otherwise a
 * declaration is inserted and the name is added to the `outputs` parameters.
 * Text outside the edited ranges is returned unchanged.
 *
 * @example
 * ```typescript
 * const { expression } = parse(source);
 * const updated = upsertInput({
 *   expression,
 *   source,
 *   inputName: "nixpkgs",
 *   inputValue: "github:NixOS/nixpkgs/nixos-unstable",
 * });
 * ```
 */
export function upsertInput(options: UpsertInputOptions): string {
  const { expression, source, inputName, inputValue } = options;
  const attrPath = options.attrPath ?? ["inputs", inputName, "url"];

  const existing = findFirst(expression, attrPath);
  if (existing === null) {
    debug.upsert("insert", { inputName });
    return insertInput({
      expression,
      source,
      inputName,
      inputValue,
      insertionLocation: options.insertionLocation,
      logger: options.logger,
    });
  }

  debug.upsert("replace", { inputName, line: existing.span.start.line });
  return applyEdits(source, [replaceInputValue(source, existing.to, inputValue)]);
}

/**
 * The edit replacing a literal value with `inputValue`, keeping the
 * literal's delimiters.
 *
 * @throws FlakeEditError `FLAKE_MULTI_PART_VALUE` for interpolated strings,
 * `FLAKE_UNKNOWN_VALUE_SHAPE` for anything that is not a string or URI
 */
export function replaceInputValue(source: string, value: Expression, inputValue: string): TextEdit {
  switch (value.$kind) {
    case "String":
    case "IndentedString": {
      const [first, ...rest] = value.parts;
      if (first === undefined) {
        return replace(spanToOffsets(source, value.span), quoteLiteral(value.$kind, inputValue));
      }
      const offending = first.$kind !== "Raw" ? first : rest[0];
      if (offending !== undefined) {
        throw FlakeEditError.at(
          "unexpected expression or interpolation in input value",
          FlakeEditErrorCode.MULTI_PART_VALUE,
          offending.span.start
        );
      }
      return replace(spanToOffsets(source, first.span), escapeLiteralContent(value.$kind, inputValue));
    }

    case "Uri":
      return replace(spanToOffsets(source, value.span), quoteString(inputValue));

    default:
      throw FlakeEditError.at(
        `unsupported input value type ${value.$kind}; expected a string or URI`,
        FlakeEditErrorCode.UNKNOWN_VALUE_SHAPE,
        value.span.start
      );
  }
}
