/**
 * Core Package - Outputs Parameter Patching
 *
 * Threads a new input name into `outputs = { self, nixpkgs, ... }: …;` so the
 * function body can refer to it.
 */

import type { FunctionExpression } from "@flakepatch/syntax";
import { debug } from "../shared/debug.js";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import { nullLogger, type Logger } from "../shared/logger.js";
import { insert, type TextEdit } from "../text/edit.js";
import { detectNewline, isIndentation, lineStartOffset, offsetAt } from "../text/position-index.js";
import { scanParameterList, type ParameterListLayout } from "./parameter-list.js";

/**
 * Edits adding `inputName` to the function's destructured parameters.
 *
 * A simple head (`outputs = inputs: …`) already receives every input and
 * needs no edit. A name that is already listed is left alone with a warning.
 * Otherwise the name goes after the last named parameter, or before `...`
 * when there are none, following the list's one-per-line or inline layout.
 *
 * @throws FlakeEditError `FLAKE_EMPTY_PARAMETER_LIST` for `{ }: …`
 */
export function patchOutputsFunction(
  source: string,
  fn: FunctionExpression,
  inputName: string,
  logger: Logger = nullLogger
): TextEdit[] {
  const head = fn.head;
  if (head.$kind === "Simple") {
    debug.outputs("simple-head", { identifier: head.identifier });
    return [];
  }

  if (head.arguments.some((argument) => argument.identifier === inputName)) {
    logger.warn(`input ${inputName} was already in the outputs function args, not adding it again`);
    return [];
  }

  const lastArgument = head.arguments[head.arguments.length - 1];
  if (lastArgument === undefined && !head.ellipsis) {
    throw FlakeEditError.at(
      "the `outputs` function doesn't take any arguments; rewrite it as `outputs = { ... }:` and try again",
      FlakeEditErrorCode.EMPTY_PARAMETER_LIST,
      fn.span.start
    );
  }

  const layout = scanParameterList(source, offsetAt(source, fn.span.start));
  const newline = detectNewline(source);

  if (lastArgument !== undefined) {
    const entry = findLastEntry(layout, lastArgument.identifier);
    if (entry === undefined) {
      throw FlakeEditError.at(
        `could not find \`${lastArgument.identifier}\` in the outputs parameter list`,
        FlakeEditErrorCode.PARAMETER_LIST_MISMATCH,
        fn.span.start
      );
    }
    const prefix = linePrefix(source, layout, entry.start);
    debug.outputs("append", { after: entry.name, layout: prefix?.kind ?? "inline" });
    return [insert(entry.end, appendText(prefix, inputName, newline))];
  }

  const ellipsis = layout.ellipsis;
  if (ellipsis === null) {
    throw FlakeEditError.at(
      "could not find `...` in the outputs parameter list",
      FlakeEditErrorCode.PARAMETER_LIST_MISMATCH,
      fn.span.start
    );
  }
  const prefix = linePrefix(source, layout, ellipsis.start);
  debug.outputs("prepend-ellipsis", { layout: prefix?.kind ?? "inline" });
  return [insert(ellipsis.start, prependText(prefix, inputName, newline))];
}

function findLastEntry(layout: ParameterListLayout, name: string) {
  for (let i = layout.entries.length - 1; i >= 0; i--) {
    const entry = layout.entries[i];
    if (entry !== undefined && entry.name === name) return entry;
  }
  return undefined;
}

/**
 * What precedes an item that starts its own line below the opening brace:
 * plain indentation (`  nixpkgs,`) or indentation and a leading comma
 * (`  , nixpkgs`).
 */
type LinePrefix = { readonly kind: "indent" | "leading-comma"; readonly text: string };

function linePrefix(source: string, layout: ParameterListLayout, offset: number): LinePrefix | null {
  const lineStart = lineStartOffset(source, offset);
  if (lineStart <= layout.open) return null;
  const text = source.slice(lineStart, offset);
  if (isIndentation(text)) return { kind: "indent", text };
  if (/^[ \t]*,[ \t]*$/.test(text)) return { kind: "leading-comma", text };
  return null;
}

function appendText(prefix: LinePrefix | null, name: string, newline: string): string {
  if (prefix === null) return `, ${name}`;
  return prefix.kind === "indent"
    ? `,${newline}${prefix.text}${name}`
    : `${newline}${prefix.text}${name}`;
}

function prependText(prefix: LinePrefix | null, name: string, newline: string): string {
  if (prefix === null) return `${name}, `;
  return prefix.kind === "indent"
    ? `${name},${newline}${prefix.text}`
    : `${name}${newline}${prefix.text}`;
}
