/**
 * Core Package - Position Index
 *
 * Converts the parser's 1-based line/column positions into string offsets.
 * Each lookup is a linear scan; an edit performs only a handful of them.
 */

import type { Position, Span } from "@flakepatch/syntax";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import type { OffsetSpan } from "./edit.js";

/**
 * Offset of the character at `position`.
 *
 * Columns advance by one per character (a surrogate pair is one character)
 * and reset on `\n`. Only positions of existing characters are found; the
 * position just past the final character is not one.
 *
 * @throws FlakeEditError with `FLAKE_POSITION_NOT_FOUND` when the text has no
 * such position
 */
export function offsetAt(text: string, position: Position): number {
  let line = 1;
  let column = 1;
  let offset = 0;

  for (const ch of text) {
    if (line === position.line && column === position.column) {
      return offset;
    }
    if (ch === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    offset += ch.length;
  }

  throw new FlakeEditError(
    `Could not find ${position.line}:${position.column} in the source text`,
    FlakeEditErrorCode.POSITION_NOT_FOUND,
    position.line,
    position.column
  );
}

/**
 * Both ends of a span as offsets. Fails if either end is missing.
 */
export function spanToOffsets(text: string, span: Span): OffsetSpan {
  return {
    start: offsetAt(text, span.start),
    end: offsetAt(text, span.end),
  };
}

/** Offset of the first character on the line containing `offset`. */
export function lineStartOffset(text: string, offset: number): number {
  return text.lastIndexOf("\n", offset - 1) + 1;
}

/** Offset of the `\n` ending the line containing `offset`, or `text.length`. */
export function lineEndOffset(text: string, offset: number): number {
  const newline = text.indexOf("\n", offset);
  return newline === -1 ? text.length : newline;
}

/** Whether `value` consists only of spaces and tabs. */
export function isIndentation(value: string): boolean {
  return /^[ \t]*$/.test(value);
}

/** Line terminator used by `text`: `\r\n` when its first line ends with one. */
export function detectNewline(text: string): "\n" | "\r\n" {
  const newline = text.indexOf("\n");
  return newline > 0 && text.charAt(newline - 1) === "\r" ? "\r\n" : "\n";
}
