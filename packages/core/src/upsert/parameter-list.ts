/**
 * Core Package - Parameter List Layout
 *
 * The tree records a destructured head's argument names but not where they
 * sit in the text. This scanner re-reads the head from the function's start
 * offset and reports the offsets of each entry, the ellipsis and the braces.
 *
 * Recognized shapes:
 * ```nix
 * { a, b ? default, ... }: …
 * { a, b } @ args: …
 * args @ { a, b }: …
 * ```
 */

import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import type { OffsetSpan } from "../text/edit.js";

export interface ParameterEntry {
  readonly name: string;
  /** Offset of the first character of the name */
  readonly start: number;
  readonly nameEnd: number;
  /** Past the default expression when there is one, otherwise `nameEnd` */
  readonly end: number;
}

export interface ParameterListLayout {
  /** Offset of `{` */
  readonly open: number;
  /** Offset of `}` */
  readonly close: number;
  readonly entries: readonly ParameterEntry[];
  readonly ellipsis: OffsetSpan | null;
}

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_'-]*/y;

/**
 * @param start offset where the function expression begins
 * @throws FlakeEditError `FLAKE_PARAMETER_LIST_MISMATCH` when the text at
 * `start` is not a destructured parameter list
 */
export function scanParameterList(text: string, start: number): ParameterListLayout {
  return new ParameterListScanner(text, start).scan();
}

class ParameterListScanner {
  private index: number;

  constructor(
    private readonly text: string,
    start: number
  ) {
    this.index = start;
  }

  scan(): ParameterListLayout {
    this.skipTrivia();
    if (this.readIdentifier() !== null) {
      this.skipTrivia();
      this.expectChar("@");
      this.skipTrivia();
    }

    const open = this.index;
    this.expectChar("{");

    const entries: ParameterEntry[] = [];
    let ellipsis: OffsetSpan | null = null;

    for (;;) {
      this.skipTrivia();
      const ch = this.peek();

      if (ch === "}") {
        return { open, close: this.index, entries, ellipsis };
      }
      if (ch === ",") {
        this.index += 1;
        continue;
      }
      if (this.text.startsWith("...", this.index)) {
        ellipsis = { start: this.index, end: this.index + 3 };
        this.index += 3;
        continue;
      }

      const entryStart = this.index;
      const name = this.readIdentifier();
      if (name === null) {
        throw this.mismatch();
      }
      const nameEnd = this.index;
      this.skipTrivia();

      let end = nameEnd;
      if (this.peek() === "?") {
        this.index += 1;
        end = this.skipDefault();
      }
      entries.push({ name, start: entryStart, nameEnd, end });
    }
  }

  /** Skip a default value; returns the offset just past its last character. */
  private skipDefault(): number {
    let depth = 0;
    let lastEnd = this.index;

    while (this.index < this.text.length) {
      this.skipTrivia();
      const ch = this.peek();

      if (depth === 0 && (ch === "," || ch === "}")) {
        return lastEnd;
      }
      if (ch === '"') {
        this.skipString();
      } else if (this.text.startsWith("''", this.index)) {
        this.skipIndentedString();
      } else {
        if (ch === "(" || ch === "[" || ch === "{") depth += 1;
        if (ch === ")" || ch === "]" || ch === "}") depth -= 1;
        this.index += 1;
      }
      lastEnd = this.index;
    }

    throw this.mismatch();
  }

  private skipString(): void {
    this.index += 1;
    while (this.index < this.text.length) {
      const ch = this.peek();
      if (ch === "\\") {
        this.index += 2;
      } else if (ch === '"') {
        this.index += 1;
        return;
      } else if (this.text.startsWith("${", this.index)) {
        this.index += 2;
        this.skipInterpolation();
      } else {
        this.index += 1;
      }
    }
    throw this.mismatch();
  }

  private skipIndentedString(): void {
    this.index += 2;
    while (this.index < this.text.length) {
      if (this.text.startsWith("'''", this.index) || this.text.startsWith("''$", this.index)) {
        this.index += 3;
      } else if (this.text.startsWith("''\\", this.index)) {
        this.index += 4;
      } else if (this.text.startsWith("''", this.index)) {
        this.index += 2;
        return;
      } else if (this.text.startsWith("${", this.index)) {
        this.index += 2;
        this.skipInterpolation();
      } else {
        this.index += 1;
      }
    }
    throw this.mismatch();
  }

  /** Skip to the `}` closing a `${` that has already been consumed. */
  private skipInterpolation(): void {
    let depth = 1;
    while (this.index < this.text.length) {
      this.skipTrivia();
      const ch = this.peek();
      if (ch === '"') {
        this.skipString();
      } else if (this.text.startsWith("''", this.index)) {
        this.skipIndentedString();
      } else {
        this.index += 1;
        if (ch === "{") depth += 1;
        if (ch === "}") {
          depth -= 1;
          if (depth === 0) return;
        }
      }
    }
    throw this.mismatch();
  }

  private skipTrivia(): void {
    for (;;) {
      const ch = this.peek();
      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.index += 1;
      } else if (ch === "#") {
        const newline = this.text.indexOf("\n", this.index);
        this.index = newline === -1 ? this.text.length : newline;
      } else if (this.text.startsWith("/*", this.index)) {
        const close = this.text.indexOf("*/", this.index + 2);
        this.index = close === -1 ? this.text.length : close + 2;
      } else {
        return;
      }
    }
  }

  private readIdentifier(): string | null {
    IDENTIFIER.lastIndex = this.index;
    const match = IDENTIFIER.exec(this.text);
    if (match === null) return null;
    this.index += match[0].length;
    return match[0];
  }

  private expectChar(ch: string): void {
    if (this.peek() !== ch) {
      throw this.mismatch();
    }
    this.index += 1;
  }

  private peek(): string {
    return this.text.charAt(this.index);
  }

  private mismatch(): FlakeEditError {
    return new FlakeEditError(
      `the outputs parameter list does not match its parsed form near offset ${this.index}`,
      FlakeEditErrorCode.PARAMETER_LIST_MISMATCH
    );
  }
}
