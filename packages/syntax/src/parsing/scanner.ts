/**
 * Syntax Package - Scanner
 *
 * Character-level cursor over manifest source. Produces expression tokens
 * on demand; string bodies are read chunk by chunk by the parser so that
 * interpolations can be parsed recursively.
 */

import type { Position } from "../model/ast.js";
import { ParseError, ParseErrorCode } from "./errors.js";

export enum TokenType {
  EOF,
  Identifier,
  Integer,
  Float,
  Path,
  HomePath,
  SearchPath,
  Uri,
  StringOpen,
  IndentedStringOpen,
  InterpolationOpen,

  OpenBrace,
  CloseBrace,
  OpenBracket,
  CloseBracket,
  OpenParen,
  CloseParen,
  Semicolon,
  Colon,
  Comma,
  Dot,
  Ellipsis,
  At,
  Question,
  Assign,

  Implication,
  Or,
  And,
  Equals,
  NotEquals,
  LessThan,
  GreaterThan,
  LessOrEqual,
  GreaterOrEqual,
  Update,
  Not,
  Plus,
  Minus,
  Star,
  Slash,
  Concat,

  KeywordIf,
  KeywordThen,
  KeywordElse,
  KeywordAssert,
  KeywordWith,
  KeywordLet,
  KeywordIn,
  KeywordRec,
  KeywordInherit,
  KeywordOr,
}

export interface Token {
  readonly type: TokenType;
  readonly text: string;
  readonly start: Position;
  readonly end: Position;
}

/** A piece of a string body, as returned by {@link Scanner.readStringChunk}. */
export type StringChunk =
  | { readonly type: "text"; readonly content: string; readonly start: Position; readonly end: Position }
  | { readonly type: "interpolation"; readonly start: Position }
  | { readonly type: "close"; readonly end: Position };

export interface ScannerState {
  readonly index: number;
  readonly line: number;
  readonly column: number;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["if", TokenType.KeywordIf],
  ["then", TokenType.KeywordThen],
  ["else", TokenType.KeywordElse],
  ["assert", TokenType.KeywordAssert],
  ["with", TokenType.KeywordWith],
  ["let", TokenType.KeywordLet],
  ["in", TokenType.KeywordIn],
  ["rec", TokenType.KeywordRec],
  ["inherit", TokenType.KeywordInherit],
  ["or", TokenType.KeywordOr],
]);

// Longest first, so that `...` wins over `.` and `//` over `/`.
const PUNCTUATION: readonly (readonly [string, TokenType])[] = [
  ["...", TokenType.Ellipsis],
  ["${", TokenType.InterpolationOpen],
  ["''", TokenType.IndentedStringOpen],
  ["->", TokenType.Implication],
  ["||", TokenType.Or],
  ["&&", TokenType.And],
  ["==", TokenType.Equals],
  ["!=", TokenType.NotEquals],
  ["<=", TokenType.LessOrEqual],
  [">=", TokenType.GreaterOrEqual],
  ["//", TokenType.Update],
  ["++", TokenType.Concat],
  ['"', TokenType.StringOpen],
  ["{", TokenType.OpenBrace],
  ["}", TokenType.CloseBrace],
  ["[", TokenType.OpenBracket],
  ["]", TokenType.CloseBracket],
  ["(", TokenType.OpenParen],
  [")", TokenType.CloseParen],
  [";", TokenType.Semicolon],
  [":", TokenType.Colon],
  [",", TokenType.Comma],
  [".", TokenType.Dot],
  ["@", TokenType.At],
  ["?", TokenType.Question],
  ["=", TokenType.Assign],
  ["<", TokenType.LessThan],
  [">", TokenType.GreaterThan],
  ["!", TokenType.Not],
  ["+", TokenType.Plus],
  ["-", TokenType.Minus],
  ["*", TokenType.Star],
  ["/", TokenType.Slash],
];

// Ties on length resolve to the earliest rule.
const LITERAL_RULES: readonly (readonly [RegExp, TokenType])[] = [
  [/[a-zA-Z_][a-zA-Z0-9_'-]*/y, TokenType.Identifier],
  [/[0-9]+/y, TokenType.Integer],
  [/(?:[1-9][0-9]*\.[0-9]*|0?\.[0-9]+)(?:[Ee][+-]?[0-9]+)?/y, TokenType.Float],
  [/[a-zA-Z0-9._\-+]*(?:\/[a-zA-Z0-9._\-+]+)+\/?/y, TokenType.Path],
  [/~(?:\/[a-zA-Z0-9._\-+]+)+\/?/y, TokenType.HomePath],
  [/<[a-zA-Z0-9._\-+]+(?:\/[a-zA-Z0-9._\-+]+)*>/y, TokenType.SearchPath],
  [/[a-zA-Z][a-zA-Z0-9+\-.]*:[a-zA-Z0-9%/?:@&=+$,\-_.!~*']+/y, TokenType.Uri],
];

export class Scanner {
  private readonly source: string;
  private index = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  /* ---------------------------------------------------------------------------
   * Cursor
   * ------------------------------------------------------------------------- */

  public get position(): Position {
    return { line: this.line, column: this.column };
  }

  public save(): ScannerState {
    return { index: this.index, line: this.line, column: this.column };
  }

  public restore(state: ScannerState): void {
    this.index = state.index;
    this.line = state.line;
    this.column = state.column;
  }

  private peekChar(offset = 0): string {
    return this.source.charAt(this.index + offset);
  }

  private startsWith(text: string): boolean {
    return this.source.startsWith(text, this.index);
  }

  /** Advance one character (a surrogate pair counts as one column). */
  private advance(): string {
    const code = this.source.charCodeAt(this.index);
    let width = 1;
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = this.source.charCodeAt(this.index + 1);
      if (next >= 0xdc00 && next <= 0xdfff) width = 2;
    }
    const ch = this.source.slice(this.index, this.index + width);
    this.index += width;
    if (ch === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return ch;
  }

  private advanceBy(length: number): string {
    const end = this.index + length;
    let text = "";
    while (this.index < end) {
      text += this.advance();
    }
    return text;
  }

  /* ---------------------------------------------------------------------------
   * Expression tokens
   * ------------------------------------------------------------------------- */

  public nextToken(): Token {
    this.skipTrivia();
    const start = this.position;

    if (this.index >= this.source.length) {
      return { type: TokenType.EOF, text: "", start, end: start };
    }

    let bestLength = 0;
    let bestType: TokenType | null = null;
    for (const [rule, type] of LITERAL_RULES) {
      rule.lastIndex = this.index;
      const match = rule.exec(this.source);
      if (match && match[0].length > bestLength) {
        bestLength = match[0].length;
        bestType = type;
      }
    }

    if (bestType !== null) {
      const punctuation = this.matchPunctuation();
      // `./x` is a path, `.` alone is punctuation.
      if (punctuation === null || punctuation[0].length < bestLength) {
        const text = this.advanceBy(bestLength);
        const type = bestType === TokenType.Identifier ? (KEYWORDS.get(text) ?? bestType) : bestType;
        return { type, text, start, end: this.position };
      }
    }

    const punctuation = this.matchPunctuation();
    if (punctuation !== null) {
      const [text, type] = punctuation;
      this.advanceBy(text.length);
      return { type, text, start, end: this.position };
    }

    throw new ParseError(
      `Unexpected character '${this.peekChar()}'`,
      ParseErrorCode.UNEXPECTED_CHARACTER,
      start.line,
      start.column
    );
  }

  private matchPunctuation(): readonly [string, TokenType] | null {
    for (const entry of PUNCTUATION) {
      if (this.startsWith(entry[0])) return entry;
    }
    return null;
  }

  private skipTrivia(): void {
    for (;;) {
      const ch = this.peekChar();
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
        continue;
      }
      if (ch === "#") {
        while (this.index < this.source.length && this.peekChar() !== "\n") {
          this.advance();
        }
        continue;
      }
      if (this.startsWith("/*")) {
        const start = this.position;
        this.advanceBy(2);
        while (!this.startsWith("*/")) {
          if (this.index >= this.source.length) {
            throw new ParseError(
              "Unterminated block comment",
              ParseErrorCode.UNTERMINATED_COMMENT,
              start.line,
              start.column
            );
          }
          this.advance();
        }
        this.advanceBy(2);
        continue;
      }
      return;
    }
  }

  /* ---------------------------------------------------------------------------
   * String bodies
   * ------------------------------------------------------------------------- */

  /**
   * Read the next chunk of a string body. The opening delimiter must already
   * be consumed; after an `interpolation` chunk the caller parses the
   * expression and its closing brace before asking for the next chunk.
   */
  public readStringChunk(indented: boolean): StringChunk {
    const start = this.position;
    let content = "";

    while (this.index < this.source.length) {
      if (this.startsWith("${")) {
        if (content.length > 0 || this.positionDiffers(start)) {
          return { type: "text", content, start, end: this.position };
        }
        this.advanceBy(2);
        return { type: "interpolation", start };
      }

      if (indented) {
        if (this.startsWith("'''")) {
          this.advanceBy(3);
          content += "''";
          continue;
        }
        if (this.startsWith("''$")) {
          this.advanceBy(3);
          content += "$";
          continue;
        }
        if (this.startsWith("''\\")) {
          this.advanceBy(3);
          content += decodeEscape(this.advance());
          continue;
        }
        if (this.startsWith("''")) {
          if (this.positionDiffers(start)) {
            return { type: "text", content, start, end: this.position };
          }
          this.advanceBy(2);
          return { type: "close", end: this.position };
        }
        content += this.advance();
        continue;
      }

      const ch = this.peekChar();
      if (ch === '"') {
        if (this.positionDiffers(start)) {
          return { type: "text", content, start, end: this.position };
        }
        this.advance();
        return { type: "close", end: this.position };
      }
      if (ch === "\\") {
        this.advance();
        if (this.index >= this.source.length) break;
        content += decodeEscape(this.advance());
        continue;
      }
      if (this.startsWith("$$")) {
        content += this.advanceBy(2);
        continue;
      }
      content += this.advance();
    }

    throw new ParseError(
      indented ? "Unterminated indented string" : "Unterminated string",
      ParseErrorCode.UNTERMINATED_STRING,
      start.line,
      start.column
    );
  }

  private positionDiffers(pos: Position): boolean {
    return pos.line !== this.line || pos.column !== this.column;
  }
}

function decodeEscape(ch: string): string {
  switch (ch) {
    case "n":
      return "\n";
    case "r":
      return "\r";
    case "t":
      return "\t";
    default:
      return ch;
  }
}
