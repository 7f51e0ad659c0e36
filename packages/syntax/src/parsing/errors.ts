/**
 * Error raised when manifest source cannot be parsed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCodeType,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${message} (at ${line}:${column})`);
    this.name = "ParseError";
  }
}

/** Error codes */
export const ParseErrorCode = {
  UNEXPECTED_CHARACTER: "PARSE_UNEXPECTED_CHARACTER",
  UNEXPECTED_TOKEN: "PARSE_UNEXPECTED_TOKEN",
  UNTERMINATED_STRING: "PARSE_UNTERMINATED_STRING",
  UNTERMINATED_COMMENT: "PARSE_UNTERMINATED_COMMENT",
} as const;

export type ParseErrorCodeType = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];
