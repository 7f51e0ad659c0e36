/**
 * String literal quoting for values written into a manifest.
 */

export type LiteralKind = "String" | "IndentedString";

/** Escape text for the inside of a `"…"` literal. */
export function escapeStringContent(value: string): string {
  return value.replace(/\\|"|\$\{|\n|\r|\t/g, (match) => {
    switch (match) {
      case "\n":
        return "\\n";
      case "\r":
        return "\\r";
      case "\t":
        return "\\t";
      default:
        return `\\${match}`;
    }
  });
}

/** Escape text for the inside of a `''…''` literal. */
export function escapeIndentedStringContent(value: string): string {
  return value.replace(/''|\$\{/g, (match) => (match === "''" ? "'''" : "''${"));
}

export function escapeLiteralContent(kind: LiteralKind, value: string): string {
  return kind === "String" ? escapeStringContent(value) : escapeIndentedStringContent(value);
}

export function quoteString(value: string): string {
  return `"${escapeStringContent(value)}"`;
}

/** A complete literal of the given kind holding `value`. */
export function quoteLiteral(kind: LiteralKind, value: string): string {
  return kind === "String" ? quoteString(value) : `''${escapeIndentedStringContent(value)}''`;
}
