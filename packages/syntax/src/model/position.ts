import type { Position, Span } from "./ast.js";

// Position/span helpers shared by the parser and its consumers.

export function spanFromBounds(start: Position, end: Position): Span {
  return { start, end };
}

/**
 * Order two positions in document order.
 * Negative when `a` precedes `b`, zero when equal.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}
