import type { Expression, ExpressionKind } from "@flakepatch/syntax";

export type ExpressionOf<K extends ExpressionKind> = Extract<Expression, { $kind: K }>;

function isKind<K extends ExpressionKind>(expression: Expression, kind: K): expression is ExpressionOf<K> {
  return expression.$kind === kind;
}

/** Narrow to one expression kind, failing the test otherwise. */
export function expectKind<K extends ExpressionKind>(expression: Expression, kind: K): ExpressionOf<K> {
  if (isKind(expression, kind)) return expression;
  throw new Error(`expected a ${kind} expression, got ${expression.$kind}`);
}
