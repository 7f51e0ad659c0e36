/**
 * @flakepatch/syntax
 *
 * Span-carrying expression tree for flake manifests, and the parser that
 * produces it.
 *
 * @example
 * ```typescript
 * import { parse } from "@flakepatch/syntax";
 *
 * const { expression } = parse(source);
 * ```
 */

export { parse } from "./parsing/parser.js";
export { ParseError, ParseErrorCode } from "./parsing/errors.js";
export type { ParseErrorCodeType } from "./parsing/errors.js";
export { Scanner, TokenType } from "./parsing/scanner.js";
export type { Token, StringChunk, ScannerState } from "./parsing/scanner.js";

export { spanFromBounds, comparePositions } from "./model/position.js";

export type {
  Position,
  Span,
  RawPart,
  InterpolationPart,
  ExpressionPart,
  StringPart,
  AttrPart,
  KeyValueBinding,
  InheritBinding,
  Binding,
  SimpleFunctionHead,
  FunctionArgument,
  DestructuredFunctionHead,
  FunctionHead,
  MapExpression,
  StringExpression,
  IndentedStringExpression,
  UriExpression,
  FunctionExpression,
  IdentifierExpression,
  IntegerExpression,
  FloatExpression,
  PathExpression,
  ListExpression,
  LetInExpression,
  WithExpression,
  AssertExpression,
  IfThenElseExpression,
  SelectExpression,
  HasAttributeExpression,
  CallExpression,
  BinaryOperator,
  BinaryOperationExpression,
  UnaryOperator,
  UnaryOperationExpression,
  Expression,
  ExpressionKind,
  Parsed,
} from "./model/ast.js";
