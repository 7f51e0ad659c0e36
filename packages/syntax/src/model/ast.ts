/**
 * Syntax Package - Expression Tree
 *
 * The tree produced by the manifest parser. Every node carries a span over
 * the original text; consumers patch text through those spans and never
 * re-serialize the tree.
 */

/* =============================================================================
 * SOURCE LOCATION
 * ============================================================================= */

/**
 * A position in source text.
 */
export interface Position {
  /** Line number (1-based) */
  readonly line: number;

  /** Column number (1-based, counted in characters) */
  readonly column: number;
}

/**
 * A half-open range in source text: `end` is the position just after the
 * last character of the node.
 */
export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/* =============================================================================
 * PARTS
 * ============================================================================= */

/** Literal text inside a string, or a plain attribute name. */
export interface RawPart {
  readonly $kind: "Raw";
  /** Decoded content (escapes resolved) */
  readonly content: string;
  readonly span: Span;
}

/** `${ ... }` inside a string or used as an attribute name. */
export interface InterpolationPart {
  readonly $kind: "Interpolation";
  readonly expression: Expression;
  readonly span: Span;
}

/** A quoted attribute name that contains an interpolation. */
export interface ExpressionPart {
  readonly $kind: "Expression";
  readonly expression: StringExpression;
  readonly span: Span;
}

export type StringPart = RawPart | InterpolationPart;

export type AttrPart = RawPart | InterpolationPart | ExpressionPart;

/* =============================================================================
 * BINDINGS
 * ============================================================================= */

/** `a.b.c = value;` */
export interface KeyValueBinding {
  readonly $kind: "KeyValue";
  readonly from: readonly AttrPart[];
  readonly to: Expression;
  /** From the first key part through the terminating `;` */
  readonly span: Span;
}

/** `inherit a b;` or `inherit (source) a b;` */
export interface InheritBinding {
  readonly $kind: "Inherit";
  readonly from: Expression | null;
  readonly attributes: readonly AttrPart[];
  readonly span: Span;
}

export type Binding = KeyValueBinding | InheritBinding;

/* =============================================================================
 * FUNCTIONS
 * ============================================================================= */

/** `x: body` */
export interface SimpleFunctionHead {
  readonly $kind: "Simple";
  readonly identifier: string;
}

export interface FunctionArgument {
  readonly identifier: string;
  readonly default: Expression | null;
}

/** `{ a, b ? x, ... } @ args: body` */
export interface DestructuredFunctionHead {
  readonly $kind: "Destructured";
  readonly arguments: readonly FunctionArgument[];
  /** Whether the pattern ends with `...` */
  readonly ellipsis: boolean;
  /** Name bound with `@`, on either side of the pattern */
  readonly identifier: string | null;
}

export type FunctionHead = SimpleFunctionHead | DestructuredFunctionHead;

/* =============================================================================
 * EXPRESSIONS
 * ============================================================================= */

export interface MapExpression {
  readonly $kind: "Map";
  readonly recursive: boolean;
  readonly bindings: readonly Binding[];
  readonly span: Span;
}

export interface StringExpression {
  readonly $kind: "String";
  readonly parts: readonly StringPart[];
  readonly span: Span;
}

export interface IndentedStringExpression {
  readonly $kind: "IndentedString";
  readonly parts: readonly StringPart[];
  readonly span: Span;
}

export interface UriExpression {
  readonly $kind: "Uri";
  readonly uri: string;
  readonly span: Span;
}

export interface FunctionExpression {
  readonly $kind: "Function";
  readonly head: FunctionHead;
  readonly body: Expression;
  readonly span: Span;
}

export interface IdentifierExpression {
  readonly $kind: "Identifier";
  readonly id: string;
  readonly span: Span;
}

export interface IntegerExpression {
  readonly $kind: "Integer";
  readonly value: string;
  readonly span: Span;
}

export interface FloatExpression {
  readonly $kind: "Float";
  readonly value: string;
  readonly span: Span;
}

export interface PathExpression {
  readonly $kind: "Path";
  readonly path: string;
  readonly span: Span;
}

export interface ListExpression {
  readonly $kind: "List";
  readonly elements: readonly Expression[];
  readonly span: Span;
}

export interface LetInExpression {
  readonly $kind: "LetIn";
  readonly bindings: readonly Binding[];
  readonly target: Expression;
  readonly span: Span;
}

export interface WithExpression {
  readonly $kind: "With";
  readonly expression: Expression;
  readonly target: Expression;
  readonly span: Span;
}

export interface AssertExpression {
  readonly $kind: "Assert";
  readonly expression: Expression;
  readonly target: Expression;
  readonly span: Span;
}

export interface IfThenElseExpression {
  readonly $kind: "IfThenElse";
  readonly predicate: Expression;
  readonly then: Expression;
  readonly else: Expression;
  readonly span: Span;
}

export interface SelectExpression {
  readonly $kind: "Select";
  readonly expression: Expression;
  readonly attrPath: readonly AttrPart[];
  readonly default: Expression | null;
  readonly span: Span;
}

export interface HasAttributeExpression {
  readonly $kind: "HasAttribute";
  readonly expression: Expression;
  readonly attrPath: readonly AttrPart[];
  readonly span: Span;
}

export interface CallExpression {
  readonly $kind: "Call";
  readonly function: Expression;
  readonly argument: Expression;
  readonly span: Span;
}

export type BinaryOperator =
  | "->"
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "//"
  | "+"
  | "-"
  | "*"
  | "/"
  | "++";

export interface BinaryOperationExpression {
  readonly $kind: "BinaryOperation";
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly span: Span;
}

export type UnaryOperator = "!" | "-";

export interface UnaryOperationExpression {
  readonly $kind: "UnaryOperation";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
  readonly span: Span;
}

export type Expression =
  | MapExpression
  | StringExpression
  | IndentedStringExpression
  | UriExpression
  | FunctionExpression
  | IdentifierExpression
  | IntegerExpression
  | FloatExpression
  | PathExpression
  | ListExpression
  | LetInExpression
  | WithExpression
  | AssertExpression
  | IfThenElseExpression
  | SelectExpression
  | HasAttributeExpression
  | CallExpression
  | BinaryOperationExpression
  | UnaryOperationExpression;

export type ExpressionKind = Expression["$kind"];

/** Result of parsing a whole manifest. */
export interface Parsed {
  readonly expression: Expression;
}
