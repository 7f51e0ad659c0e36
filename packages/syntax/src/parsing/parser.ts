/**
 * Syntax Package - Parser
 *
 * Recursive-descent parser for the manifest language. Produces the tree in
 * model/ast.ts with a span on every node.
 *
 * The parser is strict: invalid input throws a ParseError at the first
 * problem. There is no recovery.
 */

import type {
  AttrPart,
  Binding,
  BinaryOperator,
  DestructuredFunctionHead,
  Expression,
  FunctionArgument,
  IndentedStringExpression,
  Parsed,
  Position,
  StringExpression,
  StringPart,
} from "../model/ast.js";
import { spanFromBounds } from "../model/position.js";
import { ParseError, ParseErrorCode } from "./errors.js";
import { Scanner, TokenType, type ScannerState, type Token } from "./scanner.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Parse manifest source into an expression tree.
 *
 * @example
 * ```typescript
 * const { expression } = parse('{ inputs.nixpkgs.url = "github:NixOS/nixpkgs"; }');
 * expression.$kind; // "Map"
 * ```
 */
export function parse(source: string): Parsed {
  const parser = new Parser(source);
  return { expression: parser.parseRoot() };
}

/* =============================================================================
 * OPERATOR TABLE
 * ============================================================================= */

interface BinaryInfo {
  readonly operator: BinaryOperator;
  /** Left binding power */
  readonly lbp: number;
  /** Right binding power (equal to lbp for right-associative operators) */
  readonly rbp: number;
}

const BINARY_OPERATORS: ReadonlyMap<TokenType, BinaryInfo> = new Map([
  [TokenType.Implication, { operator: "->", lbp: 1, rbp: 1 }],
  [TokenType.Or, { operator: "||", lbp: 2, rbp: 3 }],
  [TokenType.And, { operator: "&&", lbp: 3, rbp: 4 }],
  [TokenType.Equals, { operator: "==", lbp: 4, rbp: 5 }],
  [TokenType.NotEquals, { operator: "!=", lbp: 4, rbp: 5 }],
  [TokenType.LessThan, { operator: "<", lbp: 5, rbp: 6 }],
  [TokenType.GreaterThan, { operator: ">", lbp: 5, rbp: 6 }],
  [TokenType.LessOrEqual, { operator: "<=", lbp: 5, rbp: 6 }],
  [TokenType.GreaterOrEqual, { operator: ">=", lbp: 5, rbp: 6 }],
  [TokenType.Update, { operator: "//", lbp: 6, rbp: 6 }],
  [TokenType.Plus, { operator: "+", lbp: 8, rbp: 9 }],
  [TokenType.Minus, { operator: "-", lbp: 8, rbp: 9 }],
  [TokenType.Star, { operator: "*", lbp: 9, rbp: 10 }],
  [TokenType.Slash, { operator: "/", lbp: 9, rbp: 10 }],
  [TokenType.Concat, { operator: "++", lbp: 10, rbp: 10 }],
]);

const NOT_BINDING_POWER = 7;
const HAS_ATTRIBUTE_BINDING_POWER = 11;
const NEGATION_BINDING_POWER = 12;

/** Tokens that can start an argument in a function application. */
const SIMPLE_START: ReadonlySet<TokenType> = new Set([
  TokenType.Identifier,
  TokenType.Integer,
  TokenType.Float,
  TokenType.Path,
  TokenType.HomePath,
  TokenType.SearchPath,
  TokenType.Uri,
  TokenType.StringOpen,
  TokenType.IndentedStringOpen,
  TokenType.OpenParen,
  TokenType.OpenBracket,
  TokenType.OpenBrace,
  TokenType.KeywordRec,
]);

interface ParserState {
  readonly scanner: ScannerState;
  readonly lookahead: Token | null;
  readonly lastTokenEnd: Position;
}

interface Formals {
  readonly arguments: FunctionArgument[];
  readonly ellipsis: boolean;
}

/* =============================================================================
 * PARSER
 * ============================================================================= */

class Parser {
  private readonly scanner: Scanner;
  private lookahead: Token | null = null;
  /** End of the last consumed token. */
  private lastTokenEnd: Position = { line: 1, column: 1 };

  constructor(source: string) {
    this.scanner = new Scanner(source);
  }

  public parseRoot(): Expression {
    const expression = this.parseExpression();
    this.expect(TokenType.EOF, "end of input");
    return expression;
  }

  // ------------------------------------------------------------------------------------------
  // Token plumbing
  // ------------------------------------------------------------------------------------------

  private peek(): Token {
    if (this.lookahead === null) {
      this.lookahead = this.scanner.nextToken();
    }
    return this.lookahead;
  }

  private next(): Token {
    const token = this.peek();
    this.lookahead = null;
    this.lastTokenEnd = token.end;
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw this.unexpected(token, description);
    }
    return this.next();
  }

  private save(): ParserState {
    return { scanner: this.scanner.save(), lookahead: this.lookahead, lastTokenEnd: this.lastTokenEnd };
  }

  private restore(state: ParserState): void {
    this.scanner.restore(state.scanner);
    this.lookahead = state.lookahead;
    this.lastTokenEnd = state.lastTokenEnd;
  }

  private unexpected(token: Token, expected: string): ParseError {
    const found = token.type === TokenType.EOF ? "end of input" : `'${token.text}'`;
    return new ParseError(
      `Expected ${expected} but found ${found}`,
      ParseErrorCode.UNEXPECTED_TOKEN,
      token.start.line,
      token.start.column
    );
  }

  // ------------------------------------------------------------------------------------------
  // Functions and statement-like forms
  // ------------------------------------------------------------------------------------------

  private parseExpression(): Expression {
    const token = this.peek();
    const start = token.start;

    switch (token.type) {
      case TokenType.Identifier: {
        const state = this.save();
        this.next();
        const after = this.peek();
        if (after.type === TokenType.Colon) {
          this.next();
          const body = this.parseExpression();
          return {
            $kind: "Function",
            head: { $kind: "Simple", identifier: token.text },
            body,
            span: spanFromBounds(start, body.span.end),
          };
        }
        if (after.type === TokenType.At) {
          this.next();
          const formals = this.tryParseFormals();
          if (formals === null) {
            throw this.unexpected(this.peek(), "a destructured argument set");
          }
          return this.finishFunction(start, formals, token.text);
        }
        this.restore(state);
        break;
      }

      case TokenType.OpenBrace: {
        const state = this.save();
        const formals = this.tryParseFormals();
        if (formals !== null) {
          const after = this.peek();
          if (after.type === TokenType.Colon) {
            return this.finishFunction(start, formals, null);
          }
          if (after.type === TokenType.At) {
            this.next();
            const name = this.expect(TokenType.Identifier, "an identifier after '@'");
            return this.finishFunction(start, formals, name.text);
          }
        }
        this.restore(state);
        break;
      }

      case TokenType.KeywordAssert:
      case TokenType.KeywordWith: {
        this.next();
        const expression = this.parseExpression();
        this.expect(TokenType.Semicolon, "';'");
        const target = this.parseExpression();
        const span = spanFromBounds(start, target.span.end);
        return token.type === TokenType.KeywordAssert
          ? { $kind: "Assert", expression, target, span }
          : { $kind: "With", expression, target, span };
      }

      case TokenType.KeywordLet: {
        this.next();
        const bindings = this.parseBindings(TokenType.KeywordIn);
        this.expect(TokenType.KeywordIn, "'in'");
        const target = this.parseExpression();
        return { $kind: "LetIn", bindings, target, span: spanFromBounds(start, target.span.end) };
      }

      default:
        break;
    }

    return this.parseIf();
  }

  private finishFunction(start: Position, formals: Formals, identifier: string | null): Expression {
    this.expect(TokenType.Colon, "':'");
    const body = this.parseExpression();
    const head: DestructuredFunctionHead = {
      $kind: "Destructured",
      arguments: formals.arguments,
      ellipsis: formals.ellipsis,
      identifier,
    };
    return { $kind: "Function", head, body, span: spanFromBounds(start, body.span.end) };
  }

  /**
   * Try to read `{ a, b ? x, ... }`. Returns null (with the cursor wherever
   * it stopped) when the braces hold something else; callers restore.
   */
  private tryParseFormals(): Formals | null {
    if (this.peek().type !== TokenType.OpenBrace) return null;
    this.next();

    const args: FunctionArgument[] = [];
    try {
      for (;;) {
        const token = this.peek();
        if (token.type === TokenType.CloseBrace) {
          this.next();
          return { arguments: args, ellipsis: false };
        }
        if (token.type === TokenType.Ellipsis) {
          this.next();
          if (this.peek().type !== TokenType.CloseBrace) return null;
          this.next();
          return { arguments: args, ellipsis: true };
        }
        if (token.type !== TokenType.Identifier) return null;
        this.next();

        let defaultValue: Expression | null = null;
        if (this.peek().type === TokenType.Question) {
          this.next();
          defaultValue = this.parseExpression();
        }
        args.push({ identifier: token.text, default: defaultValue });

        const separator = this.peek();
        if (separator.type === TokenType.Comma) {
          this.next();
          continue;
        }
        if (separator.type === TokenType.CloseBrace) {
          this.next();
          return { arguments: args, ellipsis: false };
        }
        return null;
      }
    } catch (error) {
      if (error instanceof ParseError) return null;
      throw error;
    }
  }

  private parseIf(): Expression {
    const token = this.peek();
    if (token.type !== TokenType.KeywordIf) {
      return this.parseOperators(0);
    }
    this.next();
    const predicate = this.parseExpression();
    this.expect(TokenType.KeywordThen, "'then'");
    const consequent = this.parseExpression();
    this.expect(TokenType.KeywordElse, "'else'");
    const alternative = this.parseExpression();
    return {
      $kind: "IfThenElse",
      predicate,
      then: consequent,
      else: alternative,
      span: spanFromBounds(token.start, alternative.span.end),
    };
  }

  // ------------------------------------------------------------------------------------------
  // Operators
  // ------------------------------------------------------------------------------------------

  private parseOperators(minBp: number): Expression {
    const token = this.peek();
    let left: Expression;

    if (token.type === TokenType.Not || token.type === TokenType.Minus) {
      this.next();
      const operand = this.parseOperators(
        token.type === TokenType.Not ? NOT_BINDING_POWER : NEGATION_BINDING_POWER
      );
      left = {
        $kind: "UnaryOperation",
        operator: token.type === TokenType.Not ? "!" : "-",
        operand,
        span: spanFromBounds(token.start, operand.span.end),
      };
    } else {
      left = this.parseApplication();
    }

    for (;;) {
      const op = this.peek();

      if (op.type === TokenType.Question) {
        if (HAS_ATTRIBUTE_BINDING_POWER < minBp) break;
        this.next();
        const attrPath = this.parseAttrPath();
        left = {
          $kind: "HasAttribute",
          expression: left,
          attrPath,
          span: spanFromBounds(left.span.start, this.lastTokenEnd),
        };
        continue;
      }

      const info = BINARY_OPERATORS.get(op.type);
      if (info === undefined || info.lbp < minBp) break;
      this.next();
      const right = this.parseOperators(info.rbp);
      left = {
        $kind: "BinaryOperation",
        operator: info.operator,
        left,
        right,
        span: spanFromBounds(left.span.start, right.span.end),
      };
    }

    return left;
  }

  private parseApplication(): Expression {
    let fn = this.parseSelect();
    while (SIMPLE_START.has(this.peek().type)) {
      const argument = this.parseSelect();
      fn = {
        $kind: "Call",
        function: fn,
        argument,
        span: spanFromBounds(fn.span.start, argument.span.end),
      };
    }
    return fn;
  }

  private parseSelect(): Expression {
    const expression = this.parseSimple();
    if (this.peek().type !== TokenType.Dot) {
      return expression;
    }
    this.next();
    const attrPath = this.parseAttrPath();
    let defaultValue: Expression | null = null;
    if (this.peek().type === TokenType.KeywordOr) {
      this.next();
      defaultValue = this.parseSelect();
    }
    return {
      $kind: "Select",
      expression,
      attrPath,
      default: defaultValue,
      span: spanFromBounds(expression.span.start, this.lastTokenEnd),
    };
  }

  // ------------------------------------------------------------------------------------------
  // Primaries
  // ------------------------------------------------------------------------------------------

  private parseSimple(): Expression {
    const token = this.peek();
    const span = spanFromBounds(token.start, token.end);

    switch (token.type) {
      case TokenType.Identifier:
        this.next();
        return { $kind: "Identifier", id: token.text, span };

      case TokenType.Integer:
        this.next();
        return { $kind: "Integer", value: token.text, span };

      case TokenType.Float:
        this.next();
        return { $kind: "Float", value: token.text, span };

      case TokenType.Path:
      case TokenType.HomePath:
      case TokenType.SearchPath:
        this.next();
        return { $kind: "Path", path: token.text, span };

      case TokenType.Uri:
        this.next();
        return { $kind: "Uri", uri: token.text, span };

      case TokenType.StringOpen:
        this.next();
        return this.parseString(token, false);

      case TokenType.IndentedStringOpen:
        this.next();
        return this.parseString(token, true);

      case TokenType.OpenParen: {
        this.next();
        const inner = this.parseExpression();
        this.expect(TokenType.CloseParen, "')'");
        return inner;
      }

      case TokenType.OpenBracket: {
        this.next();
        const elements: Expression[] = [];
        while (this.peek().type !== TokenType.CloseBracket) {
          elements.push(this.parseSelect());
        }
        const close = this.next();
        return { $kind: "List", elements, span: spanFromBounds(token.start, close.end) };
      }

      case TokenType.OpenBrace:
      case TokenType.KeywordRec: {
        this.next();
        if (token.type === TokenType.KeywordRec) {
          this.expect(TokenType.OpenBrace, "'{'");
        }
        const bindings = this.parseBindings(TokenType.CloseBrace);
        const close = this.expect(TokenType.CloseBrace, "'}'");
        return {
          $kind: "Map",
          recursive: token.type === TokenType.KeywordRec,
          bindings,
          span: spanFromBounds(token.start, close.end),
        };
      }

      default:
        throw this.unexpected(token, "an expression");
    }
  }

  private parseString(open: Token, indented: true): IndentedStringExpression;
  private parseString(open: Token, indented: false): StringExpression;
  private parseString(open: Token, indented: boolean): StringExpression | IndentedStringExpression {
    const parts: StringPart[] = [];

    for (;;) {
      const chunk = this.scanner.readStringChunk(indented);
      if (chunk.type === "text") {
        parts.push({ $kind: "Raw", content: chunk.content, span: spanFromBounds(chunk.start, chunk.end) });
        continue;
      }
      if (chunk.type === "interpolation") {
        const expression = this.parseExpression();
        const close = this.expect(TokenType.CloseBrace, "'}' closing the interpolation");
        parts.push({ $kind: "Interpolation", expression, span: spanFromBounds(chunk.start, close.end) });
        continue;
      }
      this.lastTokenEnd = chunk.end;
      const span = spanFromBounds(open.start, chunk.end);
      return indented ? { $kind: "IndentedString", parts, span } : { $kind: "String", parts, span };
    }
  }

  // ------------------------------------------------------------------------------------------
  // Bindings and attribute paths
  // ------------------------------------------------------------------------------------------

  private parseBindings(terminator: TokenType): Binding[] {
    const bindings: Binding[] = [];

    for (;;) {
      const token = this.peek();
      if (token.type === terminator) {
        return bindings;
      }

      if (token.type === TokenType.KeywordInherit) {
        this.next();
        let from: Expression | null = null;
        if (this.peek().type === TokenType.OpenParen) {
          this.next();
          from = this.parseExpression();
          this.expect(TokenType.CloseParen, "')'");
        }
        const attributes: AttrPart[] = [];
        while (this.peek().type !== TokenType.Semicolon) {
          attributes.push(this.parseAttrPart());
        }
        const semicolon = this.next();
        bindings.push({
          $kind: "Inherit",
          from,
          attributes,
          span: spanFromBounds(token.start, semicolon.end),
        });
        continue;
      }

      const from = this.parseAttrPath();
      this.expect(TokenType.Assign, "'='");
      const to = this.parseExpression();
      const semicolon = this.expect(TokenType.Semicolon, "';'");
      bindings.push({
        $kind: "KeyValue",
        from,
        to,
        span: spanFromBounds(token.start, semicolon.end),
      });
    }
  }

  private parseAttrPath(): AttrPart[] {
    const parts = [this.parseAttrPart()];
    while (this.peek().type === TokenType.Dot) {
      this.next();
      parts.push(this.parseAttrPart());
    }
    return parts;
  }

  private parseAttrPart(): AttrPart {
    const token = this.peek();
    const span = spanFromBounds(token.start, token.end);

    switch (token.type) {
      case TokenType.Identifier:
      case TokenType.KeywordOr:
        this.next();
        return { $kind: "Raw", content: token.text, span };

      case TokenType.StringOpen: {
        this.next();
        const expression = this.parseString(token, false);
        const [first, ...rest] = expression.parts;
        if (first === undefined) {
          return { $kind: "Raw", content: "", span: expression.span };
        }
        if (first.$kind === "Raw" && rest.length === 0) {
          return { $kind: "Raw", content: first.content, span: expression.span };
        }
        return { $kind: "Expression", expression, span: expression.span };
      }

      case TokenType.InterpolationOpen: {
        this.next();
        const expression = this.parseExpression();
        const close = this.expect(TokenType.CloseBrace, "'}' closing the interpolation");
        return { $kind: "Interpolation", expression, span: spanFromBounds(token.start, close.end) };
      }

      default:
        throw this.unexpected(token, "an attribute name");
    }
  }
}
