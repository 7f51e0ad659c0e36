/**
 * Core Package - Input Collection
 *
 * Flattens the three ways a manifest can declare inputs into one list:
 *
 * ```nix
 * inputs.a.url = "…";             # flattened
 * inputs.b = { url = "…"; };      # flattened
 * inputs = { c.url = "…"; };      # nested
 * ```
 */

import type { Expression, KeyValueBinding, Span } from "@flakepatch/syntax";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";
import { expectMap, findAll, findFirst, keySegments } from "./attr-path.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

/**
 * How an input declaration is written.
 *
 * - `nested`: a child of an `inputs = { … };` block, key starts with the input name
 * - `flattened`: a top-level binding whose key starts with `inputs.<name>`
 */
export type DeclarationForm = "nested" | "flattened";

export interface CollectedInput {
  /** Input name, e.g. `nixpkgs` */
  readonly name: string;
  /** The binding declaring it, either `<name>…` or `inputs.<name>…` */
  readonly binding: KeyValueBinding;
  readonly form: DeclarationForm;
}

export interface InputSummary {
  readonly name: string;
  /** Literal URL, or null when it is not a plain string or URI */
  readonly url: string | null;
  readonly form: DeclarationForm;
  readonly span: Span;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Expand bindings found for `["inputs"]` into one entry per declared input,
 * in source order. Only `<name>` and `<name>.url` keys count as declarations;
 * anything else (`inputs.a.inputs.nixpkgs.follows`, `inputs.a.flake`) is
 * skipped.
 */
export function collectAllInputs(bindings: readonly KeyValueBinding[]): CollectedInput[] {
  const collected: CollectedInput[] = [];

  for (const binding of bindings) {
    const key = keySegments(binding);

    if (key.length === 1 && key[0] === "inputs") {
      const block = expectMap(binding.to);
      for (const child of block.bindings) {
        if (child.$kind === "Inherit") {
          throw FlakeEditError.at(
            "`inherit` not supported",
            FlakeEditErrorCode.INHERIT_NOT_SUPPORTED,
            child.span.start
          );
        }
        const [name, ...rest] = keySegments(child);
        if (typeof name === "string" && isDeclarationTail(rest)) {
          collected.push({ name, binding: child, form: "nested" });
        }
      }
      continue;
    }

    const [head, name, ...rest] = key;
    if (head === "inputs" && typeof name === "string" && isDeclarationTail(rest)) {
      collected.push({ name, binding, form: "flattened" });
    }
  }

  return collected;
}

/**
 * The URL of a collected input. Reads `url` out of `<name> = { url = …; }`
 * forms; returns null when the value is not a single literal.
 */
export function readInputUrl(input: CollectedInput): string | null {
  const key = keySegments(input.binding);
  if (key[key.length - 1] === "url") {
    return literalText(input.binding.to);
  }
  if (input.binding.to.$kind !== "Map") {
    return null;
  }
  const url = findFirst(input.binding.to, ["url"]);
  return url === null ? null : literalText(url.to);
}

/** Every input the manifest declares, with its URL when it is a literal. */
export function listInputs(expression: Expression): InputSummary[] {
  return collectAllInputs(findAll(expression, ["inputs"])).map((input) => ({
    name: input.name,
    url: readInputUrl(input),
    form: input.form,
    span: input.binding.span,
  }));
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function isDeclarationTail(rest: readonly (string | null)[]): boolean {
  return rest.length === 0 || (rest.length === 1 && rest[0] === "url");
}

function literalText(expression: Expression): string | null {
  switch (expression.$kind) {
    case "String":
    case "IndentedString": {
      const [first, ...rest] = expression.parts;
      if (first === undefined) return "";
      if (first.$kind !== "Raw" || rest.length > 0) return null;
      return expression.$kind === "IndentedString" ? first.content.trim() : first.content;
    }
    case "Uri":
      return expression.uri;
    default:
      return null;
  }
}
