/**
 * Core Package - Attribute Path Resolution
 *
 * Finds bindings by dotted attribute path. The tree's nesting need not
 * mirror the path: `inputs.nixpkgs.url = …;`, `inputs.nixpkgs = { url = …; };`
 * and `inputs = { nixpkgs.url = …; };` all resolve for
 * `["inputs", "nixpkgs", "url"]`.
 */

import type { Expression, KeyValueBinding, MapExpression } from "@flakepatch/syntax";
import { debug } from "../shared/debug.js";
import { FlakeEditError, FlakeEditErrorCode } from "../shared/errors.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

/** Plain segments of a dotted attribute path, e.g. `["inputs", "nixpkgs", "url"]`. */
export type AttrPath = readonly string[];

/**
 * Outcome of comparing one binding's key against a target path.
 *
 * - `match`: every target segment matched the front of the key
 * - `prefix`: the whole key matched the front of the target; `remaining`
 *   must be looked up inside the binding's value
 * - `none`: some segment differs
 */
export type KeyMatch =
  | { readonly kind: "match" }
  | { readonly kind: "prefix"; readonly remaining: AttrPath }
  | { readonly kind: "none" };

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Key segments of a binding. Interpolated segments (`${x}`, `"a${b}"`) are
 * `null` and never match.
 */
export function keySegments(binding: KeyValueBinding): (string | null)[] {
  return binding.from.map((part) => (part.$kind === "Raw" ? part.content : null));
}

export function matchKey(key: readonly (string | null)[], target: AttrPath): KeyMatch {
  const shared = Math.min(key.length, target.length);
  for (let i = 0; i < shared; i++) {
    if (key[i] !== target[i]) {
      return { kind: "none" };
    }
  }
  if (target.length <= key.length) {
    return { kind: "match" };
  }
  return { kind: "prefix", remaining: target.slice(key.length) };
}

/**
 * First binding matching `path`, searching maps in source order.
 * With a `null` path, the first key-value binding of the map.
 *
 * @throws FlakeEditError `FLAKE_UNSUPPORTED_EXPRESSION_KIND` if a searched
 * expression is not an attribute set, `FLAKE_INHERIT_NOT_SUPPORTED` on any
 * `inherit` met during the search
 */
export function findFirst(expression: Expression, path: AttrPath | null): KeyValueBinding | null {
  const map = expectMap(expression);

  for (const binding of map.bindings) {
    if (binding.$kind === "Inherit") {
      throw inheritNotSupported(binding.span.start);
    }
    if (path === null) {
      return binding;
    }

    const result = matchKey(keySegments(binding), path);
    switch (result.kind) {
      case "match":
        debug.resolve("binding.matched", { path: [...path], line: binding.span.start.line });
        return binding;
      case "prefix": {
        const found = findFirst(binding.to, result.remaining);
        if (found !== null) return found;
        break;
      }
      case "none":
        break;
    }
  }

  return null;
}

/**
 * Every binding matching `path`, in source order.
 */
export function findAll(expression: Expression, path: AttrPath): KeyValueBinding[] {
  const map = expectMap(expression);
  const found: KeyValueBinding[] = [];

  for (const binding of map.bindings) {
    if (binding.$kind === "Inherit") {
      throw inheritNotSupported(binding.span.start);
    }

    const result = matchKey(keySegments(binding), path);
    switch (result.kind) {
      case "match":
        found.push(binding);
        break;
      case "prefix":
        found.push(...findAll(binding.to, result.remaining));
        break;
      case "none":
        break;
    }
  }

  debug.resolve("find-all", { path: [...path], count: found.length });
  return found;
}

/**
 * Narrow an expression to an attribute set.
 */
export function expectMap(expression: Expression): MapExpression {
  if (expression.$kind !== "Map") {
    throw FlakeEditError.at(
      `unsupported expression type ${expression.$kind}`,
      FlakeEditErrorCode.UNSUPPORTED_EXPRESSION_KIND,
      expression.span.start
    );
  }
  return expression;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function inheritNotSupported(position: { line: number; column: number }): FlakeEditError {
  return FlakeEditError.at(
    "`inherit` not supported",
    FlakeEditErrorCode.INHERIT_NOT_SUPPORTED,
    position
  );
}
