/**
 * Core Package - Attribute Path Resolution Tests
 */

import { describe, it, expect } from "vitest";
import { parse, type KeyValueBinding } from "@flakepatch/syntax";
import {
  findFirst,
  findAll,
  keySegments,
  matchKey,
  FlakeEditError,
  FlakeEditErrorCode,
} from "@flakepatch/core";

function keyOf(binding: KeyValueBinding | null): string | null {
  return binding === null ? null : keySegments(binding).join(".");
}

function codeOf(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    return error instanceof FlakeEditError ? error.code : null;
  }
  return null;
}

describe("matchKey", () => {
  it("matches when every target segment matches", () => {
    expect(matchKey(["inputs", "nixpkgs", "url"], ["inputs", "nixpkgs", "url"])).toEqual({ kind: "match" });
  });

  it("matches a key longer than the target", () => {
    expect(matchKey(["inputs", "nixpkgs", "url"], ["inputs"])).toEqual({ kind: "match" });
  });

  it("returns the rest of the target when the key is a prefix", () => {
    expect(matchKey(["inputs"], ["inputs", "nixpkgs", "url"])).toEqual({
      kind: "prefix",
      remaining: ["nixpkgs", "url"],
    });
  });

  it("fails on the first differing segment", () => {
    expect(matchKey(["inputs", "other"], ["inputs", "nixpkgs"])).toEqual({ kind: "none" });
  });

  it("never matches an interpolated segment", () => {
    expect(matchKey([null], ["inputs"])).toEqual({ kind: "none" });
  });
});

describe("findFirst", () => {
  it("finds a flattened binding", () => {
    const { expression } = parse('{ inputs.nixpkgs.url = "x"; outputs = { }; }');
    expect(keyOf(findFirst(expression, ["inputs", "nixpkgs", "url"]))).toBe("inputs.nixpkgs.url");
  });

  it("finds a binding inside a nested inputs block", () => {
    const { expression } = parse('{ inputs = { nixpkgs.url = "x"; }; }');
    expect(keyOf(findFirst(expression, ["inputs", "nixpkgs", "url"]))).toBe("nixpkgs.url");
  });

  it("finds a binding inside a per-input attribute set", () => {
    const { expression } = parse('{ inputs.nixpkgs = { flake = false; url = "x"; }; }');
    expect(keyOf(findFirst(expression, ["inputs", "nixpkgs", "url"]))).toBe("url");
  });

  it("returns null when nothing matches", () => {
    const { expression } = parse('{ inputs.nixpkgs.url = "x"; }');
    expect(findFirst(expression, ["inputs", "home-manager", "url"])).toBeNull();
  });

  it("returns the first binding whose key extends the path", () => {
    const { expression } = parse('{ description = "d"; inputs.a.url = "x"; inputs.b.url = "y"; }');
    expect(keyOf(findFirst(expression, ["inputs"]))).toBe("inputs.a.url");
  });

  it("returns the first key-value binding for a null path", () => {
    const { expression } = parse("{ b = 1; a = 2; }");
    expect(keyOf(findFirst(expression, null))).toBe("b");
  });

  it("returns null for a null path on an empty set", () => {
    expect(findFirst(parse("{ }").expression, null)).toBeNull();
  });

  it("keeps searching siblings after a partial match finds nothing", () => {
    const { expression } = parse("{ a.b.c.d = 1; a.b.x = { y = 2; }; }");
    const found = findFirst(expression, ["a", "b", "x", "y"]);
    expect(keyOf(found)).toBe("y");
    expect(found?.to.$kind === "Integer" && found.to.value).toBe("2");
  });

  it("resolves across differently split keys for the same path", () => {
    const { expression } = parse("{ a.b = { c.d = 1; }; a = { b.c.e = 2; }; }");
    const found = findFirst(expression, ["a", "b", "c", "e"]);
    expect(keyOf(found)).toBe("b.c.e");
  });

  it("does not descend into bindings whose key diverges", () => {
    const { expression } = parse("{ inputs.a.inputs.nixpkgs.follows = \"nixpkgs\"; }");
    expect(findFirst(expression, ["inputs", "nixpkgs"])).toBeNull();
  });

  it("skips interpolated keys", () => {
    const { expression } = parse('{ ${"inputs"} = { }; inputs.a.url = "x"; }');
    expect(keyOf(findFirst(expression, ["inputs"]))).toBe("inputs.a.url");
  });

  it("fails on inherit", () => {
    const { expression } = parse('{ inherit foo; inputs.a.url = "x"; }');
    expect(() => findFirst(expression, ["inputs"])).toThrow("`inherit` not supported (at 1:3)");
    expect(codeOf(() => findFirst(expression, ["inputs"]))).toBe(FlakeEditErrorCode.INHERIT_NOT_SUPPORTED);
  });

  it("fails when the searched expression is not an attribute set", () => {
    const { expression } = parse("inputs: { }");
    expect(codeOf(() => findFirst(expression, ["inputs"]))).toBe(
      FlakeEditErrorCode.UNSUPPORTED_EXPRESSION_KIND
    );
    expect(() => findFirst(expression, ["inputs"])).toThrow("unsupported expression type Function (at 1:1)");
  });

  it("fails when a prefix leads into something other than a set", () => {
    const { expression } = parse("{ inputs = import ./inputs.nix; }");
    expect(codeOf(() => findFirst(expression, ["inputs", "a", "url"]))).toBe(
      FlakeEditErrorCode.UNSUPPORTED_EXPRESSION_KIND
    );
  });
});

describe("findAll", () => {
  it("collects every matching binding in source order", () => {
    const source = [
      "{",
      '  inputs.a.url = "x";',
      '  inputs = { b.url = "y"; };',
      '  inputs.c = { url = "z"; };',
      "  outputs = { ... }: { };",
      "}",
    ].join("\n");
    const found = findAll(parse(source).expression, ["inputs"]);
    expect(found.map((binding) => keySegments(binding).join("."))).toEqual(["inputs.a.url", "inputs", "inputs.c"]);
  });

  it("collects through prefixes", () => {
    const { expression } = parse('{ inputs = { a.url = "x"; b.url = "y"; c.flake = false; }; }');
    const found = findAll(expression, ["inputs", "b"]);
    expect(found.map((binding) => keySegments(binding).join("."))).toEqual(["b.url"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(findAll(parse("{ description = \"d\"; }").expression, ["inputs"])).toEqual([]);
  });
});
