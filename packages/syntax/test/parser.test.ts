/**
 * Syntax Package - Parser Tests
 */

import { describe, it, expect } from "vitest";
import { parse, ParseError, ParseErrorCode, type Binding, type KeyValueBinding } from "@flakepatch/syntax";
import { expectKind } from "./_helpers/test-utils.js";

function keyValue(binding: Binding | undefined): KeyValueBinding {
  if (binding === undefined || binding.$kind !== "KeyValue") {
    throw new Error("expected a key-value binding");
  }
  return binding;
}

function rootBindings(source: string) {
  return expectKind(parse(source).expression, "Map").bindings;
}

describe("parse: bindings and spans", () => {
  const source = '{ inputs.nixpkgs.url = "github:NixOS/nixpkgs"; }';

  it("spans a binding from its key through the semicolon", () => {
    const binding = keyValue(rootBindings(source)[0]);
    expect(binding.span).toEqual({ start: { line: 1, column: 3 }, end: { line: 1, column: 47 } });
    expect(binding.from.map((part) => part.$kind === "Raw" && part.content)).toEqual([
      "inputs",
      "nixpkgs",
      "url",
    ]);
  });

  it("spans a string literal and its raw content separately", () => {
    const value = expectKind(keyValue(rootBindings(source)[0]).to, "String");
    expect(value.span).toEqual({ start: { line: 1, column: 24 }, end: { line: 1, column: 46 } });
    expect(value.parts).toEqual([
      {
        $kind: "Raw",
        content: "github:NixOS/nixpkgs",
        span: { start: { line: 1, column: 25 }, end: { line: 1, column: 45 } },
      },
    ]);
  });

  it("spans the whole attribute set", () => {
    expect(parse(source).expression.span).toEqual({
      start: { line: 1, column: 1 },
      end: { line: 1, column: 49 },
    });
  });

  it("counts columns in characters, not UTF-16 units", () => {
    const binding = keyValue(rootBindings('{ a = "😀"; b = 1; }')[1]);
    expect(binding.span.start).toEqual({ line: 1, column: 12 });
  });

  it("reads quoted keys as raw names", () => {
    const binding = keyValue(rootBindings('{ "a.b" = 1; }')[0]);
    expect(binding.from).toHaveLength(1);
    const [part] = binding.from;
    expect(part?.$kind === "Raw" && part.content).toBe("a.b");
  });

  it("keeps interpolated keys as interpolations", () => {
    const binding = keyValue(rootBindings("{ ${x} = 1; }")[0]);
    expect(binding.from[0]?.$kind).toBe("Interpolation");
  });

  it("parses inherit with a source", () => {
    const [binding] = rootBindings("{ inherit (pkgs) hello world; }");
    expect(binding?.$kind).toBe("Inherit");
    if (binding?.$kind === "Inherit") {
      expect(binding.from === null ? null : binding.from.$kind).toBe("Identifier");
      expect(binding.attributes).toHaveLength(2);
    }
  });

  it("parses an empty attribute set", () => {
    const map = expectKind(parse("{ }").expression, "Map");
    expect(map.bindings).toEqual([]);
    expect(map.recursive).toBe(false);
  });

  it("marks rec sets", () => {
    expect(expectKind(parse("rec { a = 1; }").expression, "Map").recursive).toBe(true);
  });
});

describe("parse: functions", () => {
  it("parses a destructured head with defaults, ellipsis and a trailing @", () => {
    const fn = expectKind(parse("{ self, nixpkgs ? null, ... } @ inputs: self").expression, "Function");
    expect(fn.span.start).toEqual({ line: 1, column: 1 });
    expect(fn.head.$kind).toBe("Destructured");
    if (fn.head.$kind === "Destructured") {
      expect(fn.head.arguments.map((argument) => argument.identifier)).toEqual(["self", "nixpkgs"]);
      expect(fn.head.arguments[0]?.default).toBeNull();
      expect(fn.head.arguments[1]?.default?.$kind).toBe("Identifier");
      expect(fn.head.ellipsis).toBe(true);
      expect(fn.head.identifier).toBe("inputs");
    }
  });

  it("parses a leading @ binding", () => {
    const fn = expectKind(parse("inputs @ { self }: self").expression, "Function");
    expect(fn.head).toEqual({
      $kind: "Destructured",
      arguments: [{ identifier: "self", default: null }],
      ellipsis: false,
      identifier: "inputs",
    });
  });

  it("parses a simple head", () => {
    const fn = expectKind(parse("inputs: { }").expression, "Function");
    expect(fn.head).toEqual({ $kind: "Simple", identifier: "inputs" });
    expect(fn.body.$kind).toBe("Map");
  });

  it("parses an empty parameter list", () => {
    const fn = expectKind(parse("{ }: 1").expression, "Function");
    expect(fn.head).toEqual({ $kind: "Destructured", arguments: [], ellipsis: false, identifier: null });
  });
});

describe("parse: expressions", () => {
  it("applies operator precedence", () => {
    const sum = expectKind(parse("1 + 2 * 3").expression, "BinaryOperation");
    expect(sum.operator).toBe("+");
    expect(expectKind(sum.right, "BinaryOperation").operator).toBe("*");
  });

  it("parses selection with a default", () => {
    const select = expectKind(parse("a.b.c or d").expression, "Select");
    expect(select.attrPath).toHaveLength(2);
    expect(select.default?.$kind).toBe("Identifier");
  });

  it("parses let, with, assert and if", () => {
    expect(parse("let x = 1; in x").expression.$kind).toBe("LetIn");
    expect(parse("with pkgs; [ hello ]").expression.$kind).toBe("With");
    expect(parse("assert true; 1").expression.$kind).toBe("Assert");
    expect(parse("if a then b else c").expression.$kind).toBe("IfThenElse");
  });

  it("parses application of a function to a set", () => {
    const call = expectKind(parse("import nixpkgs { inherit system; }").expression, "Call");
    expect(expectKind(call.function, "Call").argument.$kind).toBe("Identifier");
    expect(call.argument.$kind).toBe("Map");
  });

  it("splits interpolated strings into parts", () => {
    const value = expectKind(parse('"a${b}c"').expression, "String");
    expect(value.parts.map((part) => part.$kind)).toEqual(["Raw", "Interpolation", "Raw"]);
  });

  it("keeps indented string content undecoded by indentation", () => {
    const value = expectKind(parse("''\n  hello\n''").expression, "IndentedString");
    const [part] = value.parts;
    expect(part?.$kind === "Raw" && part.content).toBe("\n  hello\n");
  });

  it("parses a string with no content as having no parts", () => {
    expect(expectKind(parse('""').expression, "String").parts).toEqual([]);
  });

  it("parses URIs and paths", () => {
    expect(expectKind(parse("github:NixOS/nixpkgs").expression, "Uri").uri).toBe("github:NixOS/nixpkgs");
    expect(expectKind(parse("./configuration.nix").expression, "Path").path).toBe("./configuration.nix");
    expect(expectKind(parse("<nixpkgs>").expression, "Path").path).toBe("<nixpkgs>");
  });
});

describe("parse: errors", () => {
  it("reports a missing semicolon at the offending token", () => {
    expect(() => parse("{ a = 1 }")).toThrow("Expected ';' but found '}' (at 1:9)");
  });

  it("reports unterminated strings", () => {
    let caught: unknown;
    try {
      parse('{ a = "abc; }');
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof ParseError ? caught.code : null).toBe(ParseErrorCode.UNTERMINATED_STRING);
  });

  it("rejects trailing input", () => {
    expect(() => parse("{ } }")).toThrow(ParseError);
  });
});
