/**
 * Core Package - Input Upsert Tests
 *
 * Updating inputs that already exist. Insertion is covered in insert.test.ts.
 */

import { describe, it, expect } from "vitest";
import { parse } from "@flakepatch/syntax";
import { upsertInput, FlakeEditError, FlakeEditErrorCode, type AttrPath } from "@flakepatch/core";

function upsert(source: string, inputName: string, inputValue: string, attrPath?: AttrPath): string {
  return upsertInput({ expression: parse(source).expression, source, inputName, inputValue, attrPath });
}

function errorOf(run: () => unknown): FlakeEditError | null {
  try {
    run();
  } catch (error) {
    if (error instanceof FlakeEditError) return error;
    throw error;
  }
  return null;
}

describe("upsertInput: existing inputs", () => {
  it("replaces only the URL of a flattened declaration", () => {
    const source = '{\n  inputs.nixpkgs.url = "github:NixOS/nixpkgs/nixos-23.11";\n  outputs = { nixpkgs, ... }: { };\n}\n';
    expect(upsert(source, "nixpkgs", "github:NixOS/nixpkgs/nixos-unstable")).toBe(
      '{\n  inputs.nixpkgs.url = "github:NixOS/nixpkgs/nixos-unstable";\n  outputs = { nixpkgs, ... }: { };\n}\n'
    );
  });

  it("replaces the URL inside a nested block", () => {
    const source = '{ inputs = { nixpkgs.url = "old"; }; outputs = { nixpkgs }: { }; }';
    expect(upsert(source, "nixpkgs", "new")).toBe('{ inputs = { nixpkgs.url = "new"; }; outputs = { nixpkgs }: { }; }');
  });

  it("replaces the URL inside a per-input set", () => {
    const source = '{ inputs.nixpkgs = { url = "old"; flake = false; }; outputs = { nixpkgs }: { }; }';
    expect(upsert(source, "nixpkgs", "new")).toBe(
      '{ inputs.nixpkgs = { url = "new"; flake = false; }; outputs = { nixpkgs }: { }; }'
    );
  });

  it("does not touch the outputs parameters", () => {
    const source = '{ inputs.a.url = "old"; outputs = { self }: { }; }';
    expect(upsert(source, "a", "new")).toBe('{ inputs.a.url = "new"; outputs = { self }: { }; }');
  });

  it("replaces an indented string's content and keeps its delimiters", () => {
    const source = "{ inputs.a.url = ''old''; outputs = { a }: { }; }";
    expect(upsert(source, "a", "new''")).toBe("{ inputs.a.url = ''new'''''; outputs = { a }: { }; }");
  });

  it("fills an empty string", () => {
    const source = '{ inputs.a.url = ""; outputs = { a }: { }; }';
    expect(upsert(source, "a", "github:o/a")).toBe('{ inputs.a.url = "github:o/a"; outputs = { a }: { }; }');
  });

  it("turns an unquoted URI into a string", () => {
    const source = "{ inputs.a.url = github:o/a; outputs = { a }: { }; }";
    expect(upsert(source, "a", "github:o/a/v2")).toBe('{ inputs.a.url = "github:o/a/v2"; outputs = { a }: { }; }');
  });

  it("escapes the new value for the literal it lands in", () => {
    const source = '{ inputs.a.url = "old"; outputs = { a }: { }; }';
    expect(upsert(source, "a", 'x"${y}')).toBe('{ inputs.a.url = "x\\"\\${y}"; outputs = { a }: { }; }');
  });

  it("uses a custom attribute path", () => {
    const source = '{ inputs.a.url = "x"; inputs.a.flake = "true"; outputs = { a }: { }; }';
    expect(upsert(source, "a", "false", ["inputs", "a", "flake"])).toBe(
      '{ inputs.a.url = "x"; inputs.a.flake = "false"; outputs = { a }: { }; }'
    );
  });

  it("rejects an interpolated value at the interpolation", () => {
    const source = '{ inputs.a.url = "github:o/${name}"; outputs = { a }: { }; }';
    const error = errorOf(() => upsert(source, "a", "x"));
    expect(error?.code).toBe(FlakeEditErrorCode.MULTI_PART_VALUE);
    expect([error?.line, error?.column]).toEqual([1, 28]);
  });

  it("rejects a value that is not a string or URI", () => {
    const source = "{ inputs.a.url = 3; outputs = { a }: { }; }";
    const error = errorOf(() => upsert(source, "a", "x"));
    expect(error?.code).toBe(FlakeEditErrorCode.UNKNOWN_VALUE_SHAPE);
    expect(error?.message).toBe("unsupported input value type Integer; expected a string or URI (at 1:18)");
  });

  it("returns the source unchanged when the value is already set", () => {
    const source = '{ inputs.a.url = "same"; outputs = { a }: { }; }';
    expect(upsert(source, "a", "same")).toBe(source);
  });
});
