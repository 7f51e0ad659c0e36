/**
 * Core Package - Input Collection Tests
 */

import { describe, it, expect } from "vitest";
import { parse } from "@flakepatch/syntax";
import { collectAllInputs, findAll, listInputs, readInputUrl, FlakeEditErrorCode, FlakeEditError } from "@flakepatch/core";
import { loadFixture } from "./fixtures/index.js";

function collect(source: string) {
  return collectAllInputs(findAll(parse(source).expression, ["inputs"]));
}

describe("collectAllInputs", () => {
  it("expands a nested inputs block into its declarations", () => {
    const collected = collect('{ inputs = { a.url = "x"; b = { url = "y"; }; }; }');
    expect(collected.map((input) => [input.name, input.form])).toEqual([
      ["a", "nested"],
      ["b", "nested"],
    ]);
  });

  it("passes flattened declarations through", () => {
    const collected = collect('{ inputs.a.url = "x"; inputs.b = { url = "y"; }; }');
    expect(collected.map((input) => [input.name, input.form])).toEqual([
      ["a", "flattened"],
      ["b", "flattened"],
    ]);
  });

  it("skips bindings that are not declarations", () => {
    const collected = collect(
      '{ inputs.a.inputs.nixpkgs.follows = "nixpkgs"; inputs.b.flake = false; inputs = { c.follows = "a"; }; }'
    );
    expect(collected).toEqual([]);
  });

  it("keeps source order across forms", () => {
    const collected = collect('{ inputs.a.url = "x"; inputs = { b.url = "y"; }; inputs.c.url = "z"; }');
    expect(collected.map((input) => input.name)).toEqual(["a", "b", "c"]);
  });

  it("fails on inherit inside the inputs block", () => {
    let caught: unknown;
    try {
      collect("{ inputs = { inherit nixpkgs; }; }");
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof FlakeEditError ? caught.code : null).toBe(FlakeEditErrorCode.INHERIT_NOT_SUPPORTED);
  });
});

describe("readInputUrl", () => {
  it("reads string, indented string and URI values", () => {
    const collected = collect("{ inputs = { a.url = \"x\"; b.url = '' y ''; c.url = github:o/c; }; }");
    expect(collected.map(readInputUrl)).toEqual(["x", "y", "github:o/c"]);
  });

  it("reads url from a per-input set", () => {
    const [input] = collect('{ inputs.a = { flake = false; url = "x"; }; }');
    expect(input === undefined ? undefined : readInputUrl(input)).toBe("x");
  });

  it("returns null for interpolated values", () => {
    const [input] = collect('{ inputs.a.url = "github:o/${name}"; }');
    expect(input === undefined ? undefined : readInputUrl(input)).toBeNull();
  });
});

describe("listInputs", () => {
  it("lists the nested fixture", () => {
    const inputs = listInputs(parse(loadFixture("nested-inputs")).expression);
    expect(inputs.map(({ name, url, form }) => ({ name, url, form }))).toEqual([
      { name: "nixpkgs", url: "github:NixOS/nixpkgs/nixos-unstable", form: "nested" },
      { name: "flake-utils", url: "github:numtide/flake-utils", form: "nested" },
      { name: "rust-overlay", url: "github:oxalica/rust-overlay", form: "nested" },
    ]);
    expect(inputs[0]?.span.start).toEqual({ line: 5, column: 5 });
  });

  it("lists the flattened fixture", () => {
    const inputs = listInputs(parse(loadFixture("flattened-inputs")).expression);
    expect(inputs.map(({ name, url }) => [name, url])).toEqual([
      ["nixpkgs", "github:NixOS/nixpkgs/nixos-23.11"],
      ["home-manager", "github:nix-community/home-manager/release-23.11"],
      ["sops-nix", "github:Mic92/sops-nix"],
    ]);
  });

  it("lists nothing for a manifest without inputs", () => {
    expect(listInputs(parse(loadFixture("no-inputs")).expression)).toEqual([]);
  });
});
