/**
 * Core Package - Literal Quoting Tests
 */

import { describe, it, expect } from "vitest";
import { escapeStringContent, escapeIndentedStringContent, quoteString, quoteLiteral } from "@flakepatch/core";

describe("escapeStringContent", () => {
  it("leaves ordinary URLs alone", () => {
    expect(escapeStringContent("github:NixOS/nixpkgs?ref=nixos-unstable")).toBe(
      "github:NixOS/nixpkgs?ref=nixos-unstable"
    );
  });

  it("escapes quotes, backslashes and interpolation openers", () => {
    expect(escapeStringContent('a"b\\c${d}')).toBe('a\\"b\\\\c\\${d}');
  });

  it("escapes control characters", () => {
    expect(escapeStringContent("a\nb\tc")).toBe("a\\nb\\tc");
  });

  it("keeps a lone dollar sign", () => {
    expect(escapeStringContent("a$b")).toBe("a$b");
  });
});

describe("escapeIndentedStringContent", () => {
  it("escapes the closing delimiter and interpolation openers", () => {
    expect(escapeIndentedStringContent("a''b${c}")).toBe("a'''b''${c}");
  });
});

describe("quoteLiteral", () => {
  it("wraps in the delimiters of the literal kind", () => {
    expect(quoteString("x")).toBe('"x"');
    expect(quoteLiteral("String", 'say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteLiteral("IndentedString", "x")).toBe("''x''");
  });
});
