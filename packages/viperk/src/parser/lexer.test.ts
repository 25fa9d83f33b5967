import { describe, it, expect } from "vitest";

import { tokenize, type Token } from "./lexer.js";
import { Error as ParseError, ParseErrorCode } from "./errors.js";

const kinds = (source: string) =>
  tokenize(source).map((token: Token) =>
    token.type === "newline" ||
    token.type === "indent" ||
    token.type === "dedent" ||
    token.type === "eof"
      ? token.type.toUpperCase()
      : token.text,
  );

describe("tokenize", () => {
  it("should split a simple statement", () => {
    expect(kinds("x = y + 1")).toEqual(["x", "=", "y", "+", "1", "NEWLINE", "EOF"]);
  });

  it("should tell keywords from names", () => {
    const tokens = tokenize("if self and x");
    expect(tokens.slice(0, 4).map((token) => token.type)).toEqual([
      "keyword",
      "name",
      "keyword",
      "name",
    ]);
  });

  it("should prefer the longest operator", () => {
    expect(kinds("a **= b // c -> d")).toEqual([
      "a",
      "**=",
      "b",
      "//",
      "c",
      "->",
      "d",
      "NEWLINE",
      "EOF",
    ]);
  });

  it("should read every number spelling", () => {
    const numbers = tokenize("0x1F 0o17 0b101 1.5 .5 2. 1e-3 42")
      .filter((token) => token.type === "number")
      .map((token) => token.text);
    expect(numbers).toEqual(["0x1F", "0o17", "0b101", "1.5", ".5", "2.", "1e-3", "42"]);
  });

  it("should read prefixed and triple-quoted strings", () => {
    const strings = tokenize(`a = b"x" + 'y' + """z\nw"""`)
      .filter((token) => token.type === "string")
      .map((token) => token.text);
    expect(strings).toEqual([`b"x"`, `'y'`, `"""z\nw"""`]);
  });

  it("should emit indent and dedent around blocks", () => {
    const source = ["def f():", "    if x:", "        pass", "    return", ""].join("\n");
    expect(kinds(source)).toEqual([
      "def", "f", "(", ")", ":", "NEWLINE",
      "INDENT", "if", "x", ":", "NEWLINE",
      "INDENT", "pass", "NEWLINE",
      "DEDENT", "return", "NEWLINE",
      "DEDENT", "EOF",
    ]);
  });

  it("should skip blank and comment-only lines", () => {
    const source = "x = 1\n\n   # note\n\ny = 2  # trailing\n";
    expect(kinds(source)).toEqual(["x", "=", "1", "NEWLINE", "y", "=", "2", "NEWLINE", "EOF"]);
  });

  it("should join lines inside brackets and after a backslash", () => {
    const source = "f(a,\n  b)\nx = 1 + \\\n    2\n";
    expect(kinds(source)).toEqual([
      "f", "(", "a", ",", "b", ")", "NEWLINE",
      "x", "=", "1", "+", "2", "NEWLINE",
      "EOF",
    ]);
  });

  it("should expand tabs to multiples of eight", () => {
    const source = "if x:\n\tpass\n        pass\n";
    expect(kinds(source)).toEqual([
      "if", "x", ":", "NEWLINE",
      "INDENT", "pass", "NEWLINE",
      "pass", "NEWLINE",
      "DEDENT", "EOF",
    ]);
  });

  it("should record 1-based lines and 0-based columns", () => {
    const token = tokenize("a = 1\n  \nb = 0x2f\n").find(
      (candidate) => candidate.text === "0x2f",
    );
    expect(token).toMatchObject({ line: 3, column: 4, offset: 13 });
  });

  it("should reject an unknown character", () => {
    expect(() => tokenize("x = $")).toThrow(ParseError);
    try {
      tokenize("x = $");
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError)) return;
      expect(error.code).toBe(ParseErrorCode.UNEXPECTED_CHARACTER);
      expect(error.message).toBe(
        'Parse error at line 1, column 5: unexpected character "$"',
      );
    }
  });

  it("should reject a dedent to an unknown level", () => {
    const source = "if x:\n        a\n    b\n";
    expect(() => tokenize(source)).toThrow(
      "unindent does not match any outer indentation level",
    );
  });
});
