/**
 * Tokenizer for Viper source
 *
 * Raw tokens come from a moo lexer; the layout step then turns line
 * structure into NEWLINE / INDENT / DEDENT tokens the way Python does:
 * blank and comment-only lines are skipped, line breaks inside brackets or
 * after a backslash continue the logical line, and tabs advance to the next
 * multiple of eight columns.
 */

import moo from "moo";

import type { SourceLocation } from "#ast";

import { Error as ParseError, ParseErrorCode } from "./errors.js";

export const KEYWORDS = [
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
] as const;

export type TokenType =
  | "name"
  | "keyword"
  | "number"
  | "string"
  | "op"
  | "newline"
  | "indent"
  | "dedent"
  | "eof";

export interface Token {
  type: TokenType;
  text: string;
  offset: number;
  line: number; // 1-based
  column: number; // 0-based
}

export namespace Token {
  export const location = (token: Token): SourceLocation => ({
    offset: token.offset,
    length: token.text.length,
    line: token.line,
    column: token.column,
  });
}

type RawType =
  | "ws"
  | "continuation"
  | "comment"
  | "newline"
  | "string"
  | "number"
  | "name"
  | "keyword"
  | "op"
  | "error";

const rules = {
  ws: /[ \t\f]+/,
  continuation: { match: /\\\r?\n/, lineBreaks: true },
  comment: /#[^\r\n]*/,
  newline: { match: /\r?\n/, lineBreaks: true },
  string: [
    { match: /[bBrRuU]{0,2}"""[^]*?"""/, lineBreaks: true },
    { match: /[bBrRuU]{0,2}'''[^]*?'''/, lineBreaks: true },
    { match: /[bBrRuU]{0,2}"(?:\\.|[^"\\\r\n])*"/ },
    { match: /[bBrRuU]{0,2}'(?:\\.|[^'\\\r\n])*'/ },
  ],
  number:
    /0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|(?:[0-9]+\.[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?|[0-9]+[eE][+-]?[0-9]+|[0-9]+/,
  name: {
    match: /[A-Za-z_][A-Za-z0-9_]*/,
    type: moo.keywords({ keyword: [...KEYWORDS] }),
  },
  op: [
    "**=", "//=", ">>=", "<<=",
    "->", "**", "//", "<<", ">>", "<=", ">=", "==", "!=",
    "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=",
    "+", "-", "*", "/", "%", "@", "&", "|", "^", "~",
    "<", ">", "=", ".", ",", ":", ";",
    "(", ")", "[", "]", "{", "}",
  ],
  error: moo.error,
};

const OPENING = new Set(["(", "[", "{"]);
const CLOSING = new Set([")", "]", "}"]);

const isRawType = (type: string | undefined): type is RawType =>
  type !== undefined && (type === "keyword" || type in rules);

/**
 * Split source text into layout-aware tokens, ending with an `eof` token
 */
export function tokenize(source: string): Token[] {
  const lexer = moo.compile(rules);
  lexer.reset(source);

  const tokens: Token[] = [];
  const indents = [0];
  let brackets = 0;
  let atLineStart = true;
  let lineHasContent = false;
  let pendingIndent = 0;
  let last: Token = { type: "eof", text: "", offset: 0, line: 1, column: 0 };

  const synthetic = (type: TokenType, at: Token): Token => ({
    type,
    text: "",
    offset: at.offset,
    line: at.line,
    column: at.column,
  });

  for (const raw of lexer) {
    if (!isRawType(raw.type)) {
      throw new ParseError(
        ParseErrorCode.UNEXPECTED_CHARACTER,
        `unknown token type ${raw.type}`,
        rawLocation(raw),
      );
    }

    switch (raw.type) {
      case "ws":
        if (atLineStart) {
          pendingIndent = indentationWidth(raw.text);
        }
        continue;
      case "comment":
      case "continuation":
        continue;
      case "newline":
        if (brackets > 0) {
          continue;
        }
        if (lineHasContent) {
          tokens.push(synthetic("newline", toToken("newline", raw)));
          lineHasContent = false;
        }
        atLineStart = true;
        pendingIndent = 0;
        continue;
      case "error":
        throw new ParseError(
          ParseErrorCode.UNEXPECTED_CHARACTER,
          `unexpected character ${JSON.stringify(raw.text.charAt(0))}`,
          rawLocation(raw),
        );
    }

    const token = toToken(raw.type, raw);

    if (atLineStart) {
      const current = indents[indents.length - 1];
      if (pendingIndent > current) {
        indents.push(pendingIndent);
        tokens.push(synthetic("indent", token));
      } else {
        while (pendingIndent < indents[indents.length - 1]) {
          indents.pop();
          tokens.push(synthetic("dedent", token));
        }
        if (pendingIndent !== indents[indents.length - 1]) {
          throw new ParseError(
            ParseErrorCode.INCONSISTENT_INDENTATION,
            "unindent does not match any outer indentation level",
            Token.location(token),
          );
        }
      }
      atLineStart = false;
    }

    if (token.type === "op" && OPENING.has(token.text)) {
      brackets++;
    } else if (token.type === "op" && CLOSING.has(token.text)) {
      brackets = Math.max(0, brackets - 1);
    }

    lineHasContent = true;
    tokens.push(token);
    last = token;
  }

  const end: Token = {
    type: "eof",
    text: "",
    offset: source.length,
    line: last.line,
    column: last.column + last.text.length,
  };

  if (lineHasContent) {
    tokens.push(synthetic("newline", end));
  }
  while (indents.length > 1) {
    indents.pop();
    tokens.push(synthetic("dedent", end));
  }
  tokens.push(end);

  return tokens;
}

function toToken(
  type: Exclude<RawType, "ws" | "comment" | "continuation" | "error">,
  raw: moo.Token,
): Token {
  return {
    type,
    text: raw.text,
    offset: raw.offset,
    line: raw.line,
    column: raw.col - 1,
  };
}

function rawLocation(raw: moo.Token): SourceLocation {
  return {
    offset: raw.offset,
    length: Math.min(raw.text.length, 1),
    line: raw.line,
    column: raw.col - 1,
  };
}

function indentationWidth(whitespace: string): number {
  let width = 0;
  for (const char of whitespace) {
    width = char === "\t" ? (Math.floor(width / 8) + 1) * 8 : width + 1;
  }
  return width;
}
