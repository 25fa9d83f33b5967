/**
 * Recursive descent parser for Viper source
 *
 * Produces the generic syntax tree in `#ast`. The grammar is the Python 3
 * statement and expression grammar minus the parts no contract uses
 * (classes, comprehensions, lambdas, exception handling, `with`, `async`).
 * Operator precedence and associativity are settled here; nothing
 * downstream reorders operands.
 */

import * as Ast from "#ast";
import { Result } from "#result";

import { Error as ParseError, ParseErrorCode } from "./errors.js";
import { tokenize, Token } from "./lexer.js";

/**
 * Parse Viper source text into a syntax tree
 */
export function parse(source: string): Result<Ast.Module, ParseError> {
  try {
    return Result.ok(parser.parse(source));
  } catch (error) {
    if (error instanceof ParseError) {
      return Result.err(error);
    }
    throw error;
  }
}

export const parser = {
  /**
   * Parse, throwing a ParseError on the first syntax error
   */
  parse(source: string): Ast.Module {
    return new Parser(tokenize(source)).module();
  },
};

const AUGMENTED: Record<string, Ast.BinaryOperator> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
  "//=": "//",
  "%=": "%",
  "**=": "**",
  "<<=": "<<",
  ">>=": ">>",
  "|=": "|",
  "^=": "^",
  "&=": "&",
  "@=": "@",
};

const COMPARISONS: ReadonlySet<string> = new Set([
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
]);

const TERM_OPERATORS: ReadonlySet<string> = new Set(["*", "/", "//", "%", "@"]);

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  module(): Ast.Module {
    const start = this.peek();
    const body: Ast.Statement[] = [];
    while (!this.at("eof")) {
      if (this.at("newline")) {
        this.advance();
        continue;
      }
      body.push(...this.statement());
    }
    return Ast.module(body, this.spanFrom(start));
  }

  // Statements

  private statement(): Ast.Statement[] {
    const token = this.peek();

    if (token.type === "indent") {
      this.fail(ParseErrorCode.UNEXPECTED_TOKEN, "unexpected indent", token);
    }

    if (this.atOp("@")) {
      return [this.decorated()];
    }

    if (token.type === "keyword") {
      switch (token.text) {
        case "def":
          return [this.functionDef([], token)];
        case "if":
          return [this.ifStatement()];
        case "for":
          return [this.forStatement()];
        case "while":
          return [this.whileStatement()];
        case "class":
        case "try":
        case "with":
        case "global":
        case "nonlocal":
        case "lambda":
        case "yield":
          this.fail(
            ParseErrorCode.UNSUPPORTED_SYNTAX,
            `'${token.text}' is not part of the contract language`,
            token,
          );
      }
    }

    return this.simpleStatements();
  }

  private simpleStatements(): Ast.Statement[] {
    const statements = [this.smallStatement()];
    while (this.acceptOp(";")) {
      if (this.at("newline")) {
        break;
      }
      statements.push(this.smallStatement());
    }
    this.expect("newline", "end of line");
    return statements;
  }

  private smallStatement(): Ast.Statement {
    const start = this.peek();

    if (start.type === "keyword") {
      switch (start.text) {
        case "pass":
          this.advance();
          return Ast.Statement.pass(this.spanFrom(start));
        case "break":
          this.advance();
          return Ast.Statement.break_(this.spanFrom(start));
        case "continue":
          this.advance();
          return Ast.Statement.continue_(this.spanFrom(start));
        case "return": {
          this.advance();
          const value = this.atEndOfStatement() ? null : this.testList();
          return Ast.Statement.return_(value, this.spanFrom(start));
        }
        case "assert": {
          this.advance();
          const test = this.test();
          const message = this.acceptOp(",") ? this.test() : null;
          return Ast.Statement.assert(test, message, this.spanFrom(start));
        }
        case "raise": {
          this.advance();
          const exception = this.atEndOfStatement() ? null : this.test();
          return Ast.Statement.raise(exception, this.spanFrom(start));
        }
        case "del": {
          this.advance();
          const targets = [this.expression()];
          while (this.acceptOp(",")) {
            targets.push(this.expression());
          }
          return Ast.Statement.delete_(targets, this.spanFrom(start));
        }
        case "import":
          return this.importStatement();
        case "from":
          return this.importFromStatement();
      }
    }

    return this.expressionStatement();
  }

  private expressionStatement(): Ast.Statement {
    const start = this.peek();
    const first = this.testList(true);

    if (this.acceptOp(":")) {
      const annotation = this.test();
      const value = this.acceptOp("=") ? this.testList(true) : null;
      return Ast.Statement.annAssign(
        first,
        annotation,
        value,
        this.spanFrom(start),
      );
    }

    const next = this.peek();
    if (next.type === "op" && next.text in AUGMENTED) {
      this.advance();
      const value = this.testList();
      return Ast.Statement.augAssign(
        first,
        AUGMENTED[next.text],
        value,
        this.spanFrom(start),
      );
    }

    if (this.atOp("=")) {
      const expressions = [first];
      while (this.acceptOp("=")) {
        expressions.push(this.testList(true));
      }
      const value = expressions[expressions.length - 1];
      return Ast.Statement.assign(
        expressions.slice(0, -1),
        value,
        this.spanFrom(start),
      );
    }

    return Ast.Statement.expr(first, this.spanFrom(start));
  }

  private importStatement(): Ast.Statement {
    const start = this.advance();
    const names = [this.dottedName()];
    while (this.acceptOp(",")) {
      names.push(this.dottedName());
    }
    return Ast.Statement.import_(null, names, this.spanFrom(start));
  }

  private importFromStatement(): Ast.Statement {
    const start = this.advance();
    const from = this.dottedName();
    this.expectKeyword("import");

    const names: string[] = [];
    if (this.acceptOp("*")) {
      names.push("*");
    } else {
      const parenthesized = this.acceptOp("(");
      do {
        if (parenthesized && this.atOp(")")) {
          break;
        }
        names.push(this.expect("name", "imported name").text);
      } while (this.acceptOp(","));
      if (parenthesized) {
        this.expectOp(")");
      }
    }

    return Ast.Statement.import_(from, names, this.spanFrom(start));
  }

  private dottedName(): string {
    const parts = [this.expect("name", "module name").text];
    while (this.acceptOp(".")) {
      parts.push(this.expect("name", "module name").text);
    }
    return parts.join(".");
  }

  private decorated(): Ast.Statement {
    const start = this.peek();
    const decorators: Ast.Expression[] = [];
    while (this.acceptOp("@")) {
      decorators.push(this.test());
      this.expect("newline", "end of line after decorator");
    }

    const keyword = this.peek();
    if (keyword.type !== "keyword" || keyword.text !== "def") {
      this.fail(
        ParseErrorCode.UNEXPECTED_TOKEN,
        "expected 'def' after decorators",
        keyword,
      );
    }
    return this.functionDef(decorators, start);
  }

  private functionDef(
    decorators: Ast.Expression[],
    start: Token,
  ): Ast.Statement {
    this.expectKeyword("def");
    const name = this.expect("name", "function name").text;

    this.expectOp("(");
    const parameters: Ast.Statement.Parameter[] = [];
    while (!this.atOp(")")) {
      parameters.push(this.parameter());
      if (!this.acceptOp(",")) {
        break;
      }
    }
    this.expectOp(")");

    const returns = this.acceptOp("->") ? this.test() : null;
    this.expectOp(":");
    const body = this.block();

    return Ast.Statement.functionDef(
      name,
      decorators,
      parameters,
      returns,
      body,
      this.spanFrom(start),
    );
  }

  private parameter(): Ast.Statement.Parameter {
    const start = this.peek();
    const kind = this.acceptOp("**")
      ? "keywords"
      : this.acceptOp("*")
        ? "variadic"
        : "positional";
    const name = this.expect("name", "parameter name").text;
    const annotation = this.acceptOp(":") ? this.test() : null;
    const default_ =
      kind === "positional" && this.acceptOp("=") ? this.test() : null;
    return {
      name,
      kind,
      annotation,
      default: default_,
      loc: this.spanFrom(start),
    };
  }

  private ifStatement(): Ast.Statement.If {
    const start = this.advance();
    const test = this.test();
    this.expectOp(":");
    const body = this.block();

    let orelse: Ast.Statement[] = [];
    const next = this.peek();
    if (next.type === "keyword" && next.text === "elif") {
      orelse = [this.ifStatement()];
    } else if (next.type === "keyword" && next.text === "else") {
      this.advance();
      this.expectOp(":");
      orelse = this.block();
    }

    return Ast.Statement.if_(test, body, orelse, this.spanFrom(start));
  }

  private forStatement(): Ast.Statement {
    const start = this.advance();
    const target = this.targetList();
    this.expectKeyword("in");
    const iter = this.testList();
    this.expectOp(":");
    const body = this.block();
    const orelse = this.elseBlock();
    return Ast.Statement.for_(target, iter, body, orelse, this.spanFrom(start));
  }

  private whileStatement(): Ast.Statement {
    const start = this.advance();
    const test = this.test();
    this.expectOp(":");
    const body = this.block();
    const orelse = this.elseBlock();
    return Ast.Statement.while_(test, body, orelse, this.spanFrom(start));
  }

  private elseBlock(): Ast.Statement[] {
    if (!this.acceptKeyword("else")) {
      return [];
    }
    this.expectOp(":");
    return this.block();
  }

  /**
   * Suite following a ':', either statements on the same line or an
   * indented block
   */
  private block(): Ast.Statement[] {
    if (!this.at("newline")) {
      return this.simpleStatements();
    }

    this.advance();
    this.expect("indent", "indented block");

    const statements: Ast.Statement[] = [];
    while (!this.at("dedent") && !this.at("eof")) {
      statements.push(...this.statement());
    }
    this.expect("dedent", "end of block");
    return statements;
  }

  // Expressions

  private targetList(): Ast.Expression {
    const start = this.peek();
    const first = this.expression();
    if (!this.atOp(",")) {
      return first;
    }
    const elements = [first];
    while (this.acceptOp(",")) {
      if (this.atKeyword("in")) {
        break;
      }
      elements.push(this.expression());
    }
    return Ast.Expression.tuple(elements, this.spanFrom(start));
  }

  /**
   * Comma-separated tests; more than one (or a trailing comma) is a tuple
   */
  private testList(allowStarred = false): Ast.Expression {
    const start = this.peek();
    const item = () => (allowStarred ? this.starredOrTest() : this.test());

    const first = item();
    if (!this.atOp(",")) {
      return first;
    }

    const elements = [first];
    while (this.acceptOp(",")) {
      if (this.atEndOfStatement() || this.atOp("=") || this.atOp(")")) {
        break;
      }
      elements.push(item());
    }
    return Ast.Expression.tuple(elements, this.spanFrom(start));
  }

  private starredOrTest(): Ast.Expression {
    const start = this.peek();
    if (this.acceptOp("*")) {
      return Ast.Expression.starred(this.expression(), this.spanFrom(start));
    }
    return this.test();
  }

  private test(): Ast.Expression {
    const start = this.peek();
    if (start.type === "keyword" && start.text === "lambda") {
      this.fail(
        ParseErrorCode.UNSUPPORTED_SYNTAX,
        "lambda expressions are not part of the contract language",
        start,
      );
    }

    const body = this.orTest();
    if (!this.acceptKeyword("if")) {
      return body;
    }
    const test = this.orTest();
    this.expectKeyword("else");
    const orelse = this.test();
    return Ast.Expression.ifExp(test, body, orelse, this.spanFrom(start));
  }

  private orTest(): Ast.Expression {
    return this.booleanChain("or", () => this.andTest());
  }

  private andTest(): Ast.Expression {
    return this.booleanChain("and", () => this.notTest());
  }

  private booleanChain(
    operator: Ast.BooleanOperator,
    operand: () => Ast.Expression,
  ): Ast.Expression {
    const start = this.peek();
    const first = operand();
    if (!this.atKeyword(operator)) {
      return first;
    }
    const values = [first];
    while (this.acceptKeyword(operator)) {
      values.push(operand());
    }
    return Ast.Expression.boolOp(operator, values, this.spanFrom(start));
  }

  private notTest(): Ast.Expression {
    const start = this.peek();
    if (this.acceptKeyword("not")) {
      const operand = this.notTest();
      return Ast.Expression.unaryOp("not", operand, this.spanFrom(start));
    }
    return this.comparison();
  }

  private comparison(): Ast.Expression {
    const start = this.peek();
    const left = this.expression();

    const operators: Ast.ComparisonOperator[] = [];
    const comparators: Ast.Expression[] = [];
    for (;;) {
      const operator = this.comparisonOperator();
      if (!operator) {
        break;
      }
      operators.push(operator);
      comparators.push(this.expression());
    }

    if (operators.length === 0) {
      return left;
    }
    return Ast.Expression.compare(
      left,
      operators,
      comparators,
      this.spanFrom(start),
    );
  }

  private comparisonOperator(): Ast.ComparisonOperator | undefined {
    const token = this.peek();
    if (token.type === "op" && COMPARISONS.has(token.text)) {
      this.advance();
      return asComparison(token.text);
    }
    if (token.type !== "keyword") {
      return undefined;
    }
    if (token.text === "in") {
      this.advance();
      return "in";
    }
    if (token.text === "is") {
      this.advance();
      return this.acceptKeyword("not") ? "is not" : "is";
    }
    if (token.text === "not" && this.peek(1).text === "in") {
      this.advance();
      this.advance();
      return "not in";
    }
    return undefined;
  }

  // Bitwise or; the operand level of comparisons
  private expression(): Ast.Expression {
    return this.binaryLevel(["|"], () => this.xorExpression());
  }

  private xorExpression(): Ast.Expression {
    return this.binaryLevel(["^"], () => this.andExpression());
  }

  private andExpression(): Ast.Expression {
    return this.binaryLevel(["&"], () => this.shiftExpression());
  }

  private shiftExpression(): Ast.Expression {
    return this.binaryLevel(["<<", ">>"], () => this.arithmetic());
  }

  private arithmetic(): Ast.Expression {
    return this.binaryLevel(["+", "-"], () => this.term());
  }

  private term(): Ast.Expression {
    return this.binaryLevel([...TERM_OPERATORS], () => this.factor());
  }

  /**
   * Left-associative binary operators of equal precedence
   */
  private binaryLevel(
    operators: string[],
    operand: () => Ast.Expression,
  ): Ast.Expression {
    const start = this.peek();
    let left = operand();
    for (;;) {
      const token = this.peek();
      if (token.type !== "op" || !operators.includes(token.text)) {
        return left;
      }
      this.advance();
      const right = operand();
      left = Ast.Expression.binOp(
        asBinary(token),
        left,
        right,
        this.spanFrom(start),
      );
    }
  }

  private factor(): Ast.Expression {
    const start = this.peek();
    if (start.type === "op") {
      switch (start.text) {
        case "-":
        case "+":
        case "~": {
          this.advance();
          const operand = this.factor();
          return Ast.Expression.unaryOp(
            start.text,
            operand,
            this.spanFrom(start),
          );
        }
      }
    }
    return this.power();
  }

  private power(): Ast.Expression {
    const start = this.peek();
    const base = this.atomExpression();
    if (!this.acceptOp("**")) {
      return base;
    }
    const exponent = this.factor();
    return Ast.Expression.binOp("**", base, exponent, this.spanFrom(start));
  }

  private atomExpression(): Ast.Expression {
    const start = this.peek();
    let expression = this.atom();

    for (;;) {
      if (this.acceptOp("(")) {
        const { args, keywords } = this.argumentList();
        this.expectOp(")");
        expression = Ast.Expression.call(
          expression,
          args,
          keywords,
          this.spanFrom(start),
        );
      } else if (this.acceptOp("[")) {
        const index = this.subscriptList();
        this.expectOp("]");
        expression = Ast.Expression.subscript(
          expression,
          index,
          this.spanFrom(start),
        );
      } else if (this.acceptOp(".")) {
        const attr = this.expect("name", "attribute name").text;
        expression = Ast.Expression.attribute(
          expression,
          attr,
          this.spanFrom(start),
        );
      } else {
        return expression;
      }
    }
  }

  private argumentList(): {
    args: Ast.Expression[];
    keywords: Ast.Expression.Keyword[];
  } {
    const args: Ast.Expression[] = [];
    const keywords: Ast.Expression.Keyword[] = [];

    while (!this.atOp(")")) {
      const start = this.peek();
      if (this.acceptOp("**")) {
        const value = this.test();
        keywords.push({ arg: null, value, loc: this.spanFrom(start) });
      } else if (this.acceptOp("*")) {
        const value = this.test();
        args.push(Ast.Expression.starred(value, this.spanFrom(start)));
      } else if (start.type === "name" && this.peek(1).text === "=") {
        this.advance();
        this.advance();
        const value = this.test();
        keywords.push({ arg: start.text, value, loc: this.spanFrom(start) });
      } else {
        args.push(this.test());
      }

      if (!this.acceptOp(",")) {
        break;
      }
    }

    return { args, keywords };
  }

  private subscriptList(): Ast.Expression {
    const start = this.peek();
    const first = this.subscriptItem();
    if (!this.atOp(",")) {
      return first;
    }
    const elements = [first];
    while (this.acceptOp(",")) {
      if (this.atOp("]")) {
        break;
      }
      elements.push(this.subscriptItem());
    }
    return Ast.Expression.tuple(elements, this.spanFrom(start));
  }

  private subscriptItem(): Ast.Expression {
    const start = this.peek();
    const lower = this.atOp(":") ? null : this.test();
    if (!this.acceptOp(":")) {
      if (!lower) {
        this.fail(ParseErrorCode.UNEXPECTED_TOKEN, "expected index", start);
      }
      return lower;
    }

    const boundary = () => this.atOp(":") || this.atOp("]") || this.atOp(",");
    const upper = boundary() ? null : this.test();
    const step = this.acceptOp(":") && !boundary() ? this.test() : null;
    return Ast.Expression.slice(lower, upper, step, this.spanFrom(start));
  }

  private atom(): Ast.Expression {
    const token = this.peek();

    switch (token.type) {
      case "name":
        this.advance();
        return Ast.Expression.name(token.text, Token.location(token));

      case "number":
        this.advance();
        return parseNumber(token);

      case "string": {
        this.advance();
        let value = decodeString(token);
        while (this.at("string")) {
          value += decodeString(this.advance());
        }
        return Ast.Expression.str(value, this.spanFrom(token));
      }

      case "keyword":
        switch (token.text) {
          case "True":
          case "False":
          case "None":
            this.advance();
            return Ast.Expression.nameConstant(
              token.text === "None" ? null : token.text === "True",
              Token.location(token),
            );
        }
        break;

      case "op":
        switch (token.text) {
          case "(":
            return this.parenthesized();
          case "[":
            return this.listDisplay();
          case "{":
            return this.dictDisplay();
        }
        break;
    }

    return this.fail(
      ParseErrorCode.UNEXPECTED_TOKEN,
      `unexpected ${describe(token)}`,
      token,
    );
  }

  private parenthesized(): Ast.Expression {
    const start = this.advance();
    if (this.acceptOp(")")) {
      return Ast.Expression.tuple([], this.spanFrom(start));
    }

    const first = this.starredOrTest();
    if (this.atKeyword("for")) {
      this.unsupportedComprehension();
    }
    if (!this.atOp(",")) {
      this.expectOp(")");
      return first;
    }

    const elements = [first];
    while (this.acceptOp(",")) {
      if (this.atOp(")")) {
        break;
      }
      elements.push(this.starredOrTest());
    }
    this.expectOp(")");
    return Ast.Expression.tuple(elements, this.spanFrom(start));
  }

  private listDisplay(): Ast.Expression {
    const start = this.advance();
    const elements: Ast.Expression[] = [];
    while (!this.atOp("]")) {
      elements.push(this.starredOrTest());
      if (this.atKeyword("for")) {
        this.unsupportedComprehension();
      }
      if (!this.acceptOp(",")) {
        break;
      }
    }
    this.expectOp("]");
    return Ast.Expression.list(elements, this.spanFrom(start));
  }

  private dictDisplay(): Ast.Expression {
    const start = this.advance();
    const keys: Ast.Expression[] = [];
    const values: Ast.Expression[] = [];
    while (!this.atOp("}")) {
      keys.push(this.test());
      if (!this.atOp(":")) {
        this.fail(
          ParseErrorCode.UNSUPPORTED_SYNTAX,
          "set displays are not part of the contract language",
          this.peek(),
        );
      }
      this.advance();
      values.push(this.test());
      if (this.atKeyword("for")) {
        this.unsupportedComprehension();
      }
      if (!this.acceptOp(",")) {
        break;
      }
    }
    this.expectOp("}");
    return Ast.Expression.dict(keys, values, this.spanFrom(start));
  }

  private unsupportedComprehension(): never {
    return this.fail(
      ParseErrorCode.UNSUPPORTED_SYNTAX,
      "comprehensions are not part of the contract language",
      this.peek(),
    );
  }

  // Token helpers

  private peek(ahead = 0): Token {
    const index = Math.min(this.position + ahead, this.tokens.length - 1);
    return this.tokens[index];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") {
      this.position++;
    }
    return token;
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.position - 1)];
  }

  private at(type: Token["type"]): boolean {
    return this.peek().type === type;
  }

  private atOp(text: string): boolean {
    const token = this.peek();
    return token.type === "op" && token.text === text;
  }

  private atKeyword(text: string): boolean {
    const token = this.peek();
    return token.type === "keyword" && token.text === text;
  }

  private atEndOfStatement(): boolean {
    return this.at("newline") || this.at("eof") || this.atOp(";");
  }

  private acceptOp(text: string): boolean {
    if (!this.atOp(text)) {
      return false;
    }
    this.advance();
    return true;
  }

  private acceptKeyword(text: string): boolean {
    if (!this.atKeyword(text)) {
      return false;
    }
    this.advance();
    return true;
  }

  private expect(type: Token["type"], what: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      this.fail(
        ParseErrorCode.UNEXPECTED_TOKEN,
        `expected ${what}, found ${describe(token)}`,
        token,
      );
    }
    return this.advance();
  }

  private expectOp(text: string): Token {
    if (!this.atOp(text)) {
      this.fail(
        ParseErrorCode.UNEXPECTED_TOKEN,
        `expected '${text}', found ${describe(this.peek())}`,
        this.peek(),
      );
    }
    return this.advance();
  }

  private expectKeyword(text: string): Token {
    if (!this.atKeyword(text)) {
      this.fail(
        ParseErrorCode.UNEXPECTED_TOKEN,
        `expected '${text}', found ${describe(this.peek())}`,
        this.peek(),
      );
    }
    return this.advance();
  }

  /**
   * Location from the start of `start` to the end of the last consumed token
   */
  private spanFrom(start: Token): Ast.SourceLocation {
    const end = this.previous();
    const last = end.offset + end.text.length;
    return {
      offset: start.offset,
      length: Math.max(0, last - start.offset),
      line: start.line,
      column: start.column,
    };
  }

  private fail(code: ParseErrorCode, detail: string, token: Token): never {
    throw new ParseError(code, detail, Token.location(token));
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case "newline":
      return "end of line";
    case "indent":
      return "indent";
    case "dedent":
      return "dedent";
    case "eof":
      return "end of input";
    default:
      return `'${token.text}'`;
  }
}

function asBinary(token: Token): Ast.BinaryOperator {
  switch (token.text) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "//":
    case "%":
    case "**":
    case "<<":
    case ">>":
    case "|":
    case "^":
    case "&":
    case "@":
      return token.text;
    default:
      throw new ParseError(
        ParseErrorCode.UNEXPECTED_TOKEN,
        `'${token.text}' is not a binary operator`,
        Token.location(token),
      );
  }
}

function asComparison(text: string): Ast.ComparisonOperator {
  switch (text) {
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return text;
    default:
      return "==";
  }
}

function parseNumber(token: Token): Ast.Expression.Num {
  const loc = Token.location(token);
  const text = token.text;

  if (/^0[xXoObB]/.test(text)) {
    return Ast.Expression.int(BigInt(text), loc);
  }
  if (/[.eE]/.test(text)) {
    if (!Number.isFinite(Number(text))) {
      throw new ParseError(
        ParseErrorCode.INVALID_LITERAL,
        `float literal ${text} is out of range`,
        loc,
      );
    }
    return Ast.Expression.float(text, loc);
  }
  return Ast.Expression.int(BigInt(text), loc);
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  "0": "\0",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "\n": "",
};

function decodeString(token: Token): string {
  const match = /^([a-zA-Z]*)('''|"""|'|")([^]*)\2$/.exec(token.text);
  if (!match) {
    throw new ParseError(
      ParseErrorCode.INVALID_LITERAL,
      "malformed string literal",
      Token.location(token),
    );
  }

  const [, prefix, , body] = match;
  if (/[rR]/.test(prefix)) {
    return body;
  }

  return body.replace(
    /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|\r?\n|.)/g,
    (_, escape: string) => {
      if (escape.length > 1 && (escape[0] === "x" || escape[0] === "u")) {
        return String.fromCharCode(parseInt(escape.slice(1), 16));
      }
      return ESCAPES[escape.replace("\r", "")] ?? `\\${escape}`;
    },
  );
}
