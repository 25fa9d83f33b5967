import { describe, it, expect } from "vitest";

import { SourceLines } from "#ast";
import { formatExpression } from "#ir";
import { parser } from "#parser";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { translateExpression } from "./expressions.js";

function render(source: string): string {
  const [statement] = parser.parse(source).body;
  if (statement?.type !== "Expr") throw new Error("Expected an expression");
  return formatExpression(
    translateExpression(statement.value, new SourceLines(source)),
  );
}

function failure(source: string): UnsupportedConstruct {
  try {
    render(source);
  } catch (error) {
    if (error instanceof UnsupportedConstruct) return error;
    throw error;
  }
  throw new Error(`Expected ${source} to be rejected`);
}

describe("translateExpression", () => {
  describe("literals", () => {
    it("should translate numbers", () => {
      expect(render("42")).toBe("42");
      expect(render("0x1aF")).toBe('%hex("1aF")');
      expect(render("2.5")).toBe("%fixed10(25, 10)");
    });

    it("should translate strings", () => {
      expect(render('"hello"')).toBe('"hello"');
    });

    it("should translate both spellings of booleans", () => {
      expect(render("True")).toBe("true");
      expect(render("False")).toBe("false");
      expect(render("true")).toBe("true");
      expect(render("false")).toBe("false");
    });
  });

  describe("variables", () => {
    const cases = [
      { source: "self", expected: "%self" },
      { source: "x", expected: "%var(x)" },
      { source: "self.total", expected: "%svar(total)" },
      { source: "msg.sender", expected: "%msg.sender" },
      { source: "block.timestamp", expected: "%block.timestamp" },
      { source: "tx.origin", expected: "%tx.origin" },
      { source: "msg.foo", expected: "%attribute(%var(msg), foo)" },
      {
        source: "self.balances[msg.sender]",
        expected: "%subscript(%svar(balances), %msg.sender)",
      },
      {
        source: "self.funders[i].value",
        expected: "%attribute(%subscript(%svar(funders), %var(i)), value)",
      },
    ];

    for (const { source, expected } of cases) {
      it(`should translate ${source}`, () => {
        expect(render(source)).toBe(expected);
      });
    }
  });

  describe("operators", () => {
    const cases = [
      {
        source: "a + b * 2",
        expected: "%binop(+, %var(a), %binop(*, %var(b), 2))",
      },
      { source: "a // b", expected: "%binop(//, %var(a), %var(b))" },
      { source: "a >= b", expected: "%compareop(%ge, %var(a), %var(b))" },
      { source: "a != b", expected: "%compareop(%ne, %var(a), %var(b))" },
      {
        source: "x in self.members",
        expected: "%compareop(%in, %var(x), %svar(members))",
      },
      {
        source: "a and not b",
        expected: "%boolop(%and, %var(a), %unaryop(%not, %var(b)))",
      },
      { source: "a or b", expected: "%boolop(%or, %var(a), %var(b))" },
      { source: "-x", expected: "%unaryop(%neg, %var(x))" },
      { source: "-5", expected: "%unaryop(%neg, 5)" },
    ];

    for (const { source, expected } of cases) {
      it(`should translate ${source}`, () => {
        expect(render(source)).toBe(expected);
      });
    }
  });

  describe("lists and calls", () => {
    it("should translate list literals", () => {
      expect(render("[1, 2, 3]")).toBe("%list(1 2 3)");
    });

    it("should translate internal calls", () => {
      expect(render("self.foo(x, y)")).toBe("%icall(foo, %var(x) %var(y))");
      expect(render("self.foo()")).toBe("%icall(foo, )");
    });

    it("should translate built-in calls", () => {
      expect(render("sha3(x, 1)")).toBe("%sha3(%var(x), 1)");
      expect(render("num256_add(a, b)")).toBe("%num256_add(%var(a), %var(b))");
    });

    it("should translate wei scaling", () => {
      expect(render("as_wei_value(5, finney)")).toBe(
        "%as_wei_value(5, finney)",
      );
      expect(render('as_wei_value(x, "ether")')).toBe(
        "%as_wei_value(%var(x), ether)",
      );
    });
  });

  describe("unsupported expressions", () => {
    it("should reject chained comparisons", () => {
      const error = failure("a < b < c");
      expect(error.code).toBe(TranslateErrorCode.CHAINED_COMPARISON);
      expect(error.flavor).toBe("detail");
    });

    it("should reject boolean chains", () => {
      expect(failure("a and b and c").message).toBe(
        "Boolean operators take exactly two operands: found 3",
      );
    });

    it("should reject operators without an IR symbol", () => {
      expect(failure("x is y").message).toBe("Unsupported operator: 'is'");
      expect(failure("x not in y").message).toBe(
        "Unsupported operator: 'not in'",
      );
      expect(failure("~x").message).toBe("Unsupported operator: unary '~'");
      expect(failure("+x").message).toBe("Unsupported operator: unary '+'");
    });

    it("should reject None", () => {
      expect(failure("None").code).toBe(TranslateErrorCode.NONE_LITERAL);
    });

    it("should reject keyword and starred arguments", () => {
      expect(failure("f(x=1)").message).toBe(
        "Keyword and starred arguments are not supported: x",
      );
      expect(failure("f(*xs)").message).toBe(
        "Keyword and starred arguments are not supported: *",
      );
      expect(failure("self.g(**kw)").message).toBe(
        "Keyword and starred arguments are not supported: **",
      );
    });

    it("should reject slices", () => {
      expect(failure("x[1:2]").code).toBe(TranslateErrorCode.SLICE_INDEX);
    });

    it("should reject wei scaling without a unit", () => {
      expect(failure("as_wei_value(5)").code).toBe(
        TranslateErrorCode.BUILTIN_ARGUMENTS,
      );
      expect(failure("as_wei_value(5, 1)").code).toBe(
        TranslateErrorCode.BUILTIN_ARGUMENTS,
      );
    });

    it("should reject shapes with no mapping", () => {
      const cases = [
        { source: "(a, b)", message: "Unsupported expression: Tuple" },
        { source: "a if b else c", message: "Unsupported expression: IfExp" },
        { source: "{a: 1}", message: "Unsupported expression: Dict" },
        {
          source: "f(x)(y)",
          message: "Unsupported expression: call of a computed function",
        },
        { source: "(1).x", message: "Unsupported variable: Num" },
      ];

      for (const { source, message } of cases) {
        const error = failure(source);
        expect(error.message).toBe(message);
        expect(error.flavor).toBe("structural");
      }
    });
  });
});
