import { describe, it, expect } from "vitest";

import { SourceLines } from "#ast";
import { formatBlock } from "#ir";
import { parser } from "#parser";

import { TranslateErrorCode, UnsupportedConstruct } from "./errors.js";
import { translateBlock } from "./statements.js";

// Translate top-level statements as if they were a block at `depth`
function render(source: string, depth = 1): string {
  const { body } = parser.parse(source);
  return formatBlock(translateBlock(body, depth, new SourceLines(source)));
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

describe("translateBlock", () => {
  it("should indent each statement by the block depth", () => {
    expect(render("pass\nbreak\n", 0)).toBe("\n%pass\n%break");
    expect(render("pass\n", 3)).toBe("\n      %pass");
  });

  it("should translate declarations", () => {
    expect(render("x: num\n")).toBe("\n  %vdecl(x, %num)");
  });

  it("should translate assignments", () => {
    expect(
      render(
        "self.balances[_sender] = num256_add(self.balances[_sender], _value)\n",
      ),
    ).toBe(
      "\n  %assign(%subscript(%svar(balances), %var(_sender)), " +
        "%num256_add(%subscript(%svar(balances), %var(_sender)), %var(_value)))",
    );
  });

  it("should translate augmented assignments", () => {
    expect(render("x += 1\nself.y //= z\n")).toBe(
      "\n  %augassign(+=, %var(x), 1)\n  %augassign(//=, %svar(y), %var(z))",
    );
  });

  it("should nest if branches one level deeper", () => {
    const source = ["if a:", "    pass", "else:", "    return", ""].join("\n");
    expect(render(source, 2)).toBe(
      "\n    %if(%var(a),\n      %pass,\n      %return)",
    );
  });

  it("should omit the else branch when there is none", () => {
    const source = ["if a:", "    if b:", "        pass", ""].join("\n");
    expect(render(source, 2)).toBe(
      "\n    %if(%var(a),\n      %if(%var(b),\n        %pass))",
    );
  });

  it("should translate elif as a nested if", () => {
    const source = ["if a:", "    pass", "elif b:", "    break", ""].join("\n");
    expect(render(source)).toBe(
      "\n  %if(%var(a),\n    %pass,\n    %if(%var(b),\n      %break))",
    );
  });

  it("should translate range loops", () => {
    expect(render("for i in range(10): pass\n", 2)).toBe(
      "\n    %forrange(i, 10,\n      %pass)",
    );
    expect(render("for i in range(a, b):\n    break\n")).toBe(
      "\n  %forrange(i, %var(a), %var(b),\n    %break)",
    );
  });

  it("should translate list loops", () => {
    expect(render("for x in self.xs:\n    pass\n")).toBe(
      "\n  %forlist(x, %svar(xs),\n    %pass)",
    );
  });

  it("should translate simple statements", () => {
    const source = [
      "return x",
      "return",
      "assert a > 0",
      "throw",
      "log.Transfer(a, b, 5)",
      "send(msg.sender, self.balance)",
      "selfdestruct(self.owner)",
      "",
    ].join("\n");

    expect(render(source).split("\n")).toEqual([
      "",
      "  %return(%var(x))",
      "  %return",
      "  %assert(%compareop(%gt, %var(a), 0))",
      "  %throw",
      "  %log(Transfer, %var(a) %var(b) 5)",
      "  %send(%msg.sender, %svar(balance))",
      "  %selfdestruct(%svar(owner))",
    ]);
  });

  describe("unsupported statements", () => {
    const details = [
      { source: "x: num = 5\n", code: TranslateErrorCode.DECLARATION_INITIALIZER },
      { source: "a = b = 1\n", code: TranslateErrorCode.MULTIPLE_TARGETS },
      {
        source: "for i in range(1, 2, 3): pass\n",
        code: TranslateErrorCode.RANGE_ARGUMENTS,
      },
      {
        source: "for i in xs:\n    pass\nelse:\n    pass\n",
        code: TranslateErrorCode.LOOP_ELSE,
      },
      { source: "for a, b in xs: pass\n", code: TranslateErrorCode.LOOP_TARGET },
      { source: "assert x, 'no'\n", code: TranslateErrorCode.ASSERT_MESSAGE },
      { source: "send(a)\n", code: TranslateErrorCode.BUILTIN_ARGUMENTS },
      { source: "log.E(a=1)\n", code: TranslateErrorCode.KEYWORD_ARGUMENT },
    ];

    for (const { source, code } of details) {
      it(`should reject ${JSON.stringify(source)} with ${code}`, () => {
        expect(failure(source).code).toBe(code);
      });
    }

    it("should name the expected argument count", () => {
      expect(failure("selfdestruct()\n").message).toBe(
        "Wrong number of arguments: expected 1, found 0",
      );
    });

    const structural = [
      { source: "while x: pass\n", message: "Unsupported statement: While" },
      { source: "continue\n", message: "Unsupported statement: Continue" },
      { source: "raise\n", message: "Unsupported statement: Raise" },
      { source: "del x\n", message: "Unsupported statement: Delete" },
      {
        source: "def g():\n    pass\n",
        message: "Unsupported statement: FunctionDef",
      },
      {
        source: "x\n",
        message: "Unsupported statement: expression statement Name",
      },
      { source: "foo(1)\n", message: "Unsupported call statement" },
      { source: "a, b = c\n", message: "Unsupported variable: Tuple" },
    ];

    for (const { source, message } of structural) {
      it(`should reject ${JSON.stringify(source)} as structural`, () => {
        const error = failure(source);
        expect(error.message).toBe(message);
        expect(error.flavor).toBe("structural");
      });
    }
  });
});
