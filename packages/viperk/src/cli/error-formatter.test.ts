import { describe, it, expect } from "vitest";

import { ViperkError } from "#errors";

import { formatError } from "./error-formatter.js";

const location = { offset: 14, length: 3, line: 2, column: 4 };

describe("formatError", () => {
  it("should point at the offending column", () => {
    const error = new ViperkError("Something is off", "TEST001", location);
    const source = "def f():\n    foo(1)\n";

    expect(formatError(error, source, "contract.vy")).toBe(
      [
        "error TEST001: Something is off",
        " --> contract.vy:2:5",
        "  |",
        "2 |     foo(1)",
        "  |     ^",
      ].join("\n"),
    );
  });

  it("should name unnamed input", () => {
    const error = new ViperkError("Odd", "TEST002", location);
    const lines = formatError(error, "\n    x\n").split("\n");
    expect(lines[0]).toBe("error TEST002: Odd");
    expect(lines[1]).toBe(" --> <input>:2:5");
  });

  it("should widen the gutter for long line numbers", () => {
    const source = `${"\n".repeat(11)}bad`;
    const error = new ViperkError("Bad", "TEST003", {
      offset: 11,
      length: 3,
      line: 12,
      column: 0,
    });
    expect(formatError(error, source).split("\n").slice(1)).toEqual([
      "  --> <input>:12:1",
      "   |",
      "12 | bad",
      "   | ^",
    ]);
  });

  it("should print only the header without a location or source", () => {
    expect(formatError(new ViperkError("Plain", "TEST004"))).toBe(
      "error TEST004: Plain",
    );
    expect(formatError(new ViperkError("Plain", "TEST004", location))).toBe(
      "error TEST004: Plain",
    );
  });
});
