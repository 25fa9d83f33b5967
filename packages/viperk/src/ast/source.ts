import type { SourceLocation } from "./spec.js";

const HEX_DIGIT = /[0-9a-fA-F]/;

/**
 * Read-only view of the source text by line, for the few places where
 * the spelling of a literal matters and the tree does not record it
 */
export class SourceLines {
  private readonly lines: string[];

  constructor(source: string) {
    this.lines = source.split(/\r\n|\r|\n/);
  }

  /**
   * Text of a 1-based line, or the empty string past the end
   */
  line(line: number): string {
    return this.lines[line - 1] ?? "";
  }

  /**
   * Rest of the line starting at a location
   */
  from(loc: SourceLocation): string {
    return this.line(loc.line).slice(loc.column);
  }

  /**
   * Digits of a hexadecimal literal written at `loc`, as spelled in the
   * source, or undefined when the text there does not start with a
   * lowercase `0x`
   */
  hexDigitsAt(loc: SourceLocation | null): string | undefined {
    if (!loc) {
      return undefined;
    }
    const text = this.from(loc);
    if (!text.startsWith("0x")) {
      return undefined;
    }
    let end = 2;
    while (end < text.length && HEX_DIGIT.test(text[end])) {
      end++;
    }
    return text.slice(2, end);
  }
}
