export const VERSION = "0.1.0";

export * as Ast from "#ast";
export * as Ir from "#ir";

// Re-export parser functionality
export { parse, parser, tokenize } from "#parser";

// Re-export normalization and translation
export { normalizeLiterals } from "#normalize";
export { translate, UnsupportedConstruct } from "#translator";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export { compile, type CompileOptions } from "#compiler";

// CLI utilities are not exported; import them from ./cli in Node.js
