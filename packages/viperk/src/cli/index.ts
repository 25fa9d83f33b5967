/**
 * CLI module exports
 */

export { handleCompileCommand } from "./compile.js";
export { compileOptions, parseOutputTarget, usage } from "./options.js";
export { displayErrors, formatJson, writeOutput } from "./output.js";
export { formatError } from "./error-formatter.js";
