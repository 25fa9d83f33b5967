export { normalizeLiterals } from "./normalize.js";
