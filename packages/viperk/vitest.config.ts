import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) =>
  fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "#ast": src("ast/index.ts"),
      "#errors": src("errors.ts"),
      "#result": src("result.ts"),
      "#parser": src("parser/index.ts"),
      "#normalize": src("normalize/index.ts"),
      "#ir": src("ir/index.ts"),
      "#translator": src("translator/index.ts"),
      "#compiler": src("compiler/index.ts"),
      "#cli": src("cli/index.ts"),
      "#test/matchers": fileURLToPath(
        new URL("./test/matchers.ts", import.meta.url),
      ),
    },
  },
});
