import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  noExternal: ["@skeleton-extract/core"],
  external: ["tree-sitter", "tree-sitter-c-sharp"],
});
