import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  platform: "node",
  // Bundle the workspace packages; npm dependencies stay external.
  noExternal: [/^@secretplan\//],
  outExtensions: () => ({ js: ".js" }),
  clean: true,
  sourcemap: false,
});
