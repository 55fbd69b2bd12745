import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "github-action/index.ts",
  },
  format: ["esm"],
  platform: "node",
  target: "node20",
  outDir: "github-action/dist",
  // the runner checks out the action without node_modules
  noExternal: [/.*/],
  dts: false,
  sourcemap: true,
  splitting: false,
  clean: true,
});
