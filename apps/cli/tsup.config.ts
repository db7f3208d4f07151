import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  // Third-party packages stay external; workspace packages ship their
  // TypeScript sources, so they are bundled in.
  skipNodeModulesBundle: true,
  noExternal: [/^@dirshape\/.*/],
});
