import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["main.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  dts: false,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  outDir: "dist",
  // Dependencies are installed from npm alongside the bundle
  external: [/^node:.*/, "zod", "fast-glob", "smol-toml", "minimist"],
  esbuildOptions(options) {
    options.resolveExtensions = [".ts", ".js", ".mjs", ".cjs"];
  },
  banner: {
    js: "#!/usr/bin/env node",
  },
});
