import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  esbuildOptions(options) {
    // Class names appear in resolution errors and debug output
    options.keepNames = true;
  },
});
