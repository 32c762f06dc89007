import fs from "node:fs";
import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  target: "es2022",
  platform: "node",
  clean: true,
  shims: true,
  sourcemap: true,
  noExternal: [/^@mltriage\//],
  external: ["yaml", "zod"],
  // The bundled rule table is looked up next to the bundle.
  async onSuccess() {
    fs.cpSync("../rules/rules", "dist/rules", { recursive: true });
  },
});
