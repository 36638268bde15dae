import { defineConfig } from "tsup";
import { readFileSync } from "fs";

const pkg: { version: string } = JSON.parse(readFileSync("./package.json", "utf-8"));

export default defineConfig({
  entry: ["src/index.ts", "src/bin.ts"],
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: "dist",
  target: "node20",
  define: {
    "process.env.CLI_VERSION": JSON.stringify(pkg.version),
  },
});
