import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { defineConfig } from "vitest/config";

function resolveJsToTs() {
  return {
    name: "nbkit:resolve-js-to-ts",
    enforce: "pre" as const,
    // Sources import siblings as `./x.js`; point those at `x.ts` when no `.js` file exists.
    resolveId(source: string, importer?: string) {
      if (!importer) return null;
      if (!source.endsWith(".js")) return null;
      if (!(source.startsWith("./") || source.startsWith("../"))) return null;

      const importerPath = importer.split("?", 1)[0] ?? importer;
      const resolved = resolve(dirname(importerPath), source);
      if (existsSync(resolved)) return null;

      const ts = resolved.slice(0, -3) + ".ts";
      if (existsSync(ts)) return ts;

      return null;
    },
  };
}

export default defineConfig({
  plugins: [resolveJsToTs()],
  test: {
    include: ["packages/**/*.test.ts"],
    environment: "node",
  },
});
