// vitest.config.ts
import fs from "node:fs";
import path from "node:path";
import type { Plugin } from "vite";
import { defineConfig } from "vitest/config";

function resolveJsToTsForLocalSources(): Plugin {
  return {
    name: "resolve-js-to-ts-for-local-sources",
    enforce: "pre",
    resolveId(source, importer) {
      if (!importer) return null;
      if (!source.startsWith(".")) return null;
      if (!source.endsWith(".js")) return null;

      const importerPath = importer.split("?", 1)[0] ?? importer;
      const sourcePath = source.split("?", 1)[0] ?? source;

      const absJs = path.resolve(path.dirname(importerPath), sourcePath);
      const absTs = absJs.slice(0, -3) + ".ts";

      if (fs.existsSync(absTs)) return absTs;

      return null;
    },
  };
}

export default defineConfig({
  plugins: [resolveJsToTsForLocalSources()],
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});
