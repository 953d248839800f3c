import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry:    { index: "src/index.ts" },
    format:   ["esm", "cjs"],
    dts:      true,
    // The library half touches node:path only in formats.ts.
    platform: "node",
    target:   "node20",
  },
  {
    entry:    { cli: "src/cli.ts" },
    // chalk 5 is ESM-only, so the executable is too.
    format:   ["esm"],
    platform: "node",
    target:   "node20",
    banner:   { js: "#!/usr/bin/env node" },
  },
]);
