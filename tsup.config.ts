import { defineConfig, type Options } from "tsup";
import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// read tsconfig paths
const tsconfig = JSON.parse(
  readFileSync(resolve("tsconfig.json"), "utf8")
);

const paths = (tsconfig.compilerOptions?.paths ?? {}) as Record<string, string[]>;
const baseUrl = tsconfig.compilerOptions?.baseUrl ?? ".";
const projectRoot = dirname(fileURLToPath(import.meta.url));
const baseDir = resolve(projectRoot, baseUrl);

const alias: Record<string, string> = {};
for (const [key, values] of Object.entries(paths)) {
  const aliasKey = key.replace("/*", "");
  const aliasValue = values[0].replace("/*", "");
  alias[aliasKey] = resolve(baseDir, aliasValue);
}

const shared: Options = {
  format: ["esm", "cjs"],
  outDir: "dist",
  shims: true,
  // dist/ is shared by both builds; the build script clears it.
  clean: false,
  esbuildOptions(options) {
    options.alias = { ...(options.alias ?? {}), ...alias };
  },
};

export default defineConfig([
  {
    ...shared,
    entry: {
      "runtime/index": "src/runtime/index.ts",
      "index": "src/index.ts"
    },
    dts: true,
  },
  {
    ...shared,
    entry: {
      "cli/index": "src/cli/index.ts"
    },
    banner: { js: "#!/usr/bin/env node" },
    onSuccess: async () => {
      console.log("✅ Aliases resolved in build output");
    },
  },
]);
