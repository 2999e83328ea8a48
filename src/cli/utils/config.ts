import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { build, type Plugin } from "esbuild";
import type { EmbedpackConfig } from "../../types/config";
import { ConfigurationError } from "../../core/errors";
import { normalizeSlashes } from "../../core/canonicalize";
import { logError, logInfo } from "../../core/utils/logger.js";

const CONFIG_BASENAMES = [
  "embedpack.config.ts",
  "embedpack.config.mts",
  "embedpack.config.js",
  "embedpack.config.mjs",
  "embedpack.config.cjs",
];

let cachedConfig: EmbedpackConfig | null = null;
let configLoaded = false;

// `import { defineConfig } from "embedpack"` resolves to this stub so the
// config bundles without the package installed next to it.
const inlineDefineConfig: Plugin = {
  name: "inline-embedpack",
  setup(build) {
    build.onResolve({ filter: /^embedpack$/ }, () => ({
      path: "embedpack-virtual",
      namespace: "embedpack-ns",
    }));
    build.onLoad({ filter: /.*/, namespace: "embedpack-ns" }, () => ({
      contents: "export function defineConfig(config) { return config; }",
      loader: "js",
    }));
  },
};

// Bundle the config file into a single ESM string that can be `import()`ed.
async function bundleConfig(entry: string) {
  const absDir = path.dirname(entry);
  const result = await build({
    entryPoints: [entry],
    bundle: true,
    platform: "node",
    format: "esm",
    sourcemap: "inline",
    write: false,
    target: "node20",
    logLevel: "silent",
    absWorkingDir: absDir,
    plugins: [inlineDefineConfig],
  });
  const output = result.outputFiles?.[0];
  if (!output) throw new Error("Failed to bundle embedpack config");

  let contents = output.text;
  if (contents.includes("import.meta.url")) {
    contents = contents.replace(/import\.meta\.url/g, "__EMBEDPACK_IMPORT_META_URL");
    contents = `const __EMBEDPACK_IMPORT_META_URL = ${JSON.stringify(pathToFileURL(entry).href)};\n${contents}`;
  }
  const preamble =
    `const __dirname = ${JSON.stringify(absDir)};\n` +
    `const __filename = ${JSON.stringify(entry)};\n`;
  return preamble + contents;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_BASENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

function isConfigObject(value: unknown): value is EmbedpackConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function evaluateConfig(configPath: string): Promise<EmbedpackConfig> {
  const bundled = await bundleConfig(configPath);
  const dataUrl = `data:text/javascript;base64,${Buffer.from(bundled).toString("base64")}`;
  const imported: unknown = await import(dataUrl);
  // Support both default export and named `config` export.
  let resolved: unknown = imported;
  if (isConfigObject(imported)) {
    resolved = imported.default ?? imported.config ?? imported;
  }
  if (typeof resolved === "function") {
    resolved = resolved({ mode: process.env.NODE_ENV || "development" });
  }
  resolved = await resolved;
  if (!isConfigObject(resolved)) {
    throw new ConfigurationError("Config did not export an object", configPath);
  }
  // Relative paths in the config are relative to the config file.
  const baseDir = path.dirname(configPath);
  const prefix = anchorPrefix(baseDir, resolved.input, resolved.prefix);
  if (prefix !== undefined) resolved.prefix = prefix;
  for (const key of ["input", "output"] as const) {
    const value = resolved[key];
    if (typeof value === "string" && value && !path.isAbsolute(value)) {
      resolved[key] = path.resolve(baseDir, value);
    }
  }
  return resolved;
}

/**
 * A relative prefix that leads the relative `input` is rewritten against the
 * config directory, so it still leads the input once that is made absolute.
 * Any other prefix applies to paths inside the input and is left alone.
 */
export function anchorPrefix(baseDir: string, input: unknown, prefix: unknown): string | undefined {
  if (typeof prefix !== "string" || !prefix || path.isAbsolute(prefix)) return undefined;
  if (typeof input !== "string" || !input || path.isAbsolute(input)) return undefined;

  const given = normalizeSlashes(path.join(input, "/"));
  if (!given.startsWith(normalizeSlashes(prefix))) return undefined;

  const anchored = normalizeSlashes(path.join(baseDir, prefix));
  return /[\\/]$/.test(prefix) && !anchored.endsWith("/") ? `${anchored}/` : anchored;
}

export async function loadEmbedpackConfig(cwd = process.cwd()): Promise<EmbedpackConfig | null> {
  if (configLoaded) return cachedConfig;
  configLoaded = true;

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    cachedConfig = null;
    return cachedConfig;
  }

  try {
    cachedConfig = await evaluateConfig(configPath);
    logInfo(`Loaded embedpack config from ${path.relative(cwd, configPath)}`);
  } catch (err) {
    logError("Failed to load embedpack.config", err);
    cachedConfig = null;
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Unable to load ${configPath}`, configPath, err);
  }
  return cachedConfig;
}

export function resetEmbedpackConfigCache() {
  cachedConfig = null;
  configLoaded = false;
}
