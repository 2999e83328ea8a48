export * from "./types/config";
export * from "./types/asset";
export * from "./core/errors";
export { canonicalizeAssetPath, normalizeSlashes, toAssetIdentifier } from "./core/canonicalize";
export { walkAssets, insertLeaf, mapTree, leaves, type WalkOptions } from "./core/tree";
export { encodeAsset, encodeBundle, embedModeFor } from "./core/encoder";
export { generateModule, type CodegenOptions } from "./core/codegen";
export {
  buildBundle,
  runBundle,
  validateBundleOptions,
  defaultOutputPath,
  resolveEntryName,
  type BundleResult,
} from "./core/bundler";
export { createStoreFromBundle, bundleLoaders, loaderFor } from "./core/materialize";
export { resolveBundleOptions, DEFAULT_OPTIONS } from "./cli/utils/options";

import type { EmbedpackConfig } from "./types/config";

export function defineConfig(config: EmbedpackConfig): EmbedpackConfig;
export function defineConfig(
  config: (env: { mode: string }) => EmbedpackConfig | Promise<EmbedpackConfig>
): EmbedpackConfig | Promise<EmbedpackConfig>;
export function defineConfig(
  config: EmbedpackConfig | ((env: { mode: string }) => EmbedpackConfig | Promise<EmbedpackConfig>)
): EmbedpackConfig | Promise<EmbedpackConfig> {
  if (typeof config === "function") {
    return config({ mode: process.env.NODE_ENV || "development" });
  }
  return config;
}
