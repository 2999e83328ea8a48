import { logInfo } from "@core/utils/logger";
import { loadEmbedpackConfig } from "@cli/utils/config";
import { resolveBundleOptions, type CliBundleFlags } from "@cli/utils/options";
import { buildBundle } from "@core/bundler";
import { createStoreFromBundle } from "@core/materialize";
import type { AssetStore } from "@runtime/store";
import type { EmbedpackConfig } from "../../types/config";

interface AnalyzeOptions extends CliBundleFlags {
  json?: boolean;
  limit?: number;
}

export interface AnalyzeSummary {
  assets: number;
  rawBytes: number;
  compressedBytes: number;
  ratio: number;
  largest: Array<{ path: string; size: number; compressed: number }>;
  tree: string[];
}

/** Indented listing of the store's directory tree, directories suffixed with "/". */
export function renderTree(store: AssetStore, dir = "", depth = 0): string[] {
  const lines: string[] = [];
  for (const name of store.listDir(dir)) {
    const child = dir ? `${dir}/${name}` : name;
    const isFile = store.has(child);
    lines.push(`${"  ".repeat(depth)}${name}${isFile ? "" : "/"}`);
    if (!isFile) lines.push(...renderTree(store, child, depth + 1));
  }
  return lines;
}

export function computeSummary(
  flags: CliBundleFlags,
  options: { config?: EmbedpackConfig | null; limit?: number } = {}
): AnalyzeSummary {
  // Always measure with gzip so the compressed size is real.
  const resolved = resolveBundleOptions(options.config, { ...flags, compress: true, debug: false });
  const bundle = buildBundle(resolved);
  const store = createStoreFromBundle(bundle);

  let rawBytes = 0;
  let compressedBytes = 0;
  const sizes = bundle.assets.map(({ asset, payload }) => {
    const compressed = payload.kind === "gzip" ? payload.data.length : asset.info.size;
    rawBytes += asset.info.size;
    compressedBytes += compressed;
    return { path: asset.path, size: asset.info.size, compressed };
  });

  return {
    assets: bundle.assets.length,
    rawBytes,
    compressedBytes,
    ratio: rawBytes === 0 ? 1 : compressedBytes / rawBytes,
    largest: sizes.sort((a, b) => b.size - a.size).slice(0, options.limit ?? 10),
    tree: renderTree(store),
  };
}

export async function runAnalyzeCommand(options: AnalyzeOptions = {}) {
  const config = await loadEmbedpackConfig();
  const { json, limit, ...flags } = options;
  const summary = computeSummary(flags, { config, limit });

  if (json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  logInfo("Embedpack Asset Summary");
  console.log(` Assets: ${summary.assets}`);
  console.log(` Raw bytes: ${summary.rawBytes}`);
  console.log(` Gzip bytes: ${summary.compressedBytes} (${(summary.ratio * 100).toFixed(1)}%)`);

  if (summary.largest.length > 0) {
    console.log("\n Largest assets:");
    for (const entry of summary.largest) {
      console.log(`  • ${entry.path} (${entry.size} → ${entry.compressed})`);
    }
  }

  if (summary.tree.length > 0) {
    console.log("\n Tree:");
    for (const line of summary.tree) {
      console.log(`  ${line}`);
    }
  }
}
