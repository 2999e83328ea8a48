/**
{
  "description": "Handles the build command. Resolves options from flags, environment and embedpack.config, then runs the bundler and reports the generated module.",
  "phase": 1
}
*/

import path from "path";
import { logInfo, logError } from "@core/utils/logger";
import { loadEmbedpackConfig } from "@cli/utils/config";
import { resolveBundleOptions, type CliBundleFlags } from "@cli/utils/options";
import { runBundle, type BundleResult } from "@core/bundler";

export async function runBuildCommand(flags: CliBundleFlags = {}): Promise<BundleResult> {
  try {
    const config = await loadEmbedpackConfig();
    const options = resolveBundleOptions(config, flags);

    logInfo(`Input: ${options.input || "(none)"}`);
    if (options.prefix) {
      logInfo(`Stripping prefix '${options.prefix}' from asset keys`);
    }

    const result = await runBundle(options);
    const rawBytes = result.bundle.assets.reduce((sum, entry) => sum + entry.asset.info.size, 0);
    logInfo(`Source bytes: ${rawBytes}, generated module: ${result.bytes} bytes`);
    logInfo(`Done → ${path.relative(process.cwd(), result.output) || result.output}`);
    return result;
  } catch (err) {
    logError("embedpack build failed", err);
    throw err;
  }
}
