import fs from "fs";
import zlib from "zlib";
import type {
  AssetPayload,
  DiscoveredAsset,
  EmbedMode,
  EncodedAsset,
  EncodedBundle,
  WalkResult,
} from "../types/asset";
import { TraversalError } from "./errors";
import { mapTree } from "./tree";

export function embedModeFor(options: { compress: boolean; debug: boolean }): EmbedMode {
  if (options.debug) return "debug";
  return options.compress ? "compress" : "raw";
}

function readSource(asset: DiscoveredAsset): Buffer {
  try {
    return fs.readFileSync(asset.source);
  } catch (err) {
    throw new TraversalError(asset.source, err);
  }
}

export function compressBytes(bytes: Buffer): Buffer {
  return zlib.gzipSync(bytes, { level: zlib.constants.Z_BEST_COMPRESSION });
}

/**
 * Produce the embedded form of one asset. Debug mode records only the
 * absolute source path; the file is not read.
 */
export function encodeAsset(asset: DiscoveredAsset, mode: EmbedMode): EncodedAsset {
  let payload: AssetPayload;
  switch (mode) {
    case "debug":
      payload = { kind: "disk", file: asset.source };
      break;
    case "raw":
      payload = { kind: "raw", data: readSource(asset) };
      break;
    case "compress":
      payload = { kind: "gzip", data: compressBytes(readSource(asset)) };
      break;
  }
  return { asset, payload };
}

export function encodeBundle(walk: WalkResult, mode: EmbedMode): EncodedBundle {
  const encoded = new Map<DiscoveredAsset, EncodedAsset>();
  for (const asset of walk.assets) {
    encoded.set(asset, encodeAsset(asset, mode));
  }
  const tree = mapTree(walk.tree, (asset) => {
    const entry = encoded.get(asset);
    if (!entry) throw new Error(`Asset ${asset.path} missing from encoded set`);
    return entry;
  });
  return { root: walk.root, mode, assets: Array.from(encoded.values()), tree };
}
