import fs from "fs";
import type { AssetLoader, AssetMetadata, DirNode, TreeNode } from "../types/asset";
import { AssetReadError } from "@core/errors";
import { decodeBase64, decompress } from "./codec";

/** Loader for gzip content embedded as base64. Decompresses on every call. */
export function gzipAsset(base64: string, info: AssetMetadata): AssetLoader {
  return () => ({
    bytes: decompress(decodeBase64(base64, info.name), info.name),
    info,
  });
}

export function rawAsset(base64: string, info: AssetMetadata): AssetLoader {
  return () => ({ bytes: decodeBase64(base64, info.name), info });
}

/**
 * Debug-mode loader: reads the current content of `file` on each call.
 * Metadata stays the snapshot taken at bundling time.
 */
export function diskAsset(file: string, info: AssetMetadata): AssetLoader {
  return () => {
    try {
      return { bytes: fs.readFileSync(file), info };
    } catch (err) {
      throw new AssetReadError(info.name, file, err);
    }
  };
}

export type DirEntry = readonly [name: string, child: AssetLoader | DirNode<AssetLoader>];

/** Interior tree node; a loader child becomes a leaf. */
export function dir(entries: readonly DirEntry[]): DirNode<AssetLoader> {
  const children = new Map<string, TreeNode<AssetLoader>>();
  for (const [name, child] of entries) {
    children.set(name, typeof child === "function" ? { kind: "leaf", value: child } : child);
  }
  return { kind: "dir", children };
}
