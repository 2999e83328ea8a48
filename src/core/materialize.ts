import type { AssetLoader, DirNode, EncodedAsset, EncodedBundle } from "../types/asset";
import { AssetStore } from "@runtime/store";
import { diskAsset, gzipAsset, rawAsset } from "@runtime/loaders";
import { mapTree } from "./tree";

/** The runtime loader the generated module would emit for this asset. */
export function loaderFor({ asset, payload }: EncodedAsset): AssetLoader {
  switch (payload.kind) {
    case "gzip":
      return gzipAsset(payload.data.toString("base64"), asset.info);
    case "raw":
      return rawAsset(payload.data.toString("base64"), asset.info);
    case "disk":
      return diskAsset(payload.file, asset.info);
  }
}

/** Table and tree over one loader per asset, shared by both structures. */
export function bundleLoaders(bundle: EncodedBundle): {
  table: Map<string, AssetLoader>;
  tree: DirNode<AssetLoader>;
} {
  const loaders = new Map<EncodedAsset, AssetLoader>();
  const table = new Map<string, AssetLoader>();
  for (const entry of bundle.assets) {
    const loader = loaderFor(entry);
    loaders.set(entry, loader);
    table.set(entry.asset.path, loader);
  }
  const tree = mapTree(bundle.tree, (entry) => {
    const loader = loaders.get(entry);
    if (!loader) throw new Error(`Asset ${entry.asset.path} is in the tree but not the table`);
    return loader;
  });
  return { table, tree };
}

/** Live store over a bundle, without generating code. */
export function createStoreFromBundle(bundle: EncodedBundle): AssetStore {
  const { table, tree } = bundleLoaders(bundle);
  return new AssetStore(table, tree);
}
