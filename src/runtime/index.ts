export { AssetStore, createAssetStore, type AssetTable } from "./store";
export { gzipAsset, rawAsset, diskAsset, dir, type DirEntry } from "./loaders";
export { decompress, decodeBase64 } from "./codec";
export {
  EmbedpackError,
  NotFoundError,
  NotADirectoryError,
  CodecError,
  AssetReadError,
  RestoreIOError,
} from "@core/errors";
export type { AssetLoader, AssetMetadata, AssetRecord, DirNode, LeafNode, TreeNode } from "../types/asset";
