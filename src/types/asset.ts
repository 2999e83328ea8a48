/**
 * Metadata snapshot taken once per asset at bundling time.
 */
export interface AssetMetadata {
  /** Canonical asset path the record is registered under. */
  name: string;
  size: number;
  /** Permission bits only (`st_mode & 0o777`). */
  mode: number;
  /** Modification time in epoch milliseconds. */
  modTime: number;
}

export interface AssetRecord {
  bytes: Buffer;
  info: AssetMetadata;
}

export type AssetLoader = () => AssetRecord;

export interface LeafNode<T> {
  kind: "leaf";
  value: T;
}

export interface DirNode<T> {
  kind: "dir";
  children: Map<string, TreeNode<T>>;
}

export type TreeNode<T> = LeafNode<T> | DirNode<T>;

/** How asset content is carried into the generated module. */
export type EmbedMode = "compress" | "raw" | "debug";

export interface DiscoveredAsset {
  /** Canonical, prefix-stripped lookup key. */
  path: string;
  identifier: string;
  /** Absolute path of the source file. */
  source: string;
  info: AssetMetadata;
}

export type AssetPayload =
  | { kind: "gzip"; data: Buffer }
  | { kind: "raw"; data: Buffer }
  | { kind: "disk"; file: string };

export interface EncodedAsset {
  asset: DiscoveredAsset;
  payload: AssetPayload;
}

export interface WalkResult {
  root: string;
  assets: DiscoveredAsset[];
  tree: DirNode<DiscoveredAsset>;
}

export interface EncodedBundle {
  root: string;
  mode: EmbedMode;
  assets: EncodedAsset[];
  tree: DirNode<EncodedAsset>;
}
