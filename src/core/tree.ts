import fs from "fs";
import path from "path";
import type { DirNode, DiscoveredAsset, TreeNode, WalkResult } from "../types/asset";
import { canonicalizeAssetPath, prefixApplies, toAssetIdentifier } from "./canonicalize";
import { ConfigurationError, TraversalError } from "./errors";

export interface WalkOptions {
  recursive: boolean;
  prefix?: string;
}

export function createDirNode<T>(): DirNode<T> {
  return { kind: "dir", children: new Map() };
}

/**
 * Attach `value` at `assetPath`, creating interior nodes on the way. Assets
 * sharing a prefix share the same interior node objects.
 */
export function insertLeaf<T>(root: DirNode<T>, assetPath: string, value: T): void {
  if (!assetPath) {
    throw new ConfigurationError("Asset path is empty after prefix stripping", assetPath);
  }
  const segments = assetPath.split("/");
  const leafName = segments.pop() ?? assetPath;
  let node = root;
  for (let i = 0; i < segments.length; i++) {
    const existing = node.children.get(segments[i]);
    if (!existing) {
      const child = createDirNode<T>();
      node.children.set(segments[i], child);
      node = child;
      continue;
    }
    if (existing.kind === "leaf") {
      const clash = segments.slice(0, i + 1).join("/");
      throw new ConfigurationError(`Asset path ${assetPath} runs through file ${clash}`, assetPath);
    }
    node = existing;
  }
  if (node.children.has(leafName)) {
    throw new ConfigurationError(`Duplicate asset path ${assetPath}`, assetPath);
  }
  node.children.set(leafName, { kind: "leaf", value });
}

export function mapTree<T, U>(node: DirNode<T>, fn: (value: T) => U): DirNode<U> {
  const mapped = createDirNode<U>();
  for (const [name, child] of node.children) {
    const next: TreeNode<U> = child.kind === "leaf"
      ? { kind: "leaf", value: fn(child.value) }
      : mapTree(child, fn);
    mapped.children.set(name, next);
  }
  return mapped;
}

/** Leaves in depth-first, insertion order, paired with their "/"-joined path. */
export function* leaves<T>(node: DirNode<T>, base = ""): Generator<[string, T]> {
  for (const [name, child] of node.children) {
    const childPath = base ? `${base}/${name}` : name;
    if (child.kind === "leaf") {
      yield [childPath, child.value];
    } else {
      yield* leaves(child, childPath);
    }
  }
}

function statEntry(abs: string): fs.Stats {
  try {
    return fs.statSync(abs);
  } catch (err) {
    throw new TraversalError(abs, err);
  }
}

function resolveAssetPath(root: string, rel: string, prefix?: string): string {
  const given = path.join(root, rel);
  if (prefixApplies(given, prefix)) {
    return canonicalizeAssetPath(given, prefix);
  }
  // An absolute prefix still applies when the root was given relatively.
  if (prefix && path.isAbsolute(prefix)) {
    const absolute = path.resolve(root, rel);
    if (prefixApplies(absolute, prefix)) return canonicalizeAssetPath(absolute, prefix);
  }
  return canonicalizeAssetPath(rel, prefix);
}

/**
 * Walk `root` in name order and collect every regular file. Symlinks are
 * followed; a directory whose real path was already visited is skipped.
 */
export function walkAssets(root: string, options: WalkOptions): WalkResult {
  const absRoot = path.resolve(root);
  if (!statEntry(absRoot).isDirectory()) {
    throw new TraversalError(absRoot, new Error("not a directory"));
  }

  const assets: DiscoveredAsset[] = [];
  const tree = createDirNode<DiscoveredAsset>();
  const visited = new Set<string>();

  const visit = (dir: string, relDir: string) => {
    let names: string[];
    try {
      const real = fs.realpathSync(dir);
      if (visited.has(real)) return;
      visited.add(real);
      names = fs.readdirSync(dir).sort();
    } catch (err) {
      throw new TraversalError(dir, err);
    }

    for (const name of names) {
      const abs = path.join(dir, name);
      const rel = relDir ? `${relDir}/${name}` : name;
      const stat = statEntry(abs);

      if (stat.isDirectory()) {
        if (options.recursive) visit(abs, rel);
        continue;
      }
      if (!stat.isFile()) continue;

      const assetPath = resolveAssetPath(root, rel, options.prefix);
      const asset: DiscoveredAsset = {
        path: assetPath,
        identifier: toAssetIdentifier(assetPath),
        source: abs,
        info: {
          name: assetPath,
          size: stat.size,
          mode: stat.mode & 0o777,
          modTime: Math.floor(stat.mtimeMs),
        },
      };
      insertLeaf(tree, assetPath, asset);
      assets.push(asset);
    }
  };

  visit(absRoot, "");
  return { root: absRoot, assets, tree };
}
