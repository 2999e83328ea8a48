import fs from "fs";
import path from "path";
import type { AssetLoader, AssetMetadata, AssetRecord, DirNode, TreeNode } from "../types/asset";
import { NotADirectoryError, NotFoundError, RestoreIOError, type RestoreStep } from "@core/errors";
import { logError } from "@core/utils/logger";

export type AssetTable = ReadonlyMap<string, AssetLoader>;

function canonicalName(name: string): string {
  return name.replace(/\\/g, "/");
}

/**
 * Read-only view over an embedded asset table and its directory tree.
 * Built once per process by the generated module; nothing here mutates.
 */
export class AssetStore {
  constructor(
    private readonly table: AssetTable,
    private readonly root: DirNode<AssetLoader>
  ) {}

  private load(name: string): AssetRecord {
    const loader = this.table.get(canonicalName(name));
    if (!loader) throw new NotFoundError(name);
    return loader();
  }

  has(name: string): boolean {
    return this.table.has(canonicalName(name));
  }

  /** Content of the asset registered under `name`. */
  get(name: string): Buffer {
    return this.load(name).bytes;
  }

  /**
   * Like `get`, but a miss or load failure ends the process. Meant for assets
   * the program cannot start without.
   */
  mustGet(name: string): Buffer {
    try {
      return this.get(name);
    } catch (err) {
      logError(`mustGet(${JSON.stringify(name)}) failed`, err);
      return process.exit(1);
    }
  }

  getInfo(name: string): AssetMetadata {
    return this.load(name).info;
  }

  list(): string[] {
    return Array.from(this.table.keys());
  }

  private resolve(name: string): TreeNode<AssetLoader> {
    let node: TreeNode<AssetLoader> = this.root;
    if (name.length === 0) return node;
    for (const segment of canonicalName(name).split("/")) {
      const next: TreeNode<AssetLoader> | undefined =
        node.kind === "dir" ? node.children.get(segment) : undefined;
      if (!next) throw new NotFoundError(name);
      node = next;
    }
    return node;
  }

  /**
   * Child names below a directory. For a tree holding data/foo.txt and
   * data/img/a.png, listDir("data") is ["foo.txt", "img"] and listDir("")
   * is ["data"].
   */
  listDir(name: string): string[] {
    const node = this.resolve(name);
    if (node.kind === "leaf") throw new NotADirectoryError(name);
    return Array.from(node.children.keys());
  }

  /**
   * Write `name` (a file, or every file below a directory) under `targetDir`,
   * then stamp the recorded mode and modification time. Files written before
   * a failure are left in place.
   */
  restore(targetDir: string, name: string): void {
    const node = this.resolve(name);
    if (node.kind === "dir") {
      this.restoreTree(targetDir, canonicalName(name), node);
      return;
    }
    this.writeAsset(targetDir, canonicalName(name), node.value);
  }

  restoreAll(targetDir: string, dirName = ""): void {
    const node = this.resolve(dirName);
    if (node.kind === "leaf") throw new NotADirectoryError(dirName);
    this.restoreTree(targetDir, canonicalName(dirName), node);
  }

  private restoreTree(targetDir: string, base: string, node: DirNode<AssetLoader>) {
    for (const [child, next] of node.children) {
      const childName = base ? `${base}/${child}` : child;
      if (next.kind === "dir") {
        this.restoreTree(targetDir, childName, next);
      } else {
        this.writeAsset(targetDir, childName, next.value);
      }
    }
  }

  private writeAsset(targetDir: string, name: string, loader: AssetLoader) {
    const target = path.join(targetDir, ...name.split("/"));
    const step = <T>(kind: RestoreStep, run: () => T): T => {
      try {
        return run();
      } catch (err) {
        throw new RestoreIOError(name, kind, target, err);
      }
    };

    const { bytes, info } = step("load", loader);
    const stamp = new Date(info.modTime);

    step("mkdir", () => fs.mkdirSync(path.dirname(target), { recursive: true, mode: 0o755 }));
    step("write", () => fs.writeFileSync(target, bytes, { mode: info.mode }));
    step("chmod", () => fs.chmodSync(target, info.mode));
    step("utimes", () => fs.utimesSync(target, stamp, stamp));
  }
}

export function createAssetStore(
  entries: Iterable<readonly [string, AssetLoader]>,
  tree: DirNode<AssetLoader>
): AssetStore {
  return new AssetStore(new Map(entries), tree);
}
