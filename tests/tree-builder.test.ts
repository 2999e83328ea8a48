import fs from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { createDirNode, insertLeaf, leaves, walkAssets } from "../src/core/tree";
import { ConfigurationError, TraversalError } from "../src/core/errors";
import { FIXTURE_MTIME, makeFixture, removeFixture } from "./fixtures";

const roots: string[] = [];

function fixture(files: Parameters<typeof makeFixture>[0]) {
  const root = makeFixture(files);
  roots.push(root);
  return root;
}

afterEach(() => {
  for (const root of roots.splice(0)) removeFixture(root);
});

describe("walkAssets", () => {
  it("collects files in name order when recursive", () => {
    const root = fixture({
      "top.txt": "top\n",
      "b/test.asset": "hello\n",
      "a/test.asset": "hello\n",
      "a/deep/x.bin": Buffer.from([1, 2, 3]),
    });

    const walk = walkAssets(root, { recursive: true });

    expect(walk.assets.map((a) => a.path)).toEqual([
      "a/deep/x.bin",
      "a/test.asset",
      "b/test.asset",
      "top.txt",
    ]);
    expect(Array.from(walk.tree.children.keys())).toEqual(["a", "b", "top.txt"]);
  });

  it("skips sub-directories entirely when not recursive", () => {
    const root = fixture({
      "top.txt": "top\n",
      "a/test.asset": "hello\n",
    });

    const walk = walkAssets(root, { recursive: false });

    expect(walk.assets.map((a) => a.path)).toEqual(["top.txt"]);
    expect(Array.from(walk.tree.children.keys())).toEqual(["top.txt"]);
  });

  it("registers the same asset objects in the list and the tree", () => {
    const root = fixture({
      "a/one.txt": "1",
      "a/two.txt": "2",
      "b/three.txt": "3",
    });

    const walk = walkAssets(root, { recursive: true });
    const fromTree = Array.from(leaves(walk.tree));

    expect(fromTree.map(([p]) => p)).toEqual(walk.assets.map((a) => a.path));
    fromTree.forEach(([, asset], i) => expect(asset).toBe(walk.assets[i]));

    const a = walk.tree.children.get("a");
    expect(a?.kind).toBe("dir");
    if (a?.kind === "dir") {
      expect(Array.from(a.children.keys())).toEqual(["one.txt", "two.txt"]);
    }
  });

  it("captures size, permission bits and modification time", () => {
    const root = fixture({
      "a/test.asset": { content: "hello\n", mode: 0o640 },
    });

    const [asset] = walkAssets(root, { recursive: true }).assets;

    expect(asset.info).toEqual({
      name: "a/test.asset",
      size: 6,
      mode: 0o640,
      modTime: FIXTURE_MTIME.getTime(),
    });
    expect(asset.identifier).toBe("a_test_asset");
    expect(asset.source).toBe(path.join(root, "a", "test.asset"));
  });

  it("gives the same keys when the input root itself is the prefix", () => {
    const root = fixture({
      "a/test.asset": "hello\n",
      "b/test.asset": "hello\n",
    });

    const walk = walkAssets(root, { recursive: true, prefix: `${root}/` });

    expect(walk.assets.map((a) => a.path)).toEqual(["a/test.asset", "b/test.asset"]);
  });

  it("strips a prefix that covers part of the input path", () => {
    const root = fixture({ "site/index.html": "<p></p>" });
    const parent = path.dirname(root);

    const walk = walkAssets(root, { recursive: true, prefix: `${parent}/` });

    expect(walk.assets.map((a) => a.path)).toEqual([`${path.basename(root)}/site/index.html`]);
  });

  it("matches an absolute prefix against a relatively given root", () => {
    const root = fixture({ "site/index.html": "<p></p>" });
    const relativeRoot = path.relative(process.cwd(), root);

    const walk = walkAssets(relativeRoot, { recursive: true, prefix: `${path.dirname(root)}/` });

    expect(walk.assets.map((a) => a.path)).toEqual([`${path.basename(root)}/site/index.html`]);
  });

  it("rejects keys made ambiguous by the prefix", () => {
    const root = fixture({
      "f.txt": "1",
      "x/f.txt": "2",
    });

    expect(() => walkAssets(root, { recursive: true, prefix: "x/" })).toThrow(ConfigurationError);
  });

  it("does not loop through a symlink back to the root", () => {
    const root = fixture({ "a/test.asset": "hello\n" });
    fs.symlinkSync(root, path.join(root, "a", "loop"), "dir");

    const walk = walkAssets(root, { recursive: true });

    expect(walk.assets.map((a) => a.path)).toEqual(["a/test.asset"]);
  });

  it("follows a symlink to a file", () => {
    const root = fixture({ "real.txt": "data" });
    fs.symlinkSync(path.join(root, "real.txt"), path.join(root, "alias.txt"));

    const walk = walkAssets(root, { recursive: false });

    expect(walk.assets.map((a) => a.path)).toEqual(["alias.txt", "real.txt"]);
  });

  it("fails with the offending path when the root is missing", () => {
    const missing = path.join(fixture({}), "nope");

    let caught: unknown;
    try {
      walkAssets(missing, { recursive: true });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TraversalError);
    expect(caught).toMatchObject({ path: missing });
  });

  it("fails when the root is a file", () => {
    const root = fixture({ "file.txt": "x" });
    expect(() => walkAssets(path.join(root, "file.txt"), { recursive: true })).toThrow(TraversalError);
  });

  it("fails when an entry cannot be read", () => {
    const root = fixture({ "ok.txt": "ok" });
    fs.symlinkSync(path.join(root, "gone.txt"), path.join(root, "dangling.txt"));

    expect(() => walkAssets(root, { recursive: true })).toThrow(/dangling\.txt/);
  });
});

describe("insertLeaf", () => {
  it("reuses interior nodes for a shared prefix", () => {
    const root = createDirNode<string>();
    insertLeaf(root, "a/b/one", "1");
    const interior = root.children.get("a");
    insertLeaf(root, "a/b/two", "2");

    expect(root.children.get("a")).toBe(interior);
    expect(Array.from(leaves(root))).toEqual([
      ["a/b/one", "1"],
      ["a/b/two", "2"],
    ]);
  });

  it("refuses a path that runs through a file", () => {
    const root = createDirNode<string>();
    insertLeaf(root, "a", "file");
    expect(() => insertLeaf(root, "a/b", "nested")).toThrow(ConfigurationError);
  });

  it("refuses an empty path", () => {
    expect(() => insertLeaf(createDirNode<string>(), "", "x")).toThrow(ConfigurationError);
  });
});
