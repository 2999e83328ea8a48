import fs from "fs";
import os from "os";
import path from "path";

export const FIXTURE_MTIME = new Date(1_700_000_000_000);

export interface FixtureFile {
  content: string | Buffer;
  mode?: number;
}

/**
 * Temp directory holding `files` (keys use "/"), each stamped with
 * FIXTURE_MTIME. Returns the directory path.
 */
export function makeFixture(files: Record<string, string | Buffer | FixtureFile>, label = "tree"): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), `embedpack-${label}-`));
  for (const [name, entry] of Object.entries(files)) {
    const file = typeof entry === "string" || Buffer.isBuffer(entry) ? { content: entry } : entry;
    const target = path.join(root, ...name.split("/"));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, file.content);
    fs.chmodSync(target, file.mode ?? 0o644);
    fs.utimesSync(target, FIXTURE_MTIME, FIXTURE_MTIME);
  }
  return root;
}

export function removeFixture(root: string) {
  fs.rmSync(root, { recursive: true, force: true });
}
