/**
{
  "description": "Bundling pipeline. Validates options, walks the input directory, encodes every asset and writes the generated module in one atomic step.",
  "phase": 1
}
*/

import fs from "fs";
import path from "path";
import { logInfo, logWarn } from "./utils/logger";
import type { BundleOptions } from "../types/config";
import type { EncodedBundle } from "../types/asset";
import { ConfigurationError, describeCause } from "./errors";
import { toAssetIdentifier } from "./canonicalize";
import { walkAssets } from "./tree";
import { embedModeFor, encodeBundle } from "./encoder";
import { generateModule, RUNTIME_IMPORTS } from "./codegen";
import reservedWords from "./reserved-words.json";

const RESERVED = new Set<string>(reservedWords);

export interface BundleResult {
  output: string;
  bundle: EncodedBundle;
  bytes: number;
}

function pathTaken(p: string): boolean {
  try {
    fs.lstatSync(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * `<input>.ts`, or the first free `<input>.<n>.ts` when that already exists.
 */
export function defaultOutputPath(input: string): string {
  const base = path.resolve(input);
  const first = `${base}.ts`;
  if (!pathTaken(first)) return first;
  for (let n = 0; ; n++) {
    const candidate = `${base}.${n}.ts`;
    if (!pathTaken(candidate)) return candidate;
  }
}

export function resolveEntryName(raw: string): string {
  let name = toAssetIdentifier(raw.trim());
  if (name && !/^[\p{ID_Start}_$]/u.test(name)) {
    name = `_${name}`;
  }
  if (!name || RESERVED.has(name)) {
    throw new ConfigurationError(`Entry name "${raw}" is not a usable identifier`, raw);
  }
  if (RUNTIME_IMPORTS.includes(name)) {
    throw new ConfigurationError(`Entry name "${raw}" clashes with the runtime import ${name}`, raw);
  }
  return name;
}

export function validateBundleOptions(options: BundleOptions): void {
  if (!options.input) {
    throw new ConfigurationError("No input directory specified", "");
  }

  let input: fs.Stats;
  try {
    input = fs.statSync(options.input);
  } catch (err) {
    throw new ConfigurationError(`Input path ${options.input}: ${describeCause(err)}`, options.input, err);
  }
  if (!input.isDirectory()) {
    throw new ConfigurationError(`Input path ${options.input} is not a directory`, options.input);
  }

  if (options.output && fs.statSync(options.output, { throwIfNoEntry: false })?.isDirectory()) {
    throw new ConfigurationError(`Output path ${options.output} is a directory`, options.output);
  }

  resolveEntryName(options.entry);
}

/** Validate, walk and encode. Nothing is written. */
export function buildBundle(options: BundleOptions): EncodedBundle {
  validateBundleOptions(options);
  const walk = walkAssets(options.input, {
    recursive: options.recursive,
    prefix: options.prefix,
  });
  return encodeBundle(walk, embedModeFor(options));
}

async function writeAtomically(target: string, contents: string) {
  const temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.promises.writeFile(temp, contents, "utf8");
    await fs.promises.rename(temp, target);
  } catch (err) {
    await fs.promises.rm(temp, { force: true });
    throw err;
  }
}

export async function runBundle(options: BundleOptions): Promise<BundleResult> {
  validateBundleOptions(options);

  let output = options.output ? path.resolve(options.output) : "";
  if (!output) {
    output = defaultOutputPath(options.input);
    logWarn(`No output file specified. Using '${output}'.`);
  }

  const bundle = buildBundle(options);
  if (bundle.mode === "debug") {
    logWarn(`Debug build: assets will be read from ${bundle.root} at runtime`);
  }

  const source = generateModule(bundle, {
    packageName: options.package,
    entryName: resolveEntryName(options.entry),
    runtimeModule: options.runtime,
    recursive: options.recursive,
  });
  await writeAtomically(output, source);

  const bytes = Buffer.byteLength(source);
  logInfo(`Embedded ${bundle.assets.length} assets (${bundle.mode}) → ${output}`);
  return { output, bundle, bytes };
}
