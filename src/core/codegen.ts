import type { AssetMetadata, DirNode, EncodedAsset, EncodedBundle } from "../types/asset";

export interface CodegenOptions {
  /** Cosmetic; recorded in the header. */
  packageName: string;
  entryName: string;
  runtimeModule: string;
  recursive: boolean;
}

const CHUNK_WIDTH = 100;
/** Names the generated module imports from the runtime. */
export const RUNTIME_IMPORTS: readonly string[] = [
  "createAssetStore",
  "dir",
  "gzipAsset",
  "rawAsset",
  "diskAsset",
];

function oneLine(text: string): string {
  return text.replace(/[\r\n\u2028\u2029]/g, " ");
}

function formatBase64(b64: string): string {
  if (b64.length <= CHUNK_WIDTH) return JSON.stringify(b64);
  const parts: string[] = [];
  for (let i = 0; i < b64.length; i += CHUNK_WIDTH) {
    parts.push(JSON.stringify(b64.slice(i, i + CHUNK_WIDTH)));
  }
  return parts.join(" +\n    ");
}

function formatInfo(info: AssetMetadata): string {
  return (
    `{ name: ${JSON.stringify(info.name)}, size: ${info.size}, ` +
    `mode: 0o${info.mode.toString(8)}, modTime: ${info.modTime} }`
  );
}

function loaderExpression({ asset, payload }: EncodedAsset): { factory: string; source: string } {
  switch (payload.kind) {
    case "gzip":
      return { factory: "gzipAsset", source: formatBase64(payload.data.toString("base64")) };
    case "raw":
      return { factory: "rawAsset", source: formatBase64(payload.data.toString("base64")) };
    case "disk":
      return { factory: "diskAsset", source: JSON.stringify(payload.file) };
  }
}

/** Unique constant names, `_<identifier>` with a numeric suffix on collision. */
function assignConstNames(assets: EncodedAsset[], reserved: string[]): Map<EncodedAsset, string> {
  const used = new Set(reserved);
  const names = new Map<EncodedAsset, string>();
  for (const entry of assets) {
    const base = `_${entry.asset.identifier}`;
    let name = base;
    for (let n = 1; used.has(name); n++) {
      name = `${base}_${n}`;
    }
    used.add(name);
    names.set(entry, name);
  }
  return names;
}

function renderDir(node: DirNode<EncodedAsset>, names: Map<EncodedAsset, string>, depth: number): string {
  if (node.children.size === 0) return "dir([])";
  const pad = "  ".repeat(depth + 1);
  const lines: string[] = [];
  for (const [name, child] of node.children) {
    const value = child.kind === "leaf"
      ? names.get(child.value)
      : renderDir(child, names, depth + 1);
    lines.push(`${pad}[${JSON.stringify(name)}, ${value}],`);
  }
  return `dir([\n${lines.join("\n")}\n${"  ".repeat(depth)}])`;
}

export function generateModule(bundle: EncodedBundle, options: CodegenOptions): string {
  const names = assignConstNames(bundle.assets, [options.entryName, ...RUNTIME_IMPORTS]);
  const factories = new Set<string>(["createAssetStore", "dir"]);
  const out: string[] = [];

  out.push("// Code generated by embedpack. DO NOT EDIT.");
  out.push(`// package: ${oneLine(options.packageName)}`);
  const count = bundle.assets.length;
  out.push(
    `// source: ${oneLine(bundle.root)} (${bundle.mode}, ${options.recursive ? "recursive" : "top-level only"}, ` +
      `${count} asset${count === 1 ? "" : "s"})`
  );
  out.push("");

  const body: string[] = [];
  for (const entry of bundle.assets) {
    const { factory, source } = loaderExpression(entry);
    factories.add(factory);
    body.push(
      `const ${names.get(entry)} = ${factory}(\n  ${source},\n  ${formatInfo(entry.asset.info)},\n);`
    );
    body.push("");
  }

  const imports = RUNTIME_IMPORTS.filter((name) => factories.has(name));
  out.push(`import { ${imports.join(", ")} } from ${JSON.stringify(options.runtimeModule)};`);
  out.push("");
  out.push(...body);

  const table = bundle.assets
    .map((entry) => `    [${JSON.stringify(entry.asset.path)}, ${names.get(entry)}],`)
    .join("\n");
  out.push(`export const ${options.entryName} = createAssetStore(`);
  out.push(table ? `  [\n${table}\n  ],` : "  [],");
  out.push(`  ${renderDir(bundle.tree, names, 1)},`);
  out.push(");");
  out.push("");
  out.push(`export default ${options.entryName};`);
  out.push("");
  return out.join("\n");
}
