import type { BundleOptions, EmbedpackConfig } from "../../types/config";

export interface CliBundleFlags {
  input?: string;
  output?: string;
  prefix?: string;
  package?: string;
  entry?: string;
  compress?: boolean;
  debug?: boolean;
  recursive?: boolean;
  runtime?: string;
}

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_OPTIONS = {
  package: "main",
  entry: "assets",
  compress: true,
  debug: false,
  recursive: false,
  runtime: "embedpack/runtime",
} as const;

function parseBool(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "on":
    case "yes":
      return true;
    case "0":
    case "false":
    case "off":
    case "no":
      return false;
    default:
      return undefined;
  }
}

function pickString(...candidates: unknown[]): string | undefined {
  for (const value of candidates) {
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

function pickBool(...candidates: unknown[]): boolean | undefined {
  for (const value of candidates) {
    if (typeof value === "boolean") return value;
  }
  return undefined;
}

/**
 * Precedence: CLI flag > EMBEDPACK_* env var > embedpack.config.ts > default.
 */
export function resolveBundleOptions(
  config: EmbedpackConfig | null | undefined,
  flags: CliBundleFlags = {},
  env: EnvSource = process.env
): BundleOptions {
  return {
    input: pickString(flags.input, env.EMBEDPACK_INPUT, config?.input) ?? "",
    output: pickString(flags.output, env.EMBEDPACK_OUTPUT, config?.output),
    prefix: pickString(flags.prefix, env.EMBEDPACK_PREFIX, config?.prefix),
    package: pickString(flags.package, config?.package) ?? DEFAULT_OPTIONS.package,
    entry: pickString(flags.entry, config?.entry) ?? DEFAULT_OPTIONS.entry,
    compress:
      pickBool(flags.compress, parseBool(env.EMBEDPACK_COMPRESS), config?.compress) ??
      DEFAULT_OPTIONS.compress,
    debug:
      pickBool(flags.debug, parseBool(env.EMBEDPACK_DEBUG), config?.debug) ?? DEFAULT_OPTIONS.debug,
    recursive:
      pickBool(flags.recursive, parseBool(env.EMBEDPACK_RECURSIVE), config?.recursive) ??
      DEFAULT_OPTIONS.recursive,
    runtime: pickString(flags.runtime, env.EMBEDPACK_RUNTIME, config?.runtime) ?? DEFAULT_OPTIONS.runtime,
  };
}
