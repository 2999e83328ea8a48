export function normalizeSlashes(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Canonical lookup key for a raw asset path: forward slashes, the configured
 * prefix removed when it is a literal leading substring, no leading "/".
 */
export function canonicalizeAssetPath(raw: string, prefix?: string): string {
  let key = normalizeSlashes(raw);
  const strip = prefix ? normalizeSlashes(prefix) : "";
  if (strip && key.startsWith(strip)) {
    key = key.slice(strip.length);
  }
  return key.replace(/^\/+/, "");
}

/** Whether `prefix` would be stripped from `raw` by canonicalizeAssetPath. */
export function prefixApplies(raw: string, prefix?: string): boolean {
  if (!prefix) return false;
  return normalizeSlashes(raw).startsWith(normalizeSlashes(prefix));
}

/**
 * Symbol-safe name for an asset path, used for generated constants only.
 * Every character that cannot appear in an identifier (space, ".", "-", "/"
 * and the like) becomes its own "_".
 */
export function toAssetIdentifier(assetPath: string): string {
  return assetPath.toLowerCase().replace(/[^\p{ID_Continue}$]/gu, "_");
}
