export class EmbedpackError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EmbedpackError";
  }
}

/** Invalid options, reported before any bundling work starts. */
export class ConfigurationError extends EmbedpackError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, path, cause === undefined ? undefined : { cause });
    this.name = "ConfigurationError";
  }
}

export class TraversalError extends EmbedpackError {
  constructor(path: string, cause: unknown) {
    super(`Unable to read ${path}: ${describeCause(cause)}`, path, { cause });
    this.name = "TraversalError";
  }
}

export class NotFoundError extends EmbedpackError {
  constructor(path: string) {
    super(`Asset ${path} not found`, path);
    this.name = "NotFoundError";
  }
}

export class NotADirectoryError extends EmbedpackError {
  constructor(path: string) {
    super(`Asset ${path} is not a directory`, path);
    this.name = "NotADirectoryError";
  }
}

export class CodecError extends EmbedpackError {
  constructor(path: string, cause: unknown) {
    super(`Asset ${path} could not be decoded: ${describeCause(cause)}`, path, { cause });
    this.name = "CodecError";
  }
}

/** Debug-mode loader could not read the file from disk. */
export class AssetReadError extends EmbedpackError {
  constructor(path: string, file: string, cause: unknown) {
    super(`Asset ${path} can't be read from ${file}: ${describeCause(cause)}`, path, { cause });
    this.name = "AssetReadError";
  }
}

export type RestoreStep = "load" | "mkdir" | "write" | "chmod" | "utimes";

export class RestoreIOError extends EmbedpackError {
  constructor(
    path: string,
    readonly step: RestoreStep,
    readonly target: string,
    cause: unknown
  ) {
    super(`Restore of ${path} failed at ${step} (${target}): ${describeCause(cause)}`, path, { cause });
    this.name = "RestoreIOError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
