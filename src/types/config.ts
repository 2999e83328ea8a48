export interface EmbedpackConfig {
  /** Directory whose files are embedded. */
  input?: string;
  /**
   * Generated module path. When unset, `<input>.ts` is used, or
   * `<input>.<n>.ts` if that file already exists.
   */
  output?: string;
  /**
   * Leading path stripped from every asset key.
   *
   * Without a prefix keys are relative to the input directory, so
   * `embedpack build public` registers "img/logo.png".
   *
   * The prefix is tried against the path as given (input joined with the
   * relative path) first, so `--prefix web/` on input `web/public` gives
   * "public/img/logo.png". In a config file such a prefix is read relative
   * to the config file, like `input`.
   */
  prefix?: string;
  /** Name recorded in the generated module header. Defaults to "main". */
  package?: string;
  /** Export name of the generated store. Defaults to "assets". */
  entry?: string;
  /** Gzip asset content before embedding. Defaults to true. */
  compress?: boolean;
  /**
   * Emit loaders that read each file from its original absolute path on
   * every call instead of embedding content. Useful while editing assets;
   * the generated module stops working once the files move.
   */
  debug?: boolean;
  /** Descend into sub-directories. Defaults to false. */
  recursive?: boolean;
  /** Module specifier the generated code imports the runtime from. */
  runtime?: string;
  [key: string]: unknown;
}

export interface BundleOptions {
  input: string;
  output?: string;
  prefix?: string;
  package: string;
  entry: string;
  compress: boolean;
  debug: boolean;
  recursive: boolean;
  runtime: string;
}
