import { Command } from "commander";
import { logError } from "../core/utils/logger.js";
import type { CliBundleFlags } from "./utils/options.js";
import { runBuildCommand } from "./commands/build.js";
import { runAnalyzeCommand } from "./commands/analyze.js";

interface BuildCommandOptions {
  output?: string;
  prefix?: string;
  package?: string;
  entry?: string;
  compress?: boolean;
  debug?: boolean;
  recursive?: boolean;
  runtime?: string;
}

// `--no-compress` always yields a value; only an explicit flag may override
// the environment or the config file.
function toFlags(input: string | undefined, options: BuildCommandOptions, command: Command): CliBundleFlags {
  return {
    ...options,
    input,
    compress: command.getOptionValueSource("compress") === "cli" ? options.compress : undefined,
  };
}

const program = new Command();

program
  .name("embedpack")
  .description("Embed a directory of files into a generated TypeScript asset module")
  .version("0.1.0");

program
  .command("build")
  .description("Generate the asset module for a directory")
  .argument("[input]", "Directory containing the assets")
  .option("-o, --output <file>", "Generated module path (default: <input>.ts)")
  .option("--prefix <prefix>", "Path prefix stripped from asset keys")
  .option("-p, --package <name>", "Package name recorded in the generated header")
  .option("-e, --entry <name>", "Export name of the generated asset store")
  .option("--no-compress", "Embed raw bytes instead of gzip data")
  .option("--debug", "Read assets from disk at runtime instead of embedding them")
  .option("-r, --recursive", "Include sub-directories")
  .option("--runtime <module>", "Module the generated code imports the runtime from")
  .action(async (input: string | undefined, options: BuildCommandOptions, command: Command) => {
    try {
      await runBuildCommand(toFlags(input, options, command));
    } catch {
      process.exitCode = 1;
    }
  });

program
  .command("analyze")
  .description("Summarize what a directory would embed")
  .argument("[input]", "Directory containing the assets")
  .option("--prefix <prefix>", "Path prefix stripped from asset keys")
  .option("-r, --recursive", "Include sub-directories")
  .option("--json", "Output summary as JSON")
  .option("-l, --limit <count>", "Limit list outputs", "10")
  .action(async (input: string | undefined, options: { prefix?: string; recursive?: boolean; json?: boolean; limit?: string }) => {
    try {
      const limit = parseInt(options.limit ?? "10", 10);
      await runAnalyzeCommand({
        input,
        prefix: options.prefix,
        recursive: options.recursive,
        json: !!options.json,
        limit: Number.isFinite(limit) ? limit : 10,
      });
    } catch (err) {
      logError("Analyzer failed", err);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logError("embedpack failed", err);
  process.exitCode = 1;
});
