import path from "path";
import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { resolveConfig, tieBreakSchema, type DedupConfig } from "./config";
import { Deleter } from "./deleter";
import { DedupError, errorMessage } from "./errors";
import { FILE_CATEGORIES } from "./file-type";
import { createLogger, type Logger } from "./logger";
import { findDuplicateDecisions, type PipelineResult } from "./pipeline";
import { createProgressReporter } from "./progress";
import { renderDeletion, renderPlan, renderStats } from "./render";
import { DirectoryTrash } from "./trash";

export const VERSION = "0.1.0";

interface CommonOptions {
  type?: string[];
  exclude?: string[];
  defaultExcludes: boolean;
  tieBreak: string;
  concurrency?: number;
  progress: boolean;
  verbose?: boolean;
}

interface CleanOptions extends CommonOptions {
  dryRun?: boolean;
  yes?: boolean;
  trashDir?: string;
}

/** Where command output goes; replaced in tests. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Must be a positive integer");
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError("Must be a positive integer");
  return n;
}

function toConfig(options: CleanOptions): DedupConfig {
  return resolveConfig({
    categories: options.type ?? [],
    excludePatterns: options.exclude,
    useDefaultExcludes: options.defaultExcludes,
    tieBreak: options.tieBreak,
    concurrency: options.concurrency,
    dryRun: options.dryRun ?? false,
  });
}

async function runPipeline(dir: string, config: DedupConfig, options: CommonOptions, logger: Logger): Promise<PipelineResult> {
  const progressEnabled = options.progress && process.stderr.isTTY === true;
  return findDuplicateDecisions(path.resolve(dir), {
    ...config,
    progress: progressEnabled ? createProgressReporter(true) : undefined,
    logger,
  });
}

function addCommonOptions(command: Command): Command {
  return command
    .argument("<directory>", "Directory to scan")
    .addOption(new Option("--type <category...>", "Only consider files of these categories").choices(FILE_CATEGORIES))
    .option("--exclude <pattern...>", "Directory name patterns to skip (replaces the defaults)")
    .option("--no-default-excludes", "Do not skip VCS, dependency and build directories")
    .addOption(
      new Option("--tie-break <rule>", "How to order files tied on mtime and path length")
        .choices(tieBreakSchema.options)
        .default("encounter")
    )
    .option("--concurrency <n>", "Parallel hash workers", parsePositiveInt)
    .option("--no-progress", "Disable progress output")
    .option("--verbose", "Enable debug logging");
}

export function buildProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("dedupe-tree")
    .description("Find duplicate files in a directory tree and move the extra copies to the trash")
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  addCommonOptions(program.command("scan").description("List duplicate groups and which copy would be kept")).action(
    async (dir: string, options: CommonOptions) => {
      const config = toConfig(options);
      const logger = createLogger(options.verbose ? "debug" : "warn");
      const result = await runPipeline(dir, config, options, logger);

      io.out(renderPlan(result.decisions));
      io.out(renderStats(result.stats, result.scan, result.hashErrors.length));
    }
  );

  addCommonOptions(program.command("clean").description("Move every duplicate except the kept copy to the trash"))
    .option("--dry-run", "Show what would be moved without touching any file")
    .option("--yes", "Confirm moving files to the trash")
    .option("--trash-dir <dir>", "Move files into this directory instead of the system trash")
    .action(async (dir: string, options: CleanOptions) => {
      const config = toConfig(options);
      const logger = createLogger(options.verbose ? "debug" : "warn");
      const result = await runPipeline(dir, config, options, logger);
      const trash = options.trashDir ? new DirectoryTrash(path.resolve(options.trashDir)) : undefined;
      const deleter = new Deleter({ dryRun: config.dryRun, trash, logger });

      io.out(renderPlan(result.decisions));

      if (!config.dryRun && !options.yes) {
        const count = deleter.preview(result.decisions).length;
        io.err(chalk.yellow(`${count} files would be moved to the trash. Re-run with --yes to proceed.\n`));
        process.exitCode = 1;
        return;
      }

      const summary = await deleter.deleteDecisions(result.decisions);
      io.out(renderDeletion(summary, config.dryRun));
      if (summary.failureCount > 0) {
        process.exitCode = 1;
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv, io: CliIO = processIO): Promise<void> {
  try {
    await buildProgram(io).parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed usage errors, help and the version.
      process.exitCode = err.exitCode;
      return;
    }
    io.err(chalk.red(`Error: ${errorMessage(err)}\n`));
    process.exitCode = err instanceof DedupError && err.kind === "InvalidArgument" ? 2 : 1;
  }
}
