import os from "os";
import { z } from "zod";
import { DedupError } from "./errors";
import { FILE_CATEGORIES } from "./file-type";

export const HASH_CONCURRENCY = Math.max(2, Math.min(8, os.cpus().length || 2));

/** Files larger than this are hashed in sequential chunks. */
export const CHUNK_THRESHOLD_BYTES = 10 * 1024 * 1024;
export const CHUNK_SIZE_BYTES = 4 * 1024 * 1024;

/** Scan progress is emitted every N processed files, or after the interval below. */
export const PROGRESS_FILE_INTERVAL = 100;
export const PROGRESS_TIME_INTERVAL_MS = 1000;

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = Object.freeze([
  ".git",
  ".gitignore",
  ".hg",
  ".hgignore",
  ".svn",
  "__pycache__",
  ".pytest_cache",
  ".tox",
  ".venv",
  "venv",
  "node_modules",
  ".idea",
  ".vscode",
  "dist",
  "build",
  ".mypy_cache",
  "*.egg-info",
]);

export const tieBreakSchema = z.enum(["encounter", "path"]);
export type TieBreak = z.infer<typeof tieBreakSchema>;

export const dedupConfigSchema = z.object({
  categories: z.array(z.enum(FILE_CATEGORIES)).default([]),
  excludePatterns: z.array(z.string().min(1)).optional(),
  useDefaultExcludes: z.boolean().default(true),
  tieBreak: tieBreakSchema.default("encounter"),
  concurrency: z.number().int().positive().max(64).default(HASH_CONCURRENCY),
  dryRun: z.boolean().default(false),
});

export type DedupConfig = z.infer<typeof dedupConfigSchema>;
export type DedupConfigInput = z.input<typeof dedupConfigSchema>;

/**
 * Validates user options and fills in defaults.
 *
 * @throws DedupError (InvalidArgument) listing every rejected field
 */
export function resolveConfig(input: unknown = {}): DedupConfig {
  const result = dedupConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new DedupError(`Invalid configuration: ${issues}`, "InvalidArgument");
  }
  return result.data;
}
