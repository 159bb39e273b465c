import fs from "fs";
import path from "path";
import { PROGRESS_FILE_INTERVAL, PROGRESS_TIME_INTERVAL_MS } from "./config";
import { DedupError, classifyError, errorMessage, toDedupError } from "./errors";
import { FileFilter } from "./filter";
import { defaultLogger, type Logger } from "./logger";
import type { ProgressReporter } from "./progress";
import type { FileRecord, ScanSummary } from "./types";

const fsp = fs.promises;

export interface ScanOptions {
  /** Defaults to a FileFilter with the default exclusion patterns */
  filter?: FileFilter;
  /** When given, a pre-walk estimates the total and updates are throttled to it */
  progress?: ProgressReporter;
  logger?: Logger;
}

/**
 * Verifies that a scan root exists and is a real directory.
 *
 * @throws DedupError - InvalidArgument when missing, a symlink or not a directory;
 *   the classified kind for any other failure to stat it
 */
export async function ensureValidRoot(dirPath: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fsp.lstat(dirPath);
  } catch (err) {
    if (classifyError(err) === "NotFound") {
      throw new DedupError(`Directory does not exist: ${dirPath}`, "InvalidArgument", dirPath, { cause: err });
    }
    throw toDedupError(err, dirPath);
  }

  if (stats.isSymbolicLink()) {
    throw new DedupError(`Refusing to follow a symbolic link as the root directory: ${dirPath}`, "InvalidArgument", dirPath);
  }

  if (!stats.isDirectory()) {
    throw new DedupError(`Path is not a directory: ${dirPath}`, "InvalidArgument", dirPath);
  }
}

function emptySummary(): ScanSummary {
  return { processedFiles: 0, skippedSymlinks: 0, errors: 0 };
}

/**
 * Walks a directory tree and produces a FileRecord for every in-scope regular file.
 *
 * Records are produced lazily, so a consumer can stop early with `break` and
 * the rest of the tree is never visited. Each call to `scan()` starts a fresh
 * walk with zeroed counters.
 *
 * Symlinks are counted and never followed. Per-entry failures (permission
 * denied, a file vanishing between listing and stat) are counted and logged,
 * and the walk continues; only failing to open the root aborts the scan.
 */
export class DirectoryScanner {
  readonly root: string;
  private readonly filter: FileFilter;
  private readonly progress?: ProgressReporter;
  private readonly logger: Logger;
  private counters: ScanSummary = emptySummary();
  private estimatedTotal = 0;
  private lastProgressAt = 0;

  constructor(root: string, options: ScanOptions = {}) {
    this.root = path.resolve(root);
    this.filter = options.filter ?? new FileFilter();
    this.progress = options.progress;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Counters of the current (or last) scan */
  summary(): ScanSummary {
    return { ...this.counters };
  }

  /**
   * Counts regular files in the directories a scan would visit. Excluded
   * directories are pruned the same way; extensions are not checked.
   */
  async estimateTotal(): Promise<number> {
    return this.countFiles(this.root);
  }

  private async countFiles(dir: string): Promise<number> {
    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.debug(`Error reading directory: ${dir}: ${errorMessage(err)}`);
      return 0;
    }

    let count = 0;
    for (const entry of entries) {
      if (entry.isFile()) {
        count++;
      } else if (entry.isDirectory() && !this.filter.isExcludedDirectory(entry.name)) {
        count += await this.countFiles(path.join(dir, entry.name));
      }
    }
    return count;
  }

  async *scan(): AsyncGenerator<FileRecord, ScanSummary, undefined> {
    await ensureValidRoot(this.root);
    this.counters = emptySummary();

    let rootEntries: fs.Dirent[];
    try {
      rootEntries = await fsp.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      throw toDedupError(err, this.root);
    }

    if (this.progress) {
      this.estimatedTotal = await this.estimateTotal();
      this.lastProgressAt = Date.now();
      this.progress.startScanning(this.estimatedTotal);
    }

    this.logger.debug(`Scanning ${this.root}`);
    yield* this.walk(this.root, rootEntries);

    const summary = this.summary();
    this.progress?.endScanning(summary);
    this.logger.info(
      `Scan of ${this.root} complete: ${summary.processedFiles} files, ` +
        `${summary.skippedSymlinks} symlinks skipped, ${summary.errors} errors`
    );
    return summary;
  }

  private async *walk(dir: string, entries: fs.Dirent[]): AsyncGenerator<FileRecord, void, undefined> {
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        this.counters.skippedSymlinks++;
        this.logger.debug(`Skipping symbolic link: ${fullPath}`);
        continue;
      }

      if (entry.isDirectory()) {
        yield* this.descend(fullPath, entry.name);
        continue;
      }

      if (!entry.isFile() && !isUnknownKind(entry)) {
        // Sockets, FIFOs and devices are not candidates.
        continue;
      }

      if (entry.isFile() && !this.filter.shouldInclude(fullPath)) {
        continue;
      }

      const record = await this.statFile(fullPath);
      if (record === "directory") {
        yield* this.descend(fullPath, entry.name);
        continue;
      }
      if (record === null) {
        continue;
      }

      this.counters.processedFiles++;
      this.reportProgress(dir);
      yield record;
    }
  }

  private async *descend(dirPath: string, name: string): AsyncGenerator<FileRecord, void, undefined> {
    // Prune excluded directories; nothing below them could pass the filter.
    if (this.filter.isExcludedDirectory(name)) {
      this.logger.debug(`Skipping excluded directory: ${dirPath}`);
      return;
    }

    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      this.counters.errors++;
      this.logger.warn(`Error reading directory: ${dirPath}: ${errorMessage(err)}`);
      return;
    }

    yield* this.walk(dirPath, entries);
  }

  private async statFile(filePath: string): Promise<FileRecord | "directory" | null> {
    let stats: fs.Stats;
    try {
      stats = await fsp.lstat(filePath);
    } catch (err) {
      this.counters.errors++;
      this.logger.warn(`Error stating file: ${filePath}: ${errorMessage(err)}`);
      return null;
    }

    if (stats.isSymbolicLink()) {
      this.counters.skippedSymlinks++;
      return null;
    }
    if (stats.isDirectory()) {
      return "directory";
    }
    if (!stats.isFile() || !this.filter.shouldInclude(filePath)) {
      return null;
    }

    return {
      path: filePath,
      size: stats.size,
      mtime: stats.mtimeMs / 1000,
      isSymlink: false,
    };
  }

  private reportProgress(currentDir: string): void {
    if (!this.progress) {
      return;
    }

    const now = Date.now();
    const byCount = this.counters.processedFiles % PROGRESS_FILE_INTERVAL === 0;
    const byTime = now - this.lastProgressAt >= PROGRESS_TIME_INTERVAL_MS;
    if (!byCount && !byTime) {
      return;
    }

    this.lastProgressAt = now;
    const relative = path.relative(this.root, currentDir) || ".";
    this.progress.updateScanning(this.counters.processedFiles, this.estimatedTotal, relative);
  }
}

/** Some filesystems report no entry type; those need an lstat to classify. */
function isUnknownKind(entry: fs.Dirent): boolean {
  return (
    !entry.isFile() &&
    !entry.isDirectory() &&
    !entry.isSymbolicLink() &&
    !entry.isFIFO() &&
    !entry.isSocket() &&
    !entry.isBlockDevice() &&
    !entry.isCharacterDevice()
  );
}

/**
 * Convenience wrapper that drains a scan into an array together with its summary.
 */
export async function collectRecords(
  root: string,
  options: ScanOptions = {}
): Promise<{ records: FileRecord[]; summary: ScanSummary }> {
  const scanner = new DirectoryScanner(root, options);
  const records: FileRecord[] = [];
  for await (const record of scanner.scan()) {
    records.push(record);
  }
  return { records, summary: scanner.summary() };
}
