import { resolveConfig, type DedupConfigInput } from "./config";
import { FileFilter } from "./filter";
import { HashCache, HashEngine } from "./hash";
import { KeepStrategy } from "./keep-strategy";
import { defaultLogger, type Logger } from "./logger";
import type { ProgressReporter } from "./progress";
import { DirectoryScanner } from "./scan";
import type { Decision, DedupStats, DuplicateGroup, HashFailure, ScanSummary } from "./types";

export interface PipelineOptions extends DedupConfigInput {
  progress?: ProgressReporter;
  logger?: Logger;
}

/**
 * Complete result of scanning a tree and resolving its duplicates.
 */
export interface PipelineResult {
  scan: ScanSummary;
  groups: Map<string, DuplicateGroup>;
  decisions: Decision[];
  hashErrors: HashFailure[];
  stats: DedupStats;
}

/**
 * Summarises a set of decisions.
 *
 * Recoverable bytes are the group size times the number of files marked for
 * deletion, taken from the scan records without touching the disk again.
 */
export function calculateStats(
  decisions: readonly Decision[],
  groups: ReadonlyMap<string, DuplicateGroup>,
  filesScanned: number
): DedupStats {
  const stats: DedupStats = {
    filesScanned,
    duplicateGroups: decisions.length,
    duplicateFiles: 0,
    filesToDelete: 0,
    bytesToRecover: 0,
  };

  for (const decision of decisions) {
    stats.duplicateFiles += decision.delete.length + 1;
    stats.filesToDelete += decision.delete.length;

    const size = groups.get(decision.digest)?.members[0]?.size ?? 0;
    stats.bytesToRecover += size * decision.delete.length;
  }

  return stats;
}

/**
 * Scans a directory, finds duplicate files and decides which copy of each to keep.
 *
 * Process:
 * 1. Walk the tree through the configured filter
 * 2. Bucket by size and hash only files that share a size
 * 3. Group by digest and pick one survivor per group
 *
 * Every run uses its own hash cache. Nothing is deleted here; hand the
 * decisions to a Deleter.
 *
 * @example
 * const result = await findDuplicateDecisions('/path/to/scan', { categories: ['text'] });
 * console.log(`Found ${result.stats.duplicateGroups} duplicate groups`);
 */
export async function findDuplicateDecisions(
  rootDir: string,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { progress, logger = defaultLogger, ...input } = options;
  const config = resolveConfig(input);

  const filter = new FileFilter({
    categories: config.categories,
    excludePatterns: config.excludePatterns,
    useDefaultExcludes: config.useDefaultExcludes,
  });
  const scanner = new DirectoryScanner(rootDir, { filter, progress, logger });
  const engine = new HashEngine({ cache: new HashCache(), concurrency: config.concurrency, logger });

  // Size bucketing drains the whole scan before any hashing starts.
  const search = await engine.findDuplicates(scanner.scan(), {
    onCandidates: (count) => progress?.startHashing(count),
    onProgress: progress ? (percent) => progress.updateHashing(percent) : undefined,
  });
  progress?.endHashing();
  const scan = scanner.summary();

  const decisions = new KeepStrategy({ tieBreak: config.tieBreak }).decideAll(search.groups.values());
  const stats = calculateStats(decisions, search.groups, scan.processedFiles);

  logger.info(
    `Found ${stats.duplicateGroups} duplicate groups (${stats.filesToDelete} files to delete, ` +
      `${stats.bytesToRecover} bytes) in ${scan.processedFiles} files`
  );

  return { scan, groups: search.groups, decisions, hashErrors: search.errors, stats };
}
