import chalk from "chalk";
import type { Decision, DedupStats, DeletionSummary, ScanSummary } from "./types";

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte count with two decimals.
 *
 * @example
 * formatBytes(1536); // "1.50 KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

export function renderPlan(decisions: readonly Decision[]): string {
  if (decisions.length === 0) {
    return "No duplicates found.\n";
  }

  let out = "";
  decisions.forEach((decision, i) => {
    out += `[${i + 1}] ${chalk.dim(decision.digest.slice(0, 16))}\n`;
    out += `    ${chalk.green("KEEP")}   ${decision.keep}\n`;
    for (const filePath of decision.delete) {
      out += `    ${chalk.red("DELETE")} ${filePath}\n`;
    }
    out += "\n";
  });
  return out;
}

export function renderStats(stats: DedupStats, scan: ScanSummary, hashErrors: number): string {
  return [
    `Files scanned:     ${stats.filesScanned}`,
    `Symlinks skipped:  ${scan.skippedSymlinks}`,
    `Scan errors:       ${scan.errors}`,
    `Hash errors:       ${hashErrors}`,
    `Duplicate groups:  ${stats.duplicateGroups}`,
    `Duplicate files:   ${stats.duplicateFiles}`,
    `Files to delete:   ${stats.filesToDelete}`,
    `Space to recover:  ${formatBytes(stats.bytesToRecover)}`,
  ].join("\n") + "\n";
}

export function renderDeletion(summary: DeletionSummary, dryRun: boolean): string {
  let out = "";
  for (const result of summary.results) {
    if (!result.success) {
      out += `${chalk.red("FAILED")} ${result.path}: ${result.error?.message ?? "unknown error"}\n`;
    }
  }
  const verb = dryRun ? "Would move" : "Moved";
  out += `${verb} ${summary.successCount} files to trash, ${summary.failureCount} failed.\n`;
  return out;
}
