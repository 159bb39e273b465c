import type { ScanSummary } from "./types";

/**
 * Interface for progress reporting during a duplicate scan.
 */
export interface ProgressReporter {
  /** Called when directory scanning begins, with the pre-walk estimate */
  startScanning(estimatedTotal: number): void;

  /** Called at a throttled rate while files are being scanned */
  updateScanning(processed: number, estimatedTotal: number, currentDir: string): void;

  /** Called when directory scanning completes */
  endScanning(summary: ScanSummary): void;

  /** Called when file hashing begins */
  startHashing(candidates: number): void;

  /** Called with the hashing percentage after each candidate */
  updateHashing(percent: number): void;

  /** Called when file hashing completes */
  endHashing(): void;
}

/**
 * Text progress bar, ten blocks wide.
 *
 * @example
 * renderBar(45); // "[████░░░░░░] 45%"
 */
export function renderBar(percent: number): string {
  const clamped = Math.max(0, Math.min(100, Math.floor(percent)));
  const filled = Math.floor(clamped / 10);
  return `[${"█".repeat(filled)}${"░".repeat(10 - filled)}] ${clamped}%`;
}

/**
 * Progress reporter that redraws a single stderr line.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastPercent = -1;

  startScanning(estimatedTotal: number): void {
    process.stderr.write(`Scanning (about ${estimatedTotal} files)...\n`);
  }

  updateScanning(processed: number, estimatedTotal: number, currentDir: string): void {
    const percent = estimatedTotal > 0 ? (processed / estimatedTotal) * 100 : 0;
    process.stderr.write(`\r${renderBar(percent)} Files: ${processed}/${estimatedTotal} Dir: ${currentDir}` + " ".repeat(10));
  }

  endScanning(summary: ScanSummary): void {
    process.stderr.write(
      `\rScan complete: ${summary.processedFiles} files, ` +
        `${summary.skippedSymlinks} symlinks skipped, ${summary.errors} errors` +
        " ".repeat(20) +
        "\n"
    );
  }

  startHashing(candidates: number): void {
    this.lastPercent = -1;
    process.stderr.write(`Hashing ${candidates} candidate files...\n`);
  }

  updateHashing(percent: number): void {
    // Only redraw when the whole-number percentage moves.
    if (percent === this.lastPercent) return;
    this.lastPercent = percent;
    process.stderr.write(`\r${renderBar(percent)}`);
  }

  endHashing(): void {
    process.stderr.write("\rHashing complete." + " ".repeat(20) + "\n");
  }
}

class NoOpProgressReporter implements ProgressReporter {
  startScanning(_estimatedTotal: number): void {}
  updateScanning(_processed: number, _estimatedTotal: number, _currentDir: string): void {}
  endScanning(_summary: ScanSummary): void {}
  startHashing(_candidates: number): void {}
  updateHashing(_percent: number): void {}
  endHashing(): void {}
}

/**
 * Creates a progress reporter; disabled reporters produce no output.
 */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
