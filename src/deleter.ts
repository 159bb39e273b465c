import fs from "fs";
import { DedupError, classifyError, errorMessage, toDedupError } from "./errors";
import { defaultLogger, type Logger } from "./logger";
import { createSystemTrash, type TrashBin } from "./trash";
import type { Decision, DeletionOutcome, DeletionSummary } from "./types";

const fsp = fs.promises;

export interface DeleterOptions {
  /** Report what would happen without touching the filesystem */
  dryRun?: boolean;
  /** Where live deletions go; the user's system trash by default */
  trash?: TrashBin;
  logger?: Logger;
}

function failure(filePath: string, err: DedupError): DeletionOutcome {
  return { path: filePath, success: false, error: { kind: err.kind, message: err.message } };
}

/**
 * Flattens the delete lists of a set of decisions, in order.
 */
export function pathsToDelete(decisions: readonly Decision[]): string[] {
  return decisions.flatMap((decision) => decision.delete);
}

/**
 * Moves non-surviving duplicates to the trash, or simulates it in dry-run mode.
 *
 * Files are never unlinked. Each file is re-checked right before acting,
 * and one failure never stops the rest of a batch.
 */
export class Deleter {
  readonly dryRun: boolean;
  private trash?: TrashBin;
  private readonly logger: Logger;

  constructor(options: DeleterOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.trash = options.trash;
    this.logger = options.logger ?? defaultLogger;
  }

  async deleteFile(filePath: string): Promise<DeletionOutcome> {
    let stats: fs.Stats;
    try {
      stats = await fsp.lstat(filePath);
    } catch (err) {
      const error = toDedupError(err, filePath);
      this.logger.warn(error.message);
      return failure(filePath, error);
    }

    if (!stats.isFile()) {
      const error = new DedupError(`Path is not a regular file: ${filePath}`, "PathKindMismatch", filePath);
      this.logger.warn(error.message);
      return failure(filePath, error);
    }

    if (this.dryRun) {
      this.logger.debug(`Dry run: would move to trash: ${filePath}`);
      return { path: filePath, success: true };
    }

    try {
      const trashed = await this.trashBin().moveToTrash(filePath);
      this.logger.info(`Moved to trash: ${filePath} -> ${trashed}`);
      return { path: filePath, success: true };
    } catch (err) {
      const kind = classifyError(err) === "PermissionDenied" ? "PermissionDenied" : "GenericIOFailure";
      const message =
        kind === "PermissionDenied"
          ? `Permission denied: ${filePath}: ${errorMessage(err)}`
          : `Failed to move to trash: ${filePath}: ${errorMessage(err)}`;
      this.logger.warn(message);
      return failure(filePath, new DedupError(message, kind, filePath, { cause: err }));
    }
  }

  /** Deletes each path in turn; one outcome per path, in input order. */
  async deleteFiles(filePaths: readonly string[]): Promise<DeletionOutcome[]> {
    const results: DeletionOutcome[] = [];
    for (const filePath of filePaths) {
      results.push(await this.deleteFile(filePath));
    }
    return results;
  }

  /**
   * Deletes every `delete` path of every decision. A path that some decision
   * keeps is refused rather than deleted.
   */
  async deleteDecisions(decisions: readonly Decision[]): Promise<DeletionSummary> {
    const kept = new Set(decisions.map((decision) => decision.keep));
    const results: DeletionOutcome[] = [];

    for (const filePath of pathsToDelete(decisions)) {
      if (kept.has(filePath)) {
        const error = new DedupError(`Refusing to delete a file marked to keep: ${filePath}`, "InvalidArgument", filePath);
        this.logger.warn(error.message);
        results.push(failure(filePath, error));
        continue;
      }
      results.push(await this.deleteFile(filePath));
    }

    const successCount = results.filter((r) => r.success).length;
    return { successCount, failureCount: results.length - successCount, results };
  }

  /** Paths `deleteDecisions` would act on. No side effects. */
  preview(decisions: readonly Decision[]): string[] {
    return pathsToDelete(decisions);
  }

  private trashBin(): TrashBin {
    if (!this.trash) {
      this.trash = createSystemTrash();
    }
    return this.trash;
  }
}
