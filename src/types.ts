import type { ErrorKind } from "./errors";

/**
 * Metadata for one regular file found during a scan.
 */
export interface FileRecord {
  /** Absolute path to the file */
  readonly path: string;
  /** Size in bytes */
  readonly size: number;
  /** Last modification time in seconds since the epoch (fractional) */
  readonly mtime: number;
  readonly isSymlink: boolean;
}

/**
 * Files that share a content digest. Every member has the same size.
 */
export interface DuplicateGroup {
  /** Hex-encoded SHA-256 of the shared content (64 characters) */
  readonly digest: string;
  readonly members: readonly FileRecord[];
}

/**
 * Which member of a duplicate group survives and which ones go.
 */
export interface Decision {
  readonly digest: string;
  readonly keep: string;
  readonly delete: readonly string[];
}

/**
 * Error attached to a failed per-file operation.
 */
export interface FailureInfo {
  kind: ErrorKind;
  message: string;
}

/**
 * Result of one attempted deletion.
 */
export interface DeletionOutcome {
  readonly path: string;
  readonly success: boolean;
  readonly error?: FailureInfo;
}

/**
 * Aggregate result of deleting every non-survivor of a set of decisions.
 */
export interface DeletionSummary {
  successCount: number;
  failureCount: number;
  results: DeletionOutcome[];
}

/**
 * Counters collected while walking a directory tree.
 */
export interface ScanSummary {
  /** Regular files emitted as records */
  processedFiles: number;
  /** Symbolic links found and not followed */
  skippedSymlinks: number;
  /** Entries that could not be listed or stat'ed */
  errors: number;
}

/**
 * A file that could not be hashed.
 */
export interface HashFailure extends FailureInfo {
  path: string;
}

/**
 * Outcome of duplicate detection over a set of records.
 */
export interface DuplicateSearchResult {
  /** Duplicate groups keyed by digest; only digests shared by two or more files */
  groups: Map<string, DuplicateGroup>;
  /** Records that shared their size with at least one other record */
  candidates: number;
  /** Candidates hashed successfully */
  hashed: number;
  errors: HashFailure[];
}

/**
 * Statistics about a resolved duplicate scan.
 */
export interface DedupStats {
  /** Total number of records produced by the scanner */
  filesScanned: number;
  /** Number of duplicate groups found */
  duplicateGroups: number;
  /** Total number of files in duplicate groups, survivors included */
  duplicateFiles: number;
  /** Files marked for deletion */
  filesToDelete: number;
  /** Bytes freed once every marked file is removed */
  bytesToRecover: number;
}

/**
 * Called with a whole-number percentage (0-100) as hashing advances.
 */
export type ProgressObserver = (percent: number) => void;

/**
 * Result of mapping items with concurrency, including both successes and errors.
 */
export interface MappedResult<T, R> {
  /** Array of results (null for failed items) */
  results: (R | null)[];
  /** Array of errors that occurred during mapping */
  errors: Array<{
    /** Index of the item that failed */
    index: number;
    /** The item that failed */
    item: T;
    /** The error that occurred */
    error: Error;
  }>;
}
