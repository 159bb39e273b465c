import crypto from "crypto";
import fs from "fs";
import { CHUNK_SIZE_BYTES, CHUNK_THRESHOLD_BYTES, HASH_CONCURRENCY } from "./config";
import { DedupError, classifyError, toDedupError } from "./errors";
import { defaultLogger, type Logger } from "./logger";
import type {
  DuplicateGroup,
  DuplicateSearchResult,
  FileRecord,
  HashFailure,
  MappedResult,
  ProgressObserver,
} from "./types";

const fsp = fs.promises;

export interface ReadStrategyOptions {
  /** Files above this many bytes are streamed in chunks */
  chunkThreshold?: number;
  chunkSize?: number;
}

/**
 * Path → digest memo for one scanning session.
 *
 * Entries are never revalidated: a hit returns the stored digest even when
 * the file has changed since. Create a new cache for every session.
 */
export class HashCache {
  private readonly entries = new Map<string, string>();

  get(filePath: string): string | undefined {
    return this.entries.get(filePath);
  }

  set(filePath: string, digest: string): void {
    this.entries.set(filePath, digest);
  }

  has(filePath: string): boolean {
    return this.entries.has(filePath);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Streams file contents into a SHA-256 hash in fixed-size chunks, so memory
 * use does not grow with the file.
 */
export function hashStream(filePath: string, chunkSize: number = CHUNK_SIZE_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

    stream.on("error", reject);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}

export function hashBuffer(content: Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

async function statRegularFile(filePath: string): Promise<fs.Stats> {
  let stats: fs.Stats;
  try {
    stats = await fsp.stat(filePath);
  } catch (err) {
    throw toDedupError(err, filePath);
  }

  if (!stats.isFile()) {
    throw new DedupError(`Path is not a regular file: ${filePath}`, "PathKindMismatch", filePath);
  }
  return stats;
}

async function hashContent(filePath: string, size: number, options: ReadStrategyOptions): Promise<string> {
  const threshold = options.chunkThreshold ?? CHUNK_THRESHOLD_BYTES;
  try {
    if (size > threshold) {
      return await hashStream(filePath, options.chunkSize ?? CHUNK_SIZE_BYTES);
    }
    return hashBuffer(await fsp.readFile(filePath));
  } catch (err) {
    throw toDedupError(err, filePath);
  }
}

/**
 * Computes the SHA-256 of a file's bytes as 64 lowercase hex characters.
 *
 * Files up to 10 MiB are read whole; larger ones are streamed in 4 MiB
 * chunks. Both paths give the same digest for the same bytes.
 *
 * @throws DedupError - NotFound, PathKindMismatch, PermissionDenied or GenericIOFailure
 *
 * @example
 * const hash = await hashFile('/path/to/file.txt');
 * console.log(hash); // "3a7bd3e2360a3d29eea436fcfb7e44c735d117c42d1c1835420b6b9942dd4f1b"
 */
export async function hashFile(filePath: string, options: ReadStrategyOptions = {}): Promise<string> {
  const stats = await statRegularFile(filePath);
  return hashContent(filePath, stats.size, options);
}

/**
 * Maps items through an async function with controlled concurrency.
 *
 * Errors are captured and returned rather than thrown, allowing partial
 * results. Results keep the order of `items`; `onProgress` receives a
 * completion count shared by all workers, so it never goes backwards even
 * when items finish out of order.
 *
 * @example
 * const { results, errors } = await mapWithConcurrency(
 *   files,
 *   4,
 *   async (file) => hashFile(file),
 *   (completed, file) => console.log(`Progress: ${completed}`)
 * );
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T) => Promise<R | null>,
  onProgress?: (completed: number, item: T) => void
): Promise<MappedResult<T, R>> {
  const results: (R | null)[] = new Array<R | null>(items.length).fill(null);
  const errors: MappedResult<T, R>["errors"] = [];
  let index = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        return;
      }

      const item = items[current];
      try {
        results[current] = await mapper(item);
      } catch (err) {
        results[current] = null;
        errors.push({
          index: current,
          item,
          error: err instanceof Error ? err : new Error(String(err)),
        });
      }

      completed++;
      onProgress?.(completed, item);
    }
  }

  const workers = Array.from({ length: Math.max(1, limit) }, () => worker());
  await Promise.all(workers);
  return { results, errors };
}

/**
 * Buckets records by exact byte size, keeping encounter order within a bucket.
 */
export async function groupBySize(
  records: Iterable<FileRecord> | AsyncIterable<FileRecord>
): Promise<Map<number, FileRecord[]>> {
  const sizeGroups = new Map<number, FileRecord[]>();

  for await (const record of records) {
    const group = sizeGroups.get(record.size);
    if (group) {
      group.push(record);
    } else {
      sizeGroups.set(record.size, [record]);
    }
  }

  return sizeGroups;
}

export interface HashEngineOptions extends ReadStrategyOptions {
  /** Session cache; a fresh one is created when omitted */
  cache?: HashCache;
  /** Parallel hash workers (default HASH_CONCURRENCY) */
  concurrency?: number;
  logger?: Logger;
}

export interface FindDuplicatesOptions {
  /** Called once size bucketing is done, with the number of files to hash */
  onCandidates?: (count: number) => void;
  /** Receives floor(completed / candidates * 100) after every candidate */
  onProgress?: ProgressObserver;
}

/**
 * Content fingerprinting and duplicate grouping for one scanning session.
 */
export class HashEngine {
  readonly cache: HashCache;
  private readonly concurrency: number;
  private readonly readOptions: ReadStrategyOptions;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(options: HashEngineOptions = {}) {
    this.cache = options.cache ?? new HashCache();
    this.concurrency = options.concurrency ?? HASH_CONCURRENCY;
    this.readOptions = { chunkThreshold: options.chunkThreshold, chunkSize: options.chunkSize };
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Digest of a file's content. The file must still exist as a regular file;
   * after that check a cached digest is returned without re-reading.
   */
  async digest(filePath: string): Promise<string> {
    const stats = await statRegularFile(filePath);

    const cached = this.cache.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    // One computation per path, however many callers ask at once.
    const pending = this.inFlight.get(filePath);
    if (pending) {
      return pending;
    }

    const work = hashContent(filePath, stats.size, this.readOptions)
      .then((digest) => {
        this.cache.set(filePath, digest);
        return digest;
      })
      .finally(() => {
        this.inFlight.delete(filePath);
      });
    this.inFlight.set(filePath, work);
    return work;
  }

  /**
   * Finds groups of files with identical content.
   *
   * Process:
   * 1. Bucket records by size; a file can only duplicate one of the same size
   * 2. Drop single-member buckets without hashing them
   * 3. Hash every member of the remaining buckets
   * 4. Keep digests shared by at least two files
   *
   * Files that fail to hash are logged, left out of every group and reported
   * in `errors`.
   */
  async findDuplicates(
    records: Iterable<FileRecord> | AsyncIterable<FileRecord>,
    options: FindDuplicatesOptions = {}
  ): Promise<DuplicateSearchResult> {
    const sizeGroups = await groupBySize(records);

    const candidates: FileRecord[] = [];
    for (const bucket of sizeGroups.values()) {
      if (bucket.length >= 2) {
        candidates.push(...bucket);
      }
    }

    const total = candidates.length;
    const { onProgress } = options;
    options.onCandidates?.(total);

    const hashing = await mapWithConcurrency(
      candidates,
      this.concurrency,
      (record) => this.digest(record.path),
      onProgress ? (completed) => onProgress(Math.floor((completed / total) * 100)) : undefined
    );

    const errors: HashFailure[] = hashing.errors.map((e) => {
      this.logger.warn(`Error hashing file: ${e.item.path}: ${e.error.message}`);
      return { path: e.item.path, kind: classifyError(e.error), message: e.error.message };
    });

    const byDigest = new Map<string, FileRecord[]>();
    candidates.forEach((record, i) => {
      const digest = hashing.results[i];
      if (digest === null || digest === undefined) {
        return;
      }
      const members = byDigest.get(digest);
      if (members) {
        members.push(record);
      } else {
        byDigest.set(digest, [record]);
      }
    });

    const groups = new Map<string, DuplicateGroup>();
    for (const [digest, members] of byDigest) {
      if (members.length >= 2) {
        groups.set(digest, { digest, members });
      }
    }

    this.logger.debug(
      `Hashed ${total - errors.length}/${total} candidates, ${groups.size} duplicate groups`
    );

    return { groups, candidates: total, hashed: total - errors.length, errors };
  }

  clearCache(): void {
    this.cache.clear();
  }
}
