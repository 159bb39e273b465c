import path from "path";
import ignore, { type Ignore } from "ignore";
import { DEFAULT_EXCLUDE_PATTERNS } from "./config";
import { extensionsFor, type FileCategory } from "./file-type";

export interface FileFilterOptions {
  /** Categories whose extensions are allowed; empty or absent allows every extension */
  categories?: FileCategory[];
  /** Directory name patterns to exclude; replaces the defaults when given */
  excludePatterns?: string[];
  /** Apply DEFAULT_EXCLUDE_PATTERNS when no explicit patterns are given (default true) */
  useDefaultExcludes?: boolean;
}

/**
 * Decides whether a file is in scope for duplicate detection.
 *
 * Two independent tests:
 * 1. Extension allow-list built from file categories (case-insensitive).
 * 2. Directory exclusion: every ancestor directory name is matched against
 *    glob patterns (case-sensitive, gitignore-style, `!` negates). One match
 *    excludes the file whatever its extension.
 *
 * The filter holds no per-scan state and can be shared between scans.
 */
export class FileFilter {
  private readonly allowedExtensions = new Set<string>();
  private readonly patterns: string[];
  private matcher: Ignore;

  constructor(options: FileFilterOptions = {}) {
    this.setCategories(options.categories ?? []);

    if (options.excludePatterns !== undefined) {
      this.patterns = [...options.excludePatterns];
    } else if (options.useDefaultExcludes ?? true) {
      this.patterns = [...DEFAULT_EXCLUDE_PATTERNS];
    } else {
      this.patterns = [];
    }

    this.matcher = buildMatcher(this.patterns);
  }

  /**
   * @param filePath - Path of the candidate file; every ancestor directory
   *   name is matched, including those above a scan root
   */
  shouldInclude(filePath: string): boolean {
    if (this.allowedExtensions.size > 0) {
      const ext = path.extname(filePath).toLowerCase();
      if (!this.allowedExtensions.has(ext)) {
        return false;
      }
    }

    return !ancestorNames(filePath).some((name) => this.isExcludedDirectory(name));
  }

  /** Tests a single directory name against the exclusion patterns. */
  isExcludedDirectory(name: string): boolean {
    if (this.patterns.length === 0 || name === "" || name === "." || name === "..") {
      return false;
    }
    // Trailing slash gives the name directory semantics, so "build/" patterns match too.
    return this.matcher.ignores(`${name}/`);
  }

  filterPaths(filePaths: readonly string[]): string[] {
    return filePaths.filter((filePath) => this.shouldInclude(filePath));
  }

  addExcludePattern(pattern: string): void {
    this.patterns.push(pattern);
    this.matcher = buildMatcher(this.patterns);
  }

  setCategories(categories: readonly FileCategory[]): void {
    this.allowedExtensions.clear();
    for (const category of categories) {
      for (const ext of extensionsFor(category)) {
        this.allowedExtensions.add(ext);
      }
    }
  }

  getExcludePatterns(): string[] {
    return [...this.patterns];
  }

  isActive(): boolean {
    return this.allowedExtensions.size > 0 || this.patterns.length > 0;
  }
}

// Names such as "..." are valid directory names but not relative paths to `ignore`.
function buildMatcher(patterns: readonly string[]): Ignore {
  return ignore({ ignorecase: false, allowRelativePaths: true }).add([...patterns]);
}

function ancestorNames(filePath: string): string[] {
  const names: string[] = [];
  let current = path.dirname(path.resolve(filePath));
  while (path.dirname(current) !== current) {
    names.push(path.basename(current));
    current = path.dirname(current);
  }
  return names;
}
