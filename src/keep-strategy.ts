import type { TieBreak } from "./config";
import { DedupError } from "./errors";
import type { Decision, DuplicateGroup, FileRecord } from "./types";

export interface KeepStrategyOptions {
  /**
   * "encounter" (default): members tied on mtime and path length keep their
   * original order. "path": such ties are broken by comparing the paths.
   */
  tieBreak?: TieBreak;
}

/**
 * Ranks two members: newest mtime first, then shorter path first.
 */
export function compareForKeep(a: FileRecord, b: FileRecord): number {
  if (a.mtime !== b.mtime) {
    return b.mtime - a.mtime;
  }
  return a.path.length - b.path.length;
}

function compareByPath(a: FileRecord, b: FileRecord): number {
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

/**
 * Picks exactly one survivor per duplicate group.
 *
 * Members are sorted by modification time (newest first), then by path
 * length (shortest first). The sort is stable. The head is kept; everything
 * after it is marked for deletion in sorted order.
 */
export class KeepStrategy {
  private readonly tieBreak: TieBreak;

  constructor(options: KeepStrategyOptions = {}) {
    this.tieBreak = options.tieBreak ?? "encounter";
  }

  /**
   * @throws DedupError (InvalidArgument) for a group without members
   */
  decide(group: DuplicateGroup): Decision {
    if (group.members.length === 0) {
      throw new DedupError(`Duplicate group ${group.digest} has no members`, "InvalidArgument");
    }

    const ranked = [...group.members].sort((a, b) => {
      const primary = compareForKeep(a, b);
      if (primary !== 0 || this.tieBreak === "encounter") {
        return primary;
      }
      return compareByPath(a, b);
    });

    const [head, ...rest] = ranked;
    return {
      digest: group.digest,
      keep: head.path,
      delete: rest.map((record) => record.path),
    };
  }

  decideAll(groups: Iterable<DuplicateGroup>): Decision[] {
    const decisions: Decision[] = [];
    for (const group of groups) {
      decisions.push(this.decide(group));
    }
    return decisions;
  }
}
