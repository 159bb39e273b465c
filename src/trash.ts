import os from "os";
import path from "path";
import fse from "fs-extra";

/**
 * Somewhere files can be moved to and later restored from.
 */
export interface TrashBin {
  /** Moves the file away and resolves with its new location. */
  moveToTrash(filePath: string): Promise<string>;
}

export type TrashLayout = "freedesktop" | "flat";

export interface DirectoryTrashOptions {
  /**
   * "freedesktop": files go to `<dir>/files` with a `<dir>/info/*.trashinfo`
   * record each, which desktop file managers use to restore them.
   * "flat": files go straight into `<dir>` (the macOS ~/.Trash layout).
   */
  layout?: TrashLayout;
  now?: () => Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDeletionDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function trashInfoContent(originalPath: string, deletedAt: Date): string {
  const encoded = originalPath.split(path.sep).map(encodeURIComponent).join("/");
  return `[Trash Info]\nPath=${encoded}\nDeletionDate=${formatDeletionDate(deletedAt)}\n`;
}

export class DirectoryTrash implements TrashBin {
  readonly layout: TrashLayout;
  private readonly now: () => Date;

  constructor(
    readonly directory: string,
    options: DirectoryTrashOptions = {}
  ) {
    this.layout = options.layout ?? "freedesktop";
    this.now = options.now ?? (() => new Date());
  }

  get filesDirectory(): string {
    return this.layout === "freedesktop" ? path.join(this.directory, "files") : this.directory;
  }

  get infoDirectory(): string {
    return path.join(this.directory, "info");
  }

  async moveToTrash(filePath: string): Promise<string> {
    const source = path.resolve(filePath);
    await fse.ensureDir(this.filesDirectory);
    if (this.layout === "freedesktop") {
      await fse.ensureDir(this.infoDirectory);
    }

    const name = await this.freeName(path.basename(source));
    const target = path.join(this.filesDirectory, name);

    if (this.layout === "flat") {
      await fse.move(source, target, { overwrite: false });
      return target;
    }

    // The info record is written first; it is what marks the name as taken.
    const infoPath = path.join(this.infoDirectory, `${name}.trashinfo`);
    await fse.writeFile(infoPath, trashInfoContent(source, this.now()), { flag: "wx" });
    try {
      await fse.move(source, target, { overwrite: false });
    } catch (err) {
      await fse.remove(infoPath);
      throw err;
    }
    return target;
  }

  private async freeName(baseName: string): Promise<string> {
    const ext = path.extname(baseName);
    const stem = baseName.slice(0, baseName.length - ext.length);

    for (let n = 1; ; n++) {
      const candidate = n === 1 ? baseName : `${stem} (${n})${ext}`;
      const taken =
        (await fse.pathExists(path.join(this.filesDirectory, candidate))) ||
        (this.layout === "freedesktop" &&
          (await fse.pathExists(path.join(this.infoDirectory, `${candidate}.trashinfo`))));
      if (!taken) {
        return candidate;
      }
    }
  }
}

/**
 * The current user's trash: ~/.Trash on macOS, the XDG home trash elsewhere.
 */
export function createSystemTrash(env: NodeJS.ProcessEnv = process.env): DirectoryTrash {
  const home = os.homedir();

  if (process.platform === "darwin") {
    return new DirectoryTrash(path.join(home, ".Trash"), { layout: "flat" });
  }

  const dataHome = env.XDG_DATA_HOME && path.isAbsolute(env.XDG_DATA_HOME)
    ? env.XDG_DATA_HOME
    : path.join(home, ".local", "share");
  return new DirectoryTrash(path.join(dataHome, "Trash"), { layout: "freedesktop" });
}
