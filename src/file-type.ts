export const FILE_CATEGORIES = ["text", "audio", "video", "archive"] as const;

/** Known category, or "unknown" for anything outside the taxonomy. */
export type FileCategory = (typeof FILE_CATEGORIES)[number] | "unknown";

const EXTENSION_CATEGORIES: ReadonlyMap<string, FileCategory> = new Map<string, FileCategory>([
  ["txt", "text"],
  ["md", "text"],
  ["rtf", "text"],
  ["doc", "text"],
  ["docx", "text"],
  ["pdf", "text"],
  ["mp3", "audio"],
  ["m4a", "audio"],
  ["wav", "audio"],
  ["aac", "audio"],
  ["flac", "audio"],
  ["mp4", "video"],
  ["mov", "video"],
  ["avi", "video"],
  ["mkv", "video"],
  ["webm", "video"],
  ["zip", "archive"],
  ["rar", "archive"],
  ["7z", "archive"],
  ["tar", "archive"],
  ["gz", "archive"],
  ["bz2", "archive"],
  ["dmg", "archive"],
  ["pkg", "archive"],
]);

function normalizeExtension(extension: string): string {
  return (extension.startsWith(".") ? extension.slice(1) : extension).toLowerCase();
}

/**
 * Looks up the category of an extension, with or without its leading dot.
 * Matching is case-insensitive.
 *
 * @example
 * getFileCategory(".PDF"); // "text"
 * getFileCategory("xyz");  // "unknown"
 */
export function getFileCategory(extension: string): FileCategory {
  return EXTENSION_CATEGORIES.get(normalizeExtension(extension)) ?? "unknown";
}

export function isSupportedExtension(extension: string): boolean {
  return getFileCategory(extension) !== "unknown";
}

/**
 * Dotted extensions belonging to a category, sorted. Empty for "unknown".
 */
export function extensionsFor(category: FileCategory): string[] {
  if (category === "unknown") {
    return [];
  }

  const extensions: string[] = [];
  for (const [ext, cat] of EXTENSION_CATEGORIES) {
    if (cat === category) {
      extensions.push(`.${ext}`);
    }
  }
  return extensions.sort();
}
