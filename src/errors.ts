export type ErrorKind =
  | "NotFound"
  | "PathKindMismatch"
  | "PermissionDenied"
  | "GenericIOFailure"
  | "InvalidArgument";

export class DedupError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DedupError";
  }

  get isNotFound(): boolean {
    return this.kind === "NotFound";
  }

  get isPermissionDenied(): boolean {
    return this.kind === "PermissionDenied";
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps a Node.js filesystem error onto an ErrorKind.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof DedupError) {
    return err.kind;
  }

  switch (errnoCode(err)) {
    case "ENOENT":
    case "ENOTDIR":
      return "NotFound";
    case "EACCES":
    case "EPERM":
      return "PermissionDenied";
    case "EISDIR":
      return "PathKindMismatch";
    default:
      return "GenericIOFailure";
  }
}

/**
 * Wraps any thrown value as a DedupError for the given path, keeping the
 * original as `cause`.
 */
export function toDedupError(err: unknown, filePath: string): DedupError {
  if (err instanceof DedupError) {
    return err;
  }

  const kind = classifyError(err);
  const prefix: Record<ErrorKind, string> = {
    NotFound: "File not found",
    PathKindMismatch: "Path is not a regular file",
    PermissionDenied: "Permission denied",
    GenericIOFailure: "I/O failure",
    InvalidArgument: "Invalid argument",
  };
  return new DedupError(`${prefix[kind]}: ${filePath}: ${errorMessage(err)}`, kind, filePath, { cause: err });
}
