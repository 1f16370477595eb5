/** Errors raised by the loader, calculator and writer. */

export class NumstatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input path is missing, unreadable, or not a regular file. */
export class FileAccessError extends NumstatError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`cannot read input file ${path}: ${reason}`, options);
    this.path = path;
  }
}

/** Results file could not be opened or appended to. */
export class OutputWriteError extends NumstatError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`cannot append results to ${path}: ${reason}`, options);
    this.path = path;
  }
}

export class EmptySampleError extends NumstatError {
  constructor() {
    super("cannot compute statistics of an empty sample set");
  }
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Readable reason for a failed filesystem call. Known errno codes get a
 * short phrase; anything else falls back to the error message.
 */
export function describeFsError(err: unknown): string {
  switch (errnoCode(err)) {
    case "ENOENT":
      return "no such file or directory";
    case "EACCES":
    case "EPERM":
      return "permission denied";
    case "EISDIR":
      return "is a directory";
    case "ENOTDIR":
      return "a path component is not a directory";
    case "EROFS":
      return "read-only file system";
    case "ENOSPC":
      return "no space left on device";
  }
  return err instanceof Error ? err.message : String(err);
}
