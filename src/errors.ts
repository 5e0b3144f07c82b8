export type AdrErrorCode =
  | "InvalidInput"
  | "NotFound"
  | "IOFailure"
  | "ConcurrentModification";

/**
 * Base class for every failure the store reports to its caller.
 * The CLI prints `message` as a single `[ERROR]` line and exits 1.
 */
export class AdrError extends Error {
  public readonly code: AdrErrorCode;

  constructor(code: AdrErrorCode, message: string) {
    super(message);
    this.name = "AdrError";
    this.code = code;
  }
}

export class InvalidInputError extends AdrError {
  constructor(message: string) {
    super("InvalidInput", message);
    this.name = "InvalidInputError";
  }
}

export class NotFoundError extends AdrError {
  /** Record number or path that could not be found. */
  public readonly target: string;

  constructor(target: string, message = `ADR not found: ${target}`) {
    super("NotFound", message);
    this.name = "NotFoundError";
    this.target = target;
  }
}

/**
 * Wraps an OS-level filesystem error. The message keeps the OS text
 * and the one path the failed operation touched.
 */
export class IoFailureError extends AdrError {
  public readonly path: string;
  public readonly osCode?: string;

  constructor(path: string, cause: unknown) {
    const osCode = isErrnoException(cause) ? cause.code : undefined;
    const text = errorMessage(cause);
    super("IOFailure", text.includes(path) ? text : `${text} (${path})`);
    this.name = "IoFailureError";
    this.path = path;
    this.osCode = osCode;
    this.cause = cause;
  }
}

export class ConcurrentModificationError extends AdrError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(
      "ConcurrentModification",
      `Could not reserve a record number after ${attempts} attempts; another process is creating records. Try again.`,
    );
    this.name = "ConcurrentModificationError";
    this.attempts = attempts;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
