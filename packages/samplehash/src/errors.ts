/**
 * Error kinds thrown by samplehash.
 *
 * @module
 */

/**
 * Invalid hasher configuration (`sampleSize` / `threshold` not a positive
 * integer) or an input length outside `[0, 2^64 - 1]`.
 */
export class ConfigurationError extends RangeError {
  public override readonly name = "ConfigurationError";
}

/** Options for the {@link IOError} constructor. */
export interface IOErrorOptions {
  /** The file the failing operation was acting on, if any. */
  path?: string | undefined;
  /** The underlying OS error. */
  cause?: unknown;
}

/** Extract `code` (e.g. `"ENOENT"`) from a Node.js system error. */
function errorCode(cause: unknown): string | undefined {
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

/**
 * A file could not be opened, its length could not be determined, or a read
 * failed partway. The OS error, when there is one, is available as `cause`.
 */
export class IOError extends Error {
  public override readonly name = "IOError";

  /** Path of the file involved, `undefined` for in-memory sources. */
  public readonly path: string | undefined;

  /** OS error code of the cause, e.g. `"ENOENT"` or `"EACCES"`. */
  public readonly code: string | undefined;

  public constructor(message: string, options?: IOErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.path = options?.path;
    this.code = errorCode(options?.cause);
  }
}
