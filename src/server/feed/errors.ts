/**
 * Errors raised to callers.
 *
 * Malformed input never raises. The only failure forwarded as an exception
 * is a local source that cannot be read at all.
 */

/**
 * Error thrown when a local feed source cannot be read.
 */
export class FeedSourceError extends Error {
  constructor(
    public readonly path: string,
    public readonly code: string,
    cause?: unknown
  ) {
    super(
      code === "ENOENT" ? `Feed source not found: ${path}` : `Cannot read feed source ${path}`,
      { cause }
    );
    this.name = "FeedSourceError";
  }

  /**
   * Check if this error means the path does not exist.
   */
  isNotFound(): boolean {
    return this.code === "ENOENT";
  }
}
