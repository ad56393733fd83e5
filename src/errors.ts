/**
 * Error types raised by the scraper. Each one is fatal to the run.
 */

/** A category page could not be fetched, or answered with a non-2xx status */
export class FetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, options: { status?: number; cause?: unknown } = {}) {
    const status = options.status ?? null;
    const detail =
      status !== null ? `HTTP ${status}` : options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Request to ${url} failed: ${detail}`, { cause: options.cause });
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

/** An index page did not have the expected markup */
export class ParseError extends Error {
  /** Text of the list item that could not be parsed */
  readonly itemText: string;

  constructor(reason: string, itemText: string) {
    super(`${reason}: "${itemText}"`);
    this.name = "ParseError";
    this.itemText = itemText;
  }
}

/** The output file could not be written */
export class OutputError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not open file ${path} for writing: ${detail}`, { cause });
    this.name = "OutputError";
    this.path = path;
  }
}

/** Invalid command line arguments; reported before any request is made */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
