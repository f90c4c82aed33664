/**
 * Error reporting
 * ---------------
 * Every failure in the library (front-end parse errors, file access errors,
 * tree misuse, unsupported source values) flows through a single
 * {@link ErrorHandler}. The handler is not global state: it is bound to a
 * `DocumentTree` when the tree is constructed, and every operation on that tree
 * reports through it.
 *
 * Handler contract
 * ----------------
 * A handler is expected to transfer control away (throw). The default handler
 * throws {@link DocArenaError}. Handlers may throw their own error types, e.g.
 * to collect reports in a test or to map them onto an application error.
 *
 * If a handler returns normally, {@link reportError} throws anyway: the
 * operation that failed must not continue into a partially materialized tree.
 */

/**
 * Where an error occurred, as far as it is known.
 */
export type ErrorLocation = {
  /**
   * Filename (or other source label) supplied by the caller.
   */
  source?: string;

  /**
   * 1-based line in the source text.
   */
  line?: number;

  /**
   * 1-based column in the source text.
   */
  column?: number;
};

export type ErrorReport = {
  /**
   * Human-readable description, without the library prefix.
   */
  message: string;

  location?: ErrorLocation;
};

export type ErrorHandler = (report: ErrorReport) => void;

const ERROR_PREFIX = '[docarena]';

/**
 * Error thrown by the default handler.
 *
 * Keeps the structured {@link ErrorLocation} so callers can point at the
 * offending source position without re-parsing the message.
 */
export class DocArenaError extends Error {
  readonly location: ErrorLocation | undefined;

  constructor(report: ErrorReport) {
    super(formatErrorReport(report));
    this.name = 'DocArenaError';
    this.location = report.location;
  }
}

/**
 * Formats a location as `source:line:column`, dropping the parts that are
 * unknown.
 *
 * @returns The formatted location, or `undefined` when nothing is known.
 */
export function formatLocation(
  location: ErrorLocation | undefined
): string | undefined {
  if (!location) return undefined;

  const parts: string[] = [];
  if (location.source) parts.push(location.source);
  if (location.line != null) {
    parts.push(`${location.line}`);
    if (location.column != null) parts.push(`${location.column}`);
  }

  return parts.length > 0 ? parts.join(':') : undefined;
}

/**
 * Formats a report into the message used by {@link DocArenaError}.
 *
 * @example
 * ```ts
 * formatErrorReport({ message: 'bad value', location: { source: 'a.toml', line: 3 } });
 * // "[docarena] a.toml:3: bad value"
 * ```
 */
export function formatErrorReport(report: ErrorReport): string {
  const where = formatLocation(report.location);
  return where
    ? `${ERROR_PREFIX} ${where}: ${report.message}`
    : `${ERROR_PREFIX} ${report.message}`;
}

/**
 * The handler used when a tree is constructed without one.
 */
export const throwingErrorHandler: ErrorHandler = report => {
  throw new DocArenaError(report);
};

/**
 * Sends a report to `handler` and never returns.
 *
 * @throws Whatever the handler throws; if the handler returns normally, a
 *         {@link DocArenaError} stating so.
 */
export function reportError(handler: ErrorHandler, report: ErrorReport): never {
  handler(report);

  throw new DocArenaError({
    message: `error handler returned normally after: ${report.message}`,
    location: report.location
  });
}
