/**
 * Failure categories, each with the exit status the CLI reports for it.
 */
export const EXIT_CODES = {
  // Fixable by editing the config or the command line
  ConfigError: 2,
  UsageError: 2,
  ScanError: 1,
  ProcessError: 1,
  UnknownError: 1,
  // Same status a shell reports for Ctrl-C
  SelectionCancelled: 130,
} as const;

export type ErrorCode = keyof typeof EXIT_CODES;

export interface AppErrorOptions {
  cause?: unknown;
  /** Structured context for --json output, or a preformatted string */
  details?: Record<string, unknown> | string;
}

/**
 * Base class for every error projpick raises on purpose.
 *
 * @example
 * ```typescript
 * throw new ScanError('Entry name in /srv/code is not valid UTF-8: 62ff61', {
 *   details: { directory: '/srv/code' },
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Unreadable or invalid configuration: bad syntax, schema violations, an
 * invalid pattern or depth, or a path naming an unset variable.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A tree could not be classified. The whole scan is abandoned; callers never
 * see a partial result.
 */
export class ScanError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
  }
}

/**
 * fzf or tmux could not be started or exited with an error.
 */
export class ProcessError extends AppError {
  /** Undefined when the process never ran */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/** The selector was dismissed or returned nothing. */
export class SelectionCancelledError extends AppError {
  constructor(message = 'Nothing selected', options: AppErrorOptions = {}) {
    super('SelectionCancelled', message, options);
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof AppError ? EXIT_CODES[error.code] : EXIT_CODES.UnknownError;
}
