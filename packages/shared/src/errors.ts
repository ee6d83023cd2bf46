/**
 * Error codes used throughout gitree.
 * User-correctable errors use exit code 2.
 * Audit failures use exit code 1, except an unknown entry type which uses 3.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Audit failures
  | 'DirectoryOpenError'
  | 'EntryLimitError'
  | 'UnknownEntryTypeError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all gitree errors.
 * Provides consistent error handling with codes, causes, details and the
 * process exit code the CLI should use.
 *
 * @example
 * ```typescript
 * throw new AppError('DirectoryOpenError', 'Cannot list /srv/git', {
 *   cause: originalError,
 *   details: { path: '/srv/git' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;
  /** Exit status for the process */
  public readonly exitCode: number = 1;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  public readonly exitCode = 2;

  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  public readonly exitCode = 2;

  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

// The errno code (`EACCES`, `ENOENT`) where the cause carries one.
function reasonOf(cause: unknown): string | undefined {
  if (!(cause instanceof Error)) return undefined;
  if ('code' in cause && typeof cause.code === 'string') return cause.code;
  return cause.message;
}

/**
 * Error thrown when a directory cannot be listed (permissions, removed
 * during the walk, not a directory). Never retried.
 */
export class DirectoryOpenError extends AppError {
  /** Directory that could not be opened */
  public readonly path: string;

  constructor(dirPath: string, options: AppErrorOptions = {}) {
    super('DirectoryOpenError', `Cannot open directory: ${dirPath}`, {
      ...options,
      details: options.details ?? { path: dirPath, reason: reasonOf(options.cause) },
    });
    this.path = dirPath;
  }
}

/**
 * Error thrown when the filesystem reports an entry whose type cannot be
 * determined.
 */
export class UnknownEntryTypeError extends AppError {
  public readonly exitCode = 3;
  /** Full path of the offending entry */
  public readonly path: string;

  constructor(entryPath: string, options: AppErrorOptions = {}) {
    super('UnknownEntryTypeError', `Unknown file type: ${entryPath}`, options);
    this.path = entryPath;
  }
}

/**
 * Error thrown when a directory holds more subdirectories or files than the
 * configured per-directory limit.
 */
export class EntryLimitError extends AppError {
  /** Directory that exceeded the limit */
  public readonly path: string;
  /** The limit in force */
  public readonly limit: number;

  constructor(
    dirPath: string,
    kind: 'directories' | 'files',
    limit: number,
    options: AppErrorOptions = {},
  ) {
    super('EntryLimitError', `Reached max ${kind} per directory (${limit}) in ${dirPath}`, {
      ...options,
      details: options.details ?? { path: dirPath, kind, limit },
    });
    this.path = dirPath;
    this.limit = limit;
  }
}
