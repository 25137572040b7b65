/**
 * Drive Error Type Definitions
 *
 * Every storage, catalog, file-operation and preview failure surfaces as
 * exactly one DriveError subclass. Callers switch on `type`.
 */

/**
 * Extended error interface for Node.js filesystem errors
 */
export interface FileSystemError extends Error {
  /** Node.js error code (e.g., ENOENT, EEXIST, EACCES) */
  code?: string;
  /** The syscall that failed (e.g., 'open', 'rename') */
  syscall?: string;
  /** The path the syscall was given */
  path?: string;
}

/**
 * Type guard to check if an error carries Node.js errno properties.
 */
export function isFileSystemError(error: unknown): error is FileSystemError {
  return error instanceof Error && ('code' in error || 'syscall' in error);
}

/**
 * Get the error code from an error, if available.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (!isFileSystemError(error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check whether an error is the "no such file or directory" errno.
 */
export function isNotFoundCode(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Check whether an error is an AbortSignal cancellation.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || getErrorCode(error) === 'ABORT_ERR');
}

// ============================================================================
// Domain-Specific Error Classes
// ============================================================================

/**
 * Error type discriminator for drive errors.
 * Used in discriminated unions for exhaustive error handling.
 */
export type DriveErrorType =
  | 'INVALID_NAME'
  | 'NOT_FOUND'
  | 'QUOTA_EXCEEDED'
  | 'IO_FAILURE'
  | 'PREVIEW_UNAVAILABLE'
  | 'AUTHENTICATION_ERROR';

/**
 * Serialized form of a drive error, as carried in command results.
 */
export interface SerializedDriveError {
  type: DriveErrorType;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Base class for drive errors.
 * Provides common structure and serialization for all drive errors.
 */
export abstract class DriveError extends Error {
  abstract readonly type: DriveErrorType;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for command results and JSON output
   */
  toJSON(): SerializedDriveError {
    return {
      type: this.type,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * Invalid name: empty, blank, containing a separator or NUL, `.`/`..`,
 * resolving outside the current folder, or naming a folder where a file
 * is required.
 *
 * @example
 * throw InvalidNameError.blank();
 * throw new InvalidNameError('Name cannot contain path separators', 'a/b');
 */
export class InvalidNameError extends DriveError {
  readonly type = 'INVALID_NAME' as const;

  constructor(
    message: string,
    public readonly entryName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(entryName !== undefined && { name: entryName }) });
  }

  static blank(): InvalidNameError {
    return new InvalidNameError('Name cannot be empty');
  }

  static outsideFolder(name: string): InvalidNameError {
    return new InvalidNameError(`'${name}' resolves outside the current folder`, name);
  }

  static isFolder(name: string): InvalidNameError {
    return new InvalidNameError(`'${name}' is a folder`, name);
  }

  static insideStorage(destination: string): InvalidNameError {
    return new InvalidNameError(`'${destination}' is inside the storage area`, destination);
  }
}

/**
 * Type guard for InvalidNameError
 */
export function isInvalidNameError(error: unknown): error is InvalidNameError {
  return error instanceof InvalidNameError;
}

/**
 * Referenced entry is absent (or is not the kind the operation needs).
 *
 * @example
 * throw NotFoundError.entry('report.pdf');
 * throw NotFoundError.folder('Photos');
 */
export class NotFoundError extends DriveError {
  readonly type = 'NOT_FOUND' as const;

  constructor(
    message: string,
    public readonly entryName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(entryName !== undefined && { name: entryName }) });
  }

  static entry(name: string): NotFoundError {
    return new NotFoundError(`'${name}' does not exist`, name);
  }

  static folder(name: string): NotFoundError {
    return new NotFoundError(`No folder named '${name}'`, name);
  }
}

/**
 * Type guard for NotFoundError
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Quota gate rejected a size-increasing mutation before any byte was written.
 *
 * @example
 * throw new QuotaExceededError({ usedBytes: 6, requestedBytes: 5, maxBytes: 10 });
 */
export class QuotaExceededError extends DriveError {
  readonly type = 'QUOTA_EXCEEDED' as const;
  readonly usedBytes: number;
  readonly requestedBytes: number;
  readonly maxBytes: number;

  constructor(usage: { usedBytes: number; requestedBytes: number; maxBytes: number }) {
    super(
      `Storage limit reached: ${usage.usedBytes} + ${usage.requestedBytes} bytes exceeds ${usage.maxBytes} bytes`,
      { usedBytes: usage.usedBytes, requestedBytes: usage.requestedBytes, maxBytes: usage.maxBytes }
    );
    this.usedBytes = usage.usedBytes;
    this.requestedBytes = usage.requestedBytes;
    this.maxBytes = usage.maxBytes;
  }
}

/**
 * Type guard for QuotaExceededError
 */
export function isQuotaExceededError(error: unknown): error is QuotaExceededError {
  return error instanceof QuotaExceededError;
}

/**
 * Outcome of a (possibly partial) recursive delete.
 * Paths are relative to the folder the delete was issued in.
 */
export interface DeleteReport {
  /** Entries that no longer exist, deepest first */
  removed: string[];
  /** Entries still present, with the reason each was kept */
  failed: Array<{ path: string; reason: string }>;
}

/**
 * Underlying read/write/copy/delete failure.
 *
 * @example
 * throw IoFailureError.from(err, 'copy', 'notes.txt');
 * throw IoFailureError.alreadyExists('Photos');
 */
export class IoFailureError extends DriveError {
  readonly type = 'IO_FAILURE' as const;
  /** Present when a recursive delete stopped part-way */
  readonly report?: DeleteReport;

  constructor(
    message: string,
    public readonly code?: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown; report?: DeleteReport }
  ) {
    super(message, { ...context, ...(code && { code }) }, options);
    this.report = options?.report;
  }

  /**
   * Wrap an fs error, keeping its errno code and the original as `cause`.
   */
  static from(error: unknown, action: string, target: string): IoFailureError {
    if (error instanceof IoFailureError) return error;
    const code = isAbortError(error) ? 'ABORTED' : getErrorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    return new IoFailureError(`Failed to ${action} '${target}': ${detail}`, code, { target }, { cause: error });
  }

  static alreadyExists(name: string): IoFailureError {
    return new IoFailureError(`'${name}' already exists`, 'EEXIST', { target: name });
  }

  static partialDelete(name: string, report: DeleteReport): IoFailureError {
    return new IoFailureError(
      `Deleted '${name}' only partially: ${report.removed.length} removed, ${report.failed.length} not removed`,
      'PARTIAL_DELETE',
      { target: name, removed: report.removed, failed: report.failed },
      { report }
    );
  }
}

/**
 * Type guard for IoFailureError
 */
export function isIoFailureError(error: unknown): error is IoFailureError {
  return error instanceof IoFailureError;
}

/**
 * Translate any thrown value into an IoFailureError, leaving drive errors
 * (quota, not-found, ...) untouched.
 */
export function toIoFailure(error: unknown, action: string, target: string): AnyDriveError {
  if (isDriveError(error)) return error;
  return IoFailureError.from(error, action, target);
}

/**
 * A classified file could not be read or handed to the platform opener.
 */
export class PreviewUnavailableError extends DriveError {
  readonly type = 'PREVIEW_UNAVAILABLE' as const;

  constructor(
    message: string,
    public readonly entryName?: string,
    options?: { cause?: unknown }
  ) {
    super(message, entryName !== undefined ? { name: entryName } : undefined, options);
  }

  static from(error: unknown, name: string): PreviewUnavailableError {
    const detail = error instanceof Error ? error.message : String(error);
    return new PreviewUnavailableError(`Cannot open '${name}': ${detail}`, name, { cause: error });
  }
}

/**
 * Type guard for PreviewUnavailableError
 */
export function isPreviewUnavailableError(error: unknown): error is PreviewUnavailableError {
  return error instanceof PreviewUnavailableError;
}

/**
 * Authentication error for rejected logins.
 *
 * @example
 * throw AuthenticationError.invalidCredentials();
 */
export class AuthenticationError extends DriveError {
  readonly type = 'AUTHENTICATION_ERROR' as const;

  constructor(
    message: string,
    public readonly reason?: 'INVALID_CREDENTIALS' | 'NOT_AUTHENTICATED',
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(reason && { reason }) });
  }

  static invalidCredentials(): AuthenticationError {
    return new AuthenticationError('Invalid username or password', 'INVALID_CREDENTIALS');
  }
}

/**
 * Type guard for AuthenticationError
 */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

/**
 * Union type of all drive errors.
 * Use for exhaustive switch statements on error types.
 *
 * @example
 * function exitCodeFor(error: AnyDriveError): number {
 *   switch (error.type) {
 *     case 'INVALID_NAME':
 *     case 'NOT_FOUND':
 *       return 2;
 *     case 'QUOTA_EXCEEDED':
 *       return 3;
 *     case 'IO_FAILURE':
 *     case 'PREVIEW_UNAVAILABLE':
 *       return 4;
 *     case 'AUTHENTICATION_ERROR':
 *       return 5;
 *     default: {
 *       const _exhaustive: never = error;
 *       return 1;
 *     }
 *   }
 * }
 */
export type AnyDriveError =
  | InvalidNameError
  | NotFoundError
  | QuotaExceededError
  | IoFailureError
  | PreviewUnavailableError
  | AuthenticationError;

/**
 * Type guard to check if an error is any drive error
 */
export function isDriveError(error: unknown): error is AnyDriveError {
  return (
    isInvalidNameError(error) ||
    isNotFoundError(error) ||
    isQuotaExceededError(error) ||
    isIoFailureError(error) ||
    isPreviewUnavailableError(error) ||
    isAuthenticationError(error)
  );
}

const SHORT_MESSAGES: Record<DriveErrorType, string> = {
  INVALID_NAME: 'Invalid name',
  NOT_FOUND: 'Not found',
  QUOTA_EXCEEDED: 'Quota exceeded',
  IO_FAILURE: 'Operation failed',
  PREVIEW_UNAVAILABLE: 'Cannot open file',
  AUTHENTICATION_ERROR: 'Login failed',
};

/**
 * Short label of an error kind, e.g. "Quota exceeded".
 */
export function errorLabel(type: DriveErrorType): string {
  return SHORT_MESSAGES[type];
}

/**
 * Short user-facing message for any thrown value:
 * `"<kind>: <detail>"` for drive errors, the plain message otherwise.
 */
export function describeError(error: unknown): string {
  if (isDriveError(error)) {
    return `${errorLabel(error.type)}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
