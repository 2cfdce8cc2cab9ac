/**
 * Error types for the backend bridge.
 *
 * Every error carries a daemon error code so that a failed job can be
 * reported to the host without further translation.
 */

/**
 * Daemon error codes understood by the host.
 */
export const ErrorCode = {
  NOT_SUPPORTED: 'not-supported',
  INTERNAL_ERROR: 'internal-error',
  TRANSACTION_ERROR: 'transaction-error',
  PACKAGE_NOT_FOUND: 'package-not-found',
  PACKAGE_NOT_INSTALLED: 'package-not-installed',
  PACKAGE_ALREADY_INSTALLED: 'package-already-installed',
  PACKAGE_ID_INVALID: 'package-id-invalid',
  PACKAGE_DOWNLOAD_FAILED: 'package-download-failed',
  FILTER_INVALID: 'filter-invalid',
  GROUP_NOT_FOUND: 'group-not-found',
  FILE_NOT_FOUND: 'file-not-found',
  INVALID_PACKAGE_FILE: 'invalid-package-file',
  REPO_NOT_FOUND: 'repo-not-found',
  REPO_CONFIGURATION_ERROR: 'repo-configuration-error',
  DEP_RESOLUTION_FAILED: 'dep-resolution-failed',
  CANNOT_REMOVE_SYSTEM_PACKAGE: 'cannot-remove-system-package',
  CANNOT_GET_LOCK: 'cannot-get-lock',
  NO_NETWORK: 'no-network',
  FAILED_CONFIG_PARSING: 'failed-config-parsing',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

export function isKnownErrorCode(code: unknown): code is ErrorCodeType {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * Serialized error, as reported on a failed job
 */
export interface SerializedError {
  code: ErrorCodeType;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base backend error class
 */
export class BackendError extends Error {
  /**
   * Daemon error code reported when this error fails a job
   */
  public readonly code: ErrorCodeType;

  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCodeType = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BackendError';
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Lifecycle call made in a state that does not allow it
 */
export class LifecycleError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INTERNAL_ERROR, details);
    this.name = 'LifecycleError';
  }
}

/**
 * The embedded runtime cannot serve calls (not started, failed, or torn down)
 */
export class RuntimeUnavailableError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INTERNAL_ERROR, details);
    this.name = 'RuntimeUnavailableError';
  }
}

/**
 * The embedded runtime failed to start
 */
export class RuntimeStartError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.INTERNAL_ERROR, details);
    this.name = 'RuntimeStartError';
  }
}

/**
 * A runtime function raised. Keeps the daemon code the script attached, if any.
 */
export class RuntimeCallError extends BackendError {
  readonly functionName: string;

  constructor(
    functionName: string,
    message: string,
    code: ErrorCodeType = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, code, { functionName, ...details });
    this.name = 'RuntimeCallError';
    this.functionName = functionName;
  }
}

/**
 * A runtime function returned data of the wrong shape
 */
export class MalformedResultError extends BackendError {
  readonly functionName: string;

  constructor(functionName: string, message: string, details?: Record<string, unknown>) {
    super(`Runtime function '${functionName}' returned malformed data: ${message}`, ErrorCode.INTERNAL_ERROR, {
      functionName,
      ...details,
    });
    this.name = 'MalformedResultError';
    this.functionName = functionName;
  }
}

/**
 * Role arguments the handler cannot act on
 */
export class InvalidArgumentError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.TRANSACTION_ERROR, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Unsupported filter, or a filter combined with its negation
 */
export class FilterInvalidError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.FILTER_INVALID, details);
    this.name = 'FilterInvalidError';
  }
}

export class PackageIdInvalidError extends BackendError {
  readonly packageId: string;

  constructor(packageId: string, reason: string) {
    super(`Invalid package id '${packageId}': ${reason}`, ErrorCode.PACKAGE_ID_INVALID, { packageId });
    this.name = 'PackageIdInvalidError';
    this.packageId = packageId;
  }
}

export class NotSupportedError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.NOT_SUPPORTED, details);
    this.name = 'NotSupportedError';
  }
}

export class ConfigError extends BackendError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.FAILED_CONFIG_PARSING, details);
    this.name = 'ConfigError';
  }
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

interface ErrorLike {
  message: string;
  code?: unknown;
}

/**
 * Matches errors from any realm, including objects thrown by scripts
 * evaluated in a separate vm context (where `instanceof Error` is false).
 */
export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

/**
 * True for anything with a callable `then`, from any realm.
 */
export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Normalize anything thrown to the shape reported on a failed job.
 *
 * - BackendError: uses toJSON()
 * - Error-like values: keeps a known daemon code, otherwise internal-error
 * - Anything else: converted to string
 */
export function normalizeError(error: unknown): SerializedError {
  if (isBackendError(error)) {
    return error.toJSON();
  }

  if (isErrorLike(error)) {
    return {
      code: isKnownErrorCode(error.code) ? error.code : ErrorCode.INTERNAL_ERROR,
      message: error.message,
    };
  }

  return {
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  };
}
