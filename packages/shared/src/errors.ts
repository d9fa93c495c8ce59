import { formatKey } from './format-key';

/**
 * Error codes used throughout the cache packages.
 * Configuration mistakes are user-correctable; invalid-state errors are defects.
 */
export type ErrorCode =
  // User-correctable errors
  | 'ConfigError'
  | 'KeyNotFoundError'
  // Internal defects
  | 'InvalidStateError';

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
 * Base error class for all cache errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ConfigError', 'maxSize must be an integer', {
 *   details: { maxSize: 1.5 },
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

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when cache configuration is invalid.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown by an indexed read of a key the cache does not hold.
 * Callers that expect misses should use `tryGet` instead.
 */
export class KeyNotFoundError extends AppError {
  /** The key that was looked up */
  public readonly key: unknown;

  constructor(key: unknown, options: AppErrorOptions = {}) {
    super('KeyNotFoundError', `Key not found: ${formatKey(key)}`, options);
    this.key = key;
  }
}

/**
 * Error thrown when the node/list/map coupling has been violated.
 * Never expected from correct use of the public operations.
 */
export class InvalidStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidStateError', message, options);
  }
}
