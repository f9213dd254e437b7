/**
 * Typed error hierarchy
 *
 * One class per failure kind with a `kind` discriminator. Input and
 * configuration errors are fatal; write and download errors are recorded
 * per item and the run continues.
 *
 * Usage:
 * ```ts
 * import { InputError, isTypedError } from './lib/errors.js';
 *
 * throw new InputError('Unclosed tags: page', { path: 'dump.xml' });
 *
 * if (isTypedError(error) && error.kind === 'INPUT') { ... }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'INPUT'
  | 'CONFIG'
  | 'WRITE'
  | 'DOWNLOAD'
  | 'STATE';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Malformed or unreadable dump. Fatal at the reader boundary.
 */
export class InputError extends Error implements TypedError {
  readonly kind = 'INPUT' as const;
  readonly path: string | undefined;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'InputError';
    this.path = options.path;
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Invalid configuration (file, environment or flags)
 */
export class ConfigError extends Error implements TypedError {
  readonly kind = 'CONFIG' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * A vault file could not be written
 */
export class WriteError extends Error implements TypedError {
  readonly kind = 'WRITE' as const;

  constructor(
    message: string,
    readonly path: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'WriteError';
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

/**
 * An image could not be fetched or stored
 */
export class DownloadError extends Error implements TypedError {
  readonly kind = 'DOWNLOAD' as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options: { cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }

  /** 4xx responses are not retried */
  get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 429;
  }
}

/**
 * An operation called in the wrong phase of a run
 */
export class StateError extends Error implements TypedError {
  readonly kind = 'STATE' as const;

  constructor(message: string) {
    super(message);
    this.name = 'StateError';
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>(['INPUT', 'CONFIG', 'WRITE', 'DOWNLOAD', 'STATE']);

/**
 * Type guard for the errors above
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string' &&
    ERROR_KINDS.has(error.kind)
  );
}

/**
 * True for errors that end the run
 */
export function isFatal(error: unknown): boolean {
  return isTypedError(error) && (error.kind === 'INPUT' || error.kind === 'CONFIG');
}

/**
 * Message of anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
