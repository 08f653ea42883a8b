/**
 * Failure categories surfaced by the cache, resolver and orchestrators.
 */
export type ErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'ReferenceInvalid'
  | 'ManifestInvalid'
  | 'TransportFailure';

/**
 * Base class for every error raised on purpose by treepack.
 *
 * Orchestrators catch these at their boundary and hand them back inside a
 * failure result, so callers can branch on `kind` instead of parsing messages.
 *
 * @example
 * ```typescript
 * const result = await loadPackage({ repo, version: '>=2.0.0' }, deps);
 * if (!result.success && isTreepackError(result.error)) {
 *   console.log(result.error.kind); // 'NotFound'
 * }
 * ```
 */
export class TreepackError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TreepackError';
    this.kind = kind;
  }
}

export class NotFoundError extends TreepackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NotFound', message, options);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends TreepackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AlreadyExists', message, options);
    this.name = 'AlreadyExistsError';
  }
}

export class ReferenceInvalidError extends TreepackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ReferenceInvalid', message, options);
    this.name = 'ReferenceInvalidError';
  }
}

export class ManifestInvalidError extends TreepackError {
  /** File the manifest was read from, when known */
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super('ManifestInvalid', source ? `${message} (${source})` : message, options);
    this.name = 'ManifestInvalidError';
    this.source = source;
  }
}

export class TransportError extends TreepackError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TransportFailure', message, options);
    this.name = 'TransportError';
  }
}

/**
 * A `git` invocation that exited unsuccessfully.
 *
 * Keeps the argument list, exit code and stderr so that callers can classify
 * the failure by what was run rather than by message text.
 */
export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | undefined;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | undefined, stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim().split('\n').pop() ?? '';
    super(`git ${args[0] ?? ''} failed${exitCode === undefined ? '' : ` (exit ${exitCode})`}${detail ? `: ${detail}` : ''}`, options);
    this.name = 'GitCommandError';
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Raised when the user declines or aborts an interactive confirmation.
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export function isTreepackError(error: unknown): error is TreepackError {
  return error instanceof TreepackError;
}
