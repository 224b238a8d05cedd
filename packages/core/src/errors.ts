/**
 * Error taxonomy for store and linker operations
 */

/**
 * Error categories. Callers branch on these rather than on message text.
 */
export type StashlinkErrorCode = 'not_found' | 'environment' | 'io' | 'invalid_input' | 'integrity';

export class StashlinkError extends Error {
  constructor(
    message: string,
    public readonly code: StashlinkErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StashlinkError';
  }
}

/**
 * A hash (or other addressed object) that is not in the store
 */
export class NotFoundError extends StashlinkError {
  public readonly target: string;

  constructor(target: string, what = 'package') {
    super(`${what} not found in store: ${target}`, 'not_found');
    this.name = 'NotFoundError';
    this.target = target;
  }
}

export type DiscoveryFailureReason = 'no-environment' | 'no-runtime' | 'missing-package-dir';

/**
 * The target runtime's environment could not be located.
 * Reflects misconfiguration, so it carries a remediation hint instead of being retried.
 */
export class EnvironmentDiscoveryError extends StashlinkError {
  public readonly reason: DiscoveryFailureReason;
  public readonly language: string;
  public readonly hint: string;

  constructor(
    language: string,
    reason: DiscoveryFailureReason,
    message: string,
    hint: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'environment', options);
    this.name = 'EnvironmentDiscoveryError';
    this.language = language;
    this.reason = reason;
    this.hint = hint;
  }
}

export type FsOperation = 'read' | 'copy' | 'write' | 'mkdir' | 'chmod' | 'remove' | 'rename' | 'list' | 'link';

export class FsOperationError extends StashlinkError {
  public readonly operation: FsOperation;
  public readonly path: string;

  constructor(operation: FsOperation, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`failed to ${operation} ${path}: ${detail}`, 'io', { cause });
    this.name = 'FsOperationError';
    this.operation = operation;
    this.path = path;
  }
}

export class InvalidInputError extends StashlinkError {
  constructor(message: string) {
    super(message, 'invalid_input');
    this.name = 'InvalidInputError';
  }
}

export class IntegrityError extends StashlinkError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`integrity mismatch: expected ${expected}, got ${actual}`, 'integrity');
    this.name = 'IntegrityError';
    this.expected = expected;
    this.actual = actual;
  }
}

export function isStashlinkError(err: unknown, code?: StashlinkErrorCode): err is StashlinkError {
  if (!(err instanceof StashlinkError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Node's errno code, if the error carries one
 */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/**
 * Run an fs call and rethrow failures as FsOperationError for `path`
 */
export async function withFsContext<T>(operation: FsOperation, path: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StashlinkError) throw err;
    throw new FsOperationError(operation, path, err);
  }
}
