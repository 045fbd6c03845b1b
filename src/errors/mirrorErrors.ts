/**
 * Custom error classes for tree-mirror
 * Provides structured error information for startup validation and per-entry failures
 */

export type MirrorErrorCode =
  | 'INVALID_OPTION'
  | 'PATH_VALIDATION'
  | 'PATH_NOT_FOUND'
  | 'ENTRY_IO'
  | 'LOG_SETUP'
  | 'REPLICA_LOCKED';

/**
 * Base error class for tree-mirror operations
 */
export class MirrorError extends Error {
  constructor(
    message: string,
    public code: MirrorErrorCode,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Invalid CLI option, environment variable or config file value
 */
export class ValidationError extends MirrorError {
  constructor(field: string, value: unknown, expected: string) {
    const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
    const message = `Invalid ${field}: expected ${expected}, got "${displayValue}"`;

    super(message, 'INVALID_OPTION', {
      field,
      value,
      expected
    });
  }
}

export type PathValidationReason =
  | 'identical'
  | 'replica_inside_source'
  | 'source_inside_replica'
  | 'not_a_directory'
  | 'protected_location';

const PATH_VALIDATION_MESSAGES: Record<PathValidationReason, (path: string, other?: string) => string> = {
  identical: (path) =>
    `Source and replica are the same directory: "${path}"`,
  replica_inside_source: (path, other) =>
    `Replica directory "${path}" is inside the source directory "${other}"`,
  source_inside_replica: (path, other) =>
    `Replica directory "${path}" contains the source directory "${other}"`,
  not_a_directory: (path) =>
    `"${path}" is not a directory`,
  protected_location: (path) =>
    `Refusing to use "${path}" as the replica directory: it is a system or home directory`
};

/**
 * Source/replica roots that would make a pass destroy its own input
 */
export class PathValidationError extends MirrorError {
  constructor(public readonly reason: PathValidationReason, path: string, other?: string) {
    super(PATH_VALIDATION_MESSAGES[reason](path, other), 'PATH_VALIDATION', {
      reason,
      path,
      other
    });
  }
}

/**
 * A root directory that does not exist
 */
export class PathNotFoundError extends MirrorError {
  constructor(path: string, role: 'source' | 'replica' | 'root') {
    super(`${role === 'root' ? 'Directory' : `The ${role} directory`} "${path}" does not exist`, 'PATH_NOT_FOUND', {
      path,
      role
    });
  }
}

export type EntryOperation = 'copy' | 'update' | 'mkdir' | 'delete';

/**
 * Failure of a single copy/update/mkdir/delete inside a pass.
 * Recorded and logged; never aborts the pass.
 */
export class EntryOperationError extends MirrorError {
  readonly operation: EntryOperation;
  readonly path: string;
  readonly errno?: string;

  constructor(operation: EntryOperation, path: string, cause: unknown) {
    const reason = describeError(cause);
    super(`Cannot ${operation} "${path}": ${reason}`, 'ENTRY_IO', {
      operation,
      path,
      reason,
      errno: errnoOf(cause)
    });
    this.operation = operation;
    this.path = path;
    this.errno = errnoOf(cause);
  }
}

/**
 * Unusable log directory. SyncLog falls back to the current working
 * directory and throws only when that is unusable too.
 */
export class LogSetupError extends MirrorError {
  constructor(logDir: string, reason: string) {
    super(`Cannot write log file in "${logDir}": ${reason}`, 'LOG_SETUP', {
      logDir,
      reason
    });
  }
}

export interface LockHolder {
  pid: number;
  hostname: string;
  timestamp: number;
}

/**
 * Another live process is already mirroring into the same replica
 */
export class ReplicaLockedError extends MirrorError {
  constructor(replicaDir: string, holder?: LockHolder) {
    const by = holder ? ` by PID ${holder.pid} on ${holder.hostname}` : '';
    super(`Replica directory "${replicaDir}" is locked${by}`, 'REPLICA_LOCKED', {
      replicaDir,
      holder
    });
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * errno code (ENOENT, EACCES, ...) of a Node.js system error, if any
 */
export function errnoOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
