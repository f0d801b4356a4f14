/**
 * Error taxonomy for batch operations.
 *
 * Per-item errors (resolution, collision, filesystem, undo conflict, log row) are
 * caught by the engine and recorded on the item. Environment errors (target
 * directory, unreadable log) are thrown before anything is moved.
 */

export type BatchErrorCode =
  | 'RESOLUTION'
  | 'COLLISION_EXHAUSTED'
  | 'FILESYSTEM'
  | 'UNDO_CONFLICT'
  | 'LOG_PARSE'
  | 'LOG_UNREADABLE'
  | 'TARGET_DIRECTORY';

export class BatchError extends Error {
  constructor(
    readonly code: BatchErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ResolutionError extends BatchError {
  constructor(filePath: string, reason: string) {
    super('RESOLUTION', `Could not resolve naming key for ${filePath}: ${reason}`);
  }
}

export class CollisionExhaustedError extends BatchError {
  constructor(candidate: string, maxSuffix: number) {
    super('COLLISION_EXHAUSTED', `No free name for ${candidate} within ${maxSuffix} suffixes`);
  }
}

const ERRNO_DESCRIPTIONS: Record<string, string> = {
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  ENOENT: 'source no longer exists',
  EEXIST: 'target already exists',
  ENAMETOOLONG: 'path too long',
  EXDEV: 'cross-device move',
  EBUSY: 'file is busy',
  ENOTDIR: 'a parent path is not a directory',
  EISDIR: 'target is a directory',
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FilesystemError extends BatchError {
  readonly errno?: string;

  constructor(action: string, filePath: string, cause: unknown) {
    const errno = errnoCode(cause);
    const description = errno ? ERRNO_DESCRIPTIONS[errno] : undefined;
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      'FILESYSTEM',
      description
        ? `${action} failed for ${filePath}: ${description} (${errno})`
        : `${action} failed for ${filePath}: ${detail}`
    );
    this.errno = errno;
  }
}

export class UndoConflictError extends BatchError {
  constructor(oldPath: string) {
    super('UNDO_CONFLICT', `Original path is occupied, refusing to overwrite: ${oldPath}`);
  }
}

export class LogParseError extends BatchError {
  constructor(
    readonly line: number,
    reason: string
  ) {
    super('LOG_PARSE', `Line ${line}: ${reason}`);
  }
}

export class LogUnreadableError extends BatchError {
  constructor(logPath: string, reason: string) {
    super('LOG_UNREADABLE', `Cannot read log ${logPath}: ${reason}`);
  }
}

export class TargetDirectoryError extends BatchError {
  constructor(dirPath: string) {
    super('TARGET_DIRECTORY', `Path is not a directory: ${dirPath}`);
  }
}

/** Message text for anything caught in a per-item catch block */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
