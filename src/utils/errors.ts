/**
 * Error codes raised while building or querying a tag graph
 */
export enum IndexErrorCode {
  /** Canonicalization, listing or read failure */
  IO_FAILURE = 'IO_FAILURE',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  NOT_FOUND = 'NOT_FOUND',
  /** Mutation attempted after the build returned */
  GRAPH_SEALED = 'GRAPH_SEALED',
}

export class IndexError extends Error {
  constructor(
    public readonly code: IndexErrorCode,
    message: string,
    public readonly path?: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'IndexError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Wrap a filesystem failure.
 *
 * @example
 * ioError('/data/img.tags', 'read tag file', err)
 * // IndexError: Failed to read tag file /data/img.tags: EACCES: permission denied ...
 */
export function ioError(path: string, action: string, cause: unknown): IndexError {
  return new IndexError(
    IndexErrorCode.IO_FAILURE,
    `Failed to ${action} ${path}: ${getErrorMessage(cause)}`,
    path,
    cause
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** errno code of a Node system error, if any */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
