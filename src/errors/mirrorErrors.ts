/**
 * Custom error classes for branch-mirror
 * Provides structured error information for callers (MCP tools, CLI)
 */

/**
 * Base error class for mirror operations
 */
export class MirrorError extends Error {
  constructor(
    message: string,
    public code: number,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Input validation error
 */
export class ValidationError extends MirrorError {
  constructor(field: string, value: unknown, expected: string) {
    const displayValue = typeof value === 'object' ? JSON.stringify(value) : String(value);
    const message = `Invalid ${field}: expected ${expected}, got "${displayValue}"`;

    super(message, -32001, {
      field,
      value,
      expected
    });
  }
}

/**
 * Classification of archive provider failures
 */
export type ArchiveErrorKind =
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'NETWORK_ERROR'
  | 'SUBPATH_NOT_FOUND';

/**
 * Remote archive could not be obtained. Always aborts the whole invocation
 * before the destination is touched.
 */
export class ArchiveError extends MirrorError {
  constructor(
    public readonly kind: ArchiveErrorKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, -32002, { kind, ...details });
  }
}

/**
 * File operation error (list, create root, etc.)
 */
export class FileOperationError extends MirrorError {
  constructor(operation: string, path: string, reason: string) {
    super(`Cannot ${operation} ${path}: ${reason}`, -32004, {
      operation,
      path,
      reason
    });
  }
}

/**
 * Read the errno code of a filesystem error, if it has one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
