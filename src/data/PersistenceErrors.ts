/**
 * @fileoverview Errors raised by the history persistence layer
 * @module data/PersistenceErrors
 */

/**
 * The persisted history document does not have the expected shape
 */
export class HistoryFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryFormatError';
  }
}

/**
 * Reading or writing the history file failed
 */
export class HistoryPersistenceError extends Error {
  readonly operation: 'read' | 'write';
  readonly filePath: string;

  constructor(operation: 'read' | 'write', filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} history file ${filePath}: ${reason}`, { cause });
    this.name = 'HistoryPersistenceError';
    this.operation = operation;
    this.filePath = filePath;
  }
}

/**
 * Narrow an unknown error to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
