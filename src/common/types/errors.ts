/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * File system errors (missing inputs, unreadable files, failed writes)
 */
export interface FileSystemError extends AppError {
  readonly type: 'NotFound' | 'ReadError' | 'WriteError';
  readonly path: string;
}

export const createFileSystemError = (
  type: FileSystemError['type'],
  path: string,
  message: string,
  cause?: unknown
): FileSystemError => ({
  type,
  message,
  path,
  ...(cause !== undefined && { cause }),
});

/**
 * Maps an unknown thrown value to a printable message.
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/**
 * Maps a caught file system error to a typed error, distinguishing missing files.
 */
export const toFileSystemError = (
  error: unknown,
  path: string,
  action: 'read' | 'write'
): FileSystemError => {
  const code =
    typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

  if (action === 'read' && code === 'ENOENT') {
    return createFileSystemError('NotFound', path, `File not found at ${path}`, error);
  }

  return createFileSystemError(
    action === 'read' ? 'ReadError' : 'WriteError',
    path,
    `Failed to ${action} ${path}: ${errorMessage(error)}`,
    error
  );
};
