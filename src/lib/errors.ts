/**
 * Errors thrown below the service layer.
 *
 * Services catch StorageIOError and return a STORAGE_ERROR failure.
 * ConfigError is only raised while starting up and stops the process.
 */

export class StorageIOError extends Error {
  override readonly name = 'StorageIOError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node filesystem error code, if the value carries one
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * True for errors raised by a syscall (ENOSPC, EACCES, ...)
 */
export function isSystemError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'syscall' in error &&
    errnoCode(error) !== undefined
  );
}
