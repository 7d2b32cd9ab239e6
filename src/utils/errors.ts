/**
 * Error Handling Utilities
 *
 * The PlacemarksError taxonomy plus type-safe helpers for `catch (e: unknown)`.
 * Every PlacemarksError is fatal: the CLI prints it and exits non-zero.
 */

export type PlacemarksErrorCode =
  | 'profile_not_found'
  | 'database_unreadable'
  | 'invalid_database'
  | 'folder_not_found'
  | 'invalid_pattern'
  | 'unknown_style'
  | 'clipboard_unavailable'
  | 'invalid_config'
  | 'invalid_arguments';

export class PlacemarksError extends Error {
  code: PlacemarksErrorCode;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: PlacemarksErrorCode,
    message: string,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlacemarksError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isPlacemarksError(e: unknown, code?: PlacemarksErrorCode): e is PlacemarksError {
  return e instanceof PlacemarksError && (code === undefined || e.code === code);
}

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT');
}

export function isPermissionError(e: unknown): boolean {
  return hasErrorCode(e, 'EACCES') || hasErrorCode(e, 'EPERM');
}
