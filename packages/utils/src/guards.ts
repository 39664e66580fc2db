/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && isString(value.code);
}

export function errorCode(value: unknown): string | undefined {
  return isErrnoException(value) ? value.code : undefined;
}
