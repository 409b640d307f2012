/**
 * Checks whether an error carries a Node.js system error code.
 *
 * @param error - Caught value.
 * @param code - Expected code, e.g. `ENOENT`.
 * @returns True if the error has the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
