/**
 * Error helpers
 *
 * Normalises unknown thrown values into messages and errno codes.
 */

/**
 * Get a message out of anything that was thrown
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
}

/**
 * Read a Node.js system error code (ENOENT, EACCES, ...) if present
 */
export function extractErrnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string') return code;
  }
  return undefined;
}
