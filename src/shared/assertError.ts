/**
 * Error type guards and message extraction utilities.
 */

/** Safely extract error message from unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}
