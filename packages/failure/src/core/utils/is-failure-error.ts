import { FailureError } from "../failure-error"

/**
 * Type guard for errors of the failure taxonomy.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (isFailureError(err)) logger.warn(err.displayMessage, { err })
 * }
 * ```
 */
export function isFailureError(e: unknown): e is FailureError {
  return e instanceof FailureError
}
