import { ApplicationError } from "../errors/application-error"
import { CancelledError } from "../errors/cancelled-error"
import { FailureError } from "../failure-error"
import { isAbortError } from "./is-abort-error"

export const NON_ERROR_THROWN_TYPE = "NonErrorThrown"

/**
 * Convert any thrown value to a FailureError.
 *
 * - FailureError passes through unchanged
 * - `AbortError` becomes a CancelledError
 * - other Error instances become an ApplicationError typed with the error's name
 * - non-Error values become an ApplicationError of type "NonErrorThrown"
 *
 * The original error's cause and stack are carried over.
 */
export function ensureFailureError(err: unknown): FailureError {
  if (err instanceof FailureError) {
    return err
  }

  if (err instanceof Error) {
    if (isAbortError(err)) {
      return new CancelledError(err.message || undefined, {
        cause: err.cause,
        stackTrace: err.stack,
      })
    }

    return new ApplicationError(err.message, {
      type: err.name,
      cause: err.cause,
      stackTrace: err.stack,
    })
  }

  return new ApplicationError(typeof err === "string" ? err : "Unknown error", {
    type: NON_ERROR_THROWN_TYPE,
  })
}
