import type { FailureError } from "../core/failure-error"
import type { WireFailure } from "./failure"

/**
 * Converts between thrown values and wire failures.
 *
 * Both directions are total: `errorToFailure` accepts any thrown value and
 * `failureToError` accepts any well-typed wire failure, including failure-info
 * cases this version does not map.
 */
export interface FailureConverter {
  errorToFailure(error: unknown): WireFailure
  failureToError(failure: WireFailure): FailureError
}
