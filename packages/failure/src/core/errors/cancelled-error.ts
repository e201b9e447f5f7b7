import { FailureError, type FailureErrorOptions } from "../failure-error"

export type CancelledErrorOptions = FailureErrorOptions &
  Readonly<{
    details?: readonly unknown[]
  }>

/** Raised on cooperative cancellation of a workflow or activity. */
export class CancelledError extends FailureError {
  declare readonly code: "cancelled"

  readonly details: readonly unknown[]

  constructor(message: string = "Cancelled", options: CancelledErrorOptions = {}) {
    super(message, { ...options, code: "cancelled" })
    this.details = Object.freeze([...(options.details ?? [])])
  }
}
