import { FailureError, type FailureErrorOptions } from "../failure-error"

export type TerminatedErrorOptions = FailureErrorOptions &
  Readonly<{
    details?: readonly unknown[]
  }>

/** Raised when an execution was forcibly terminated from outside. */
export class TerminatedError extends FailureError {
  declare readonly code: "terminated"

  readonly details: readonly unknown[]

  constructor(message: string, options: TerminatedErrorOptions = {}) {
    super(message, { ...options, code: "terminated" })
    this.details = Object.freeze([...(options.details ?? [])])
  }
}
