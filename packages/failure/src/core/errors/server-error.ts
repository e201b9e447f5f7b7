import { FailureError, type FailureErrorOptions } from "../failure-error"

export type ServerErrorOptions = FailureErrorOptions &
  Readonly<{
    nonRetryable?: boolean
  }>

/** Failure that originated in the orchestration backend, not in user code. */
export class ServerError extends FailureError {
  declare readonly code: "server_error"

  readonly nonRetryable: boolean

  constructor(message: string, options: ServerErrorOptions = {}) {
    super(message, { ...options, code: "server_error" })
    this.nonRetryable = options.nonRetryable ?? false
  }
}
