import { TimeoutType } from "../enums/timeout-type"
import { FailureError, type FailureErrorOptions } from "../failure-error"

export type TimeoutErrorOptions = FailureErrorOptions &
  Readonly<{
    type?: TimeoutType
    lastHeartbeatDetails?: readonly unknown[]
  }>

/** Raised when a workflow or activity timed out. */
export class TimeoutError extends FailureError {
  declare readonly code: "timeout"

  readonly type?: TimeoutType

  /** Details from the last heartbeat; empty unless `type` is HEARTBEAT. */
  readonly lastHeartbeatDetails: readonly unknown[]

  constructor(message: string, options: TimeoutErrorOptions = {}) {
    super(message, { ...options, code: "timeout" })
    this.type = options.type
    this.lastHeartbeatDetails = Object.freeze(
      options.type === TimeoutType.HEARTBEAT ? [...(options.lastHeartbeatDetails ?? [])] : [],
    )
  }
}
