import type { RetryState } from "../enums/retry-state"
import { FailureError, type FailureErrorOptions } from "../failure-error"

export type ActivityErrorOptions = FailureErrorOptions &
  Readonly<{
    scheduledEventId: number
    startedEventId: number
    identity: string
    activityType: string
    activityId: string
    retryState?: RetryState
  }>

/**
 * Raised in a workflow when an activity it scheduled failed.
 * `cause` holds the failure the activity itself reported.
 */
export class ActivityError extends FailureError {
  declare readonly code: "activity_error"

  readonly scheduledEventId: number
  readonly startedEventId: number
  readonly identity: string
  readonly activityType: string
  readonly activityId: string
  readonly retryState?: RetryState

  constructor(message: string, options: ActivityErrorOptions) {
    super(message, { ...options, code: "activity_error" })
    this.scheduledEventId = options.scheduledEventId
    this.startedEventId = options.startedEventId
    this.identity = options.identity
    this.activityType = options.activityType
    this.activityId = options.activityId
    this.retryState = options.retryState
  }
}
