import type { RetryState } from "../enums/retry-state"
import { FailureError, type FailureErrorOptions } from "../failure-error"

export type ChildWorkflowErrorOptions = FailureErrorOptions &
  Readonly<{
    namespace: string
    workflowId: string
    runId: string
    workflowType: string
    initiatedEventId: number
    startedEventId: number
    retryState?: RetryState
  }>

/**
 * Raised in a parent workflow when a child workflow execution failed.
 * `cause` holds the child's own failure.
 */
export class ChildWorkflowError extends FailureError {
  declare readonly code: "child_workflow_error"

  readonly namespace: string
  readonly workflowId: string
  readonly runId: string
  readonly workflowType: string
  readonly initiatedEventId: number
  readonly startedEventId: number
  readonly retryState?: RetryState

  constructor(message: string, options: ChildWorkflowErrorOptions) {
    super(message, { ...options, code: "child_workflow_error" })
    this.namespace = options.namespace
    this.workflowId = options.workflowId
    this.runId = options.runId
    this.workflowType = options.workflowType
    this.initiatedEventId = options.initiatedEventId
    this.startedEventId = options.startedEventId
    this.retryState = options.retryState
  }
}
