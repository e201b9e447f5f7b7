import { FailureError } from "../failure-error"

export type WorkflowAlreadyStartedErrorOptions = Readonly<{
  /** Set when raised by a client start call; absent when a workflow starts a child. */
  runId?: string
  cause?: unknown
}>

/**
 * Thrown by a client, or by a workflow starting a child, when an execution
 * with the same workflow ID is already running.
 */
export class WorkflowAlreadyStartedError extends FailureError {
  declare readonly code: "workflow_already_started"

  readonly workflowId: string
  readonly workflowType: string
  readonly runId?: string

  constructor(
    workflowId: string,
    workflowType: string,
    options: WorkflowAlreadyStartedErrorOptions = {},
  ) {
    super("Workflow execution already started", {
      cause: options.cause,
      code: "workflow_already_started",
    })
    this.workflowId = workflowId
    this.workflowType = workflowType
    this.runId = options.runId
  }
}
