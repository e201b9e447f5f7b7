import { BaseError } from "../base-error"

export type NondeterminismErrorOptions = Readonly<{
  workflowType?: string
  cause?: unknown
}>

/**
 * Raised by the workflow runtime when replaying history produced commands
 * that do not match the recorded events.
 *
 * Not a {@link FailureError}: by default it fails the workflow task, which is
 * retried. List it in a workflow failure policy to fail the workflow instead.
 */
export class NondeterminismError extends BaseError<"nondeterminism"> {
  constructor(message: string, options: NondeterminismErrorOptions = {}) {
    super(message, {
      code: "nondeterminism",
      cause: options.cause,
      context: options.workflowType ? { workflowType: options.workflowType } : {},
    })
  }
}
