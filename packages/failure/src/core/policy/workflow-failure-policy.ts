import { NondeterminismError } from "../errors/nondeterminism-error"
import { FailureError } from "../failure-error"

/** Any error class, abstract or concrete. */
export type ErrorClass = abstract new (...args: never[]) => Error

export type TaskFailureOutcome = "fail_workflow" | "retry_task"

export type WorkflowFailurePredicate = (error: unknown, workflowType: string | undefined) => boolean

export type WorkflowFailurePolicyOptions = Readonly<{
  /** Error types that fail any workflow on this worker, in addition to FailureError. */
  failureErrorTypes?: readonly ErrorClass[]

  /** Extra error types per workflow type. */
  workflowFailureErrorTypes?: Readonly<Record<string, readonly ErrorClass[]>>

  /** Escape hatch for rules that are not expressible as a type list. */
  isWorkflowFailure?: WorkflowFailurePredicate
}>

/**
 * Decides whether an error raised by workflow code fails the workflow
 * execution or only the current workflow task (which is then retried).
 */
export interface WorkflowFailurePolicy {
  isWorkflowFailure(error: unknown, workflowType?: string): boolean
  classify(error: unknown, workflowType?: string): TaskFailureOutcome

  /** Whether nondeterminism fails every workflow on the worker. */
  readonly nondeterminismAsWorkflowFail: boolean

  /** Workflow types for which nondeterminism fails the workflow. */
  readonly nondeterminismAsWorkflowFailForTypes: ReadonlySet<string>
}

function coversNondeterminism(types: readonly ErrorClass[]): boolean {
  return types.some((t) => t === NondeterminismError || NondeterminismError.prototype instanceof t)
}

class DefaultWorkflowFailurePolicy implements WorkflowFailurePolicy {
  readonly nondeterminismAsWorkflowFail: boolean
  readonly nondeterminismAsWorkflowFailForTypes: ReadonlySet<string>

  private readonly failureErrorTypes: readonly ErrorClass[]
  private readonly perWorkflowType: ReadonlyMap<string, readonly ErrorClass[]>
  private readonly predicate?: WorkflowFailurePredicate

  constructor(options: WorkflowFailurePolicyOptions) {
    this.failureErrorTypes = [...(options.failureErrorTypes ?? [])]
    this.perWorkflowType = new Map(Object.entries(options.workflowFailureErrorTypes ?? {}))
    this.predicate = options.isWorkflowFailure

    this.nondeterminismAsWorkflowFail = coversNondeterminism(this.failureErrorTypes)
    this.nondeterminismAsWorkflowFailForTypes = new Set(
      [...this.perWorkflowType]
        .filter(([, types]) => coversNondeterminism(types))
        .map(([workflowType]) => workflowType),
    )
  }

  isWorkflowFailure(error: unknown, workflowType?: string): boolean {
    if (error instanceof FailureError) return true
    if (this.failureErrorTypes.some((t) => error instanceof t)) return true

    const forType = workflowType === undefined ? undefined : this.perWorkflowType.get(workflowType)
    if (forType?.some((t) => error instanceof t)) return true

    return this.predicate?.(error, workflowType) ?? false
  }

  classify(error: unknown, workflowType?: string): TaskFailureOutcome {
    return this.isWorkflowFailure(error, workflowType) ? "fail_workflow" : "retry_task"
  }
}

/**
 * @example
 * ```ts
 * const policy = createWorkflowFailurePolicy({
 *   failureErrorTypes: [NondeterminismError],
 *   workflowFailureErrorTypes: { orderWorkflow: [InventoryMismatchError] },
 * })
 *
 * policy.classify(new TypeError("x"), "orderWorkflow") // "retry_task"
 * ```
 */
export function createWorkflowFailurePolicy(
  options: WorkflowFailurePolicyOptions = {},
): WorkflowFailurePolicy {
  return new DefaultWorkflowFailurePolicy(options)
}
