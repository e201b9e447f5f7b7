import { ActivityError } from "../errors/activity-error"
import { CancelledError } from "../errors/cancelled-error"
import { ChildWorkflowError } from "../errors/child-workflow-error"
import { isAbortError } from "./is-abort-error"

/**
 * Whether `err` represents cancellation.
 *
 * True for an `AbortError`, a {@link CancelledError}, or an
 * {@link ActivityError} / {@link ChildWorkflowError} whose direct cause is a
 * `CancelledError`. Only one level of cause is inspected: an activity error
 * wrapping another wrapper is not a cancellation.
 *
 * @example
 * ```ts
 * try {
 *   await chargeCard(order)
 * } catch (err) {
 *   if (isCancellation(err)) await releaseHold(order)
 *   throw err
 * }
 * ```
 */
export function isCancellation(err: unknown): boolean {
  return (
    isAbortError(err) ||
    err instanceof CancelledError ||
    ((err instanceof ActivityError || err instanceof ChildWorkflowError) &&
      err.cause instanceof CancelledError)
  )
}
