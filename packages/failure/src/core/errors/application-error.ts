import type { Milliseconds } from "../../ports/time"
import { FailureError, type FailureErrorOptions } from "../failure-error"

export type ApplicationErrorOptions = FailureErrorOptions &
  Readonly<{
    /** Application-defined category, e.g. "PaymentDeclined". */
    type?: string
    details?: readonly unknown[]
    nonRetryable?: boolean
    /** Delay before the next activity retry attempt. */
    nextRetryDelay?: Milliseconds
  }>

/**
 * Thrown from workflow or activity code to fail the execution with an
 * application-level error.
 *
 * This is the only failure type user code is expected to throw.
 *
 * @example
 * ```ts
 * if (distanceKm > 25) {
 *   throw new ApplicationError("Customer lives outside the service area", {
 *     type: "OutOfServiceArea",
 *     nonRetryable: true,
 *   })
 * }
 * ```
 */
export class ApplicationError extends FailureError {
  declare readonly code: "application_error"

  readonly type?: string
  readonly details: readonly unknown[]

  /**
   * Whether the error was marked non-retryable when created.
   *
   * Advisory only: the retry policy evaluator decides whether a retry happens.
   */
  readonly nonRetryable: boolean

  readonly nextRetryDelay?: Milliseconds

  constructor(message: string, options: ApplicationErrorOptions = {}) {
    super(message, {
      ...options,
      code: "application_error",
      displayMessage: options.type ? `${options.type}: ${message}` : message,
    })

    this.type = options.type
    this.details = Object.freeze([...(options.details ?? [])])
    this.nonRetryable = options.nonRetryable ?? false
    this.nextRetryDelay = options.nextRetryDelay
  }

  static retryable(message: string, ...details: unknown[]): ApplicationError {
    return new ApplicationError(message, { details, nonRetryable: false })
  }

  static nonRetryable(message: string, ...details: unknown[]): ApplicationError {
    return new ApplicationError(message, { details, nonRetryable: true })
  }
}
