import type { FailureCode } from "../ports/error"
import type { WireFailure } from "../ports/failure"
import { BaseError } from "./base-error"

export type FailureErrorOptions = Readonly<{
  cause?: unknown
  /** Wire failure this error was decoded from. */
  failure?: WireFailure
  /** Stack trace reported by the process that raised the failure. */
  stackTrace?: string
}>

/**
 * Construction options shared by the taxonomy classes.
 *
 * `code` and `displayMessage` are set by subclasses; user code leaves them out.
 */
export type FailureErrorInit = FailureErrorOptions &
  Readonly<{
    code?: FailureCode
    displayMessage?: string
  }>

/**
 * Base class for errors that fail a workflow execution.
 *
 * Do not throw this directly: throw {@link ApplicationError} instead. Any
 * error that is not a `FailureError` fails only the current workflow task,
 * which is then retried.
 *
 * The converter constructs a bare `FailureError` when it decodes a wire
 * failure whose failure-info case it does not know.
 */
export class FailureError extends BaseError<FailureCode> {
  readonly failure?: WireFailure

  /** Text used by `toString()` and in the stack header. */
  readonly displayMessage: string

  /** Stack trace as reported by the raising process, kept verbatim (may be ""). */
  readonly stackTrace?: string

  constructor(message: string, options: FailureErrorInit = {}) {
    const displayMessage = options.displayMessage ?? message

    super(displayMessage, { code: options.code ?? "failure", cause: options.cause })

    // Error() stored the display text; `message` always holds the raw text.
    this.message = message
    this.displayMessage = displayMessage
    this.failure = options.failure
    this.stackTrace = options.stackTrace

    if (options.stackTrace) {
      this.stack = options.stackTrace
    }
  }

  override toString(): string {
    return `${this.name}: ${this.displayMessage}`
  }
}
