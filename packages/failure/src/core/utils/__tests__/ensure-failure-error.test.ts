import { ApplicationError } from "../../errors/application-error"
import { CancelledError } from "../../errors/cancelled-error"
import { TerminatedError } from "../../errors/terminated-error"
import { ensureFailureError, NON_ERROR_THROWN_TYPE } from "../ensure-failure-error"
import { isFailureError } from "../is-failure-error"

describe("ensureFailureError", () => {
  it("returns failure errors unchanged", () => {
    const err = new TerminatedError("terminated")

    expect(ensureFailureError(err)).toBe(err)
  })

  it("converts an Error to an ApplicationError typed by its name", () => {
    const cause = new Error("root")
    const original = new TypeError("bad input", { cause })

    const err = ensureFailureError(original)

    expect(err).toBeInstanceOf(ApplicationError)
    expect(err.message).toBe("bad input")
    expect(err.displayMessage).toBe("TypeError: bad input")
    expect(err.cause).toBe(cause)
    expect(err.stack).toBe(original.stack)
  })

  it("converts an AbortError to a CancelledError", () => {
    const abort = new Error("The operation was aborted")
    abort.name = "AbortError"

    const err = ensureFailureError(abort)

    expect(err).toBeInstanceOf(CancelledError)
    expect(err.message).toBe("The operation was aborted")
  })

  it("uses the default cancellation message for an empty abort message", () => {
    const abort = new Error("")
    abort.name = "AbortError"

    expect(ensureFailureError(abort).message).toBe("Cancelled")
  })

  it("wraps a thrown string", () => {
    const err = ensureFailureError("out of stock")

    expect(err).toBeInstanceOf(ApplicationError)
    expect(err.message).toBe("out of stock")
    expect(err.displayMessage).toBe(`${NON_ERROR_THROWN_TYPE}: out of stock`)
  })

  it("wraps other thrown values", () => {
    const err = ensureFailureError({ code: 42 })

    expect(err.message).toBe("Unknown error")
  })
})

describe("isFailureError", () => {
  it("narrows failure errors", () => {
    expect(isFailureError(new CancelledError())).toBe(true)
    expect(isFailureError(new Error("x"))).toBe(false)
    expect(isFailureError(undefined)).toBe(false)
  })
})
