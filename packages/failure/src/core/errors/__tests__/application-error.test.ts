import { FailureError } from "../../failure-error"
import { ApplicationError } from "../application-error"

describe("ApplicationError", () => {
  it("prefixes the display message with the type", () => {
    const err = new ApplicationError("card declined", { type: "PaymentDeclined" })

    expect(err.message).toBe("card declined")
    expect(err.displayMessage).toBe("PaymentDeclined: card declined")
    expect(String(err)).toBe("ApplicationError: PaymentDeclined: card declined")
  })

  it("shows the bare message without a type", () => {
    const err = new ApplicationError("card declined")

    expect(err.type).toBeUndefined()
    expect(err.displayMessage).toBe("card declined")
  })

  it("has sensible defaults", () => {
    const err = new ApplicationError("x")

    expect(err.code).toBe("application_error")
    expect(err.details).toEqual([])
    expect(err.nonRetryable).toBe(false)
    expect(err.nextRetryDelay).toBeUndefined()
    expect(err).toBeInstanceOf(FailureError)
  })

  it("stores a frozen copy of the details", () => {
    const details: unknown[] = [{ orderId: "o-1" }, 3]
    const err = new ApplicationError("x", { details })

    details.push("late")

    expect(err.details).toEqual([{ orderId: "o-1" }, 3])
    expect(Object.isFrozen(err.details)).toBe(true)
  })

  it("keeps nextRetryDelay in milliseconds", () => {
    expect(new ApplicationError("x", { nextRetryDelay: 2500 }).nextRetryDelay).toBe(2500)
  })

  describe("factories", () => {
    it("retryable() builds a retryable error with details", () => {
      const err = ApplicationError.retryable("try again", "a", 1)

      expect(err.nonRetryable).toBe(false)
      expect(err.details).toEqual(["a", 1])
      expect(err.type).toBeUndefined()
    })

    it("nonRetryable() builds a non-retryable error with details", () => {
      const err = ApplicationError.nonRetryable("give up", { reason: "fraud" })

      expect(err.nonRetryable).toBe(true)
      expect(err.details).toEqual([{ reason: "fraud" }])
    })
  })
})
