import {
  RETRY_STATE_UNSPECIFIED,
  RetryState,
  retryStateFromWire,
  retryStateName,
  retryStateToWire,
} from "../retry-state"

describe("RetryState", () => {
  it("uses the protocol codes", () => {
    expect(RetryState).toEqual({
      IN_PROGRESS: 1,
      NON_RETRYABLE_FAILURE: 2,
      TIMEOUT: 3,
      MAXIMUM_ATTEMPTS_REACHED: 4,
      RETRY_POLICY_NOT_SET: 5,
      INTERNAL_SERVER_ERROR: 6,
      CANCEL_REQUESTED: 7,
    })
    expect(RETRY_STATE_UNSPECIFIED).toBe(0)
  })

  it("decodes every known code", () => {
    for (const state of Object.values(RetryState)) {
      expect(retryStateFromWire(state)).toBe(state)
    }
  })

  it.each([0, 8, 1000, null, undefined])("decodes %s to undefined", (code) => {
    expect(retryStateFromWire(code)).toBeUndefined()
  })

  it("encodes undefined as the unspecified code", () => {
    expect(retryStateToWire(undefined)).toBe(0)
    expect(retryStateToWire(RetryState.MAXIMUM_ATTEMPTS_REACHED)).toBe(4)
  })

  it("names a state", () => {
    expect(retryStateName(RetryState.CANCEL_REQUESTED)).toBe("CANCEL_REQUESTED")
  })
})
