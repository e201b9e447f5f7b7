import {
  TIMEOUT_TYPE_UNSPECIFIED,
  TimeoutType,
  timeoutTypeFromWire,
  timeoutTypeName,
  timeoutTypeToWire,
} from "../timeout-type"

describe("TimeoutType", () => {
  it("uses the protocol codes", () => {
    expect(TimeoutType).toEqual({
      START_TO_CLOSE: 1,
      SCHEDULE_TO_START: 2,
      SCHEDULE_TO_CLOSE: 3,
      HEARTBEAT: 4,
    })
    expect(TIMEOUT_TYPE_UNSPECIFIED).toBe(0)
  })

  it("decodes known codes", () => {
    expect(timeoutTypeFromWire(1)).toBe(TimeoutType.START_TO_CLOSE)
    expect(timeoutTypeFromWire(4)).toBe(TimeoutType.HEARTBEAT)
  })

  it.each([0, 5, 99, -1, null, undefined])("decodes %s to undefined", (code) => {
    expect(timeoutTypeFromWire(code)).toBeUndefined()
  })

  it("encodes undefined as the unspecified code", () => {
    expect(timeoutTypeToWire(undefined)).toBe(0)
    expect(timeoutTypeToWire(TimeoutType.SCHEDULE_TO_CLOSE)).toBe(3)
  })

  it("names a type", () => {
    expect(timeoutTypeName(TimeoutType.SCHEDULE_TO_START)).toBe("SCHEDULE_TO_START")
  })
})
