/**
 * Kind of timeout reported by a {@link TimeoutError}.
 *
 * Values are the protocol's `TimeoutType` codes and are sent on the wire as-is.
 */
export const TimeoutType = {
  START_TO_CLOSE: 1,
  SCHEDULE_TO_START: 2,
  SCHEDULE_TO_CLOSE: 3,
  HEARTBEAT: 4,
} as const

export type TimeoutType = (typeof TimeoutType)[keyof typeof TimeoutType]

export type TimeoutTypeName = keyof typeof TimeoutType

/** Protocol code meaning "no timeout type". */
export const TIMEOUT_TYPE_UNSPECIFIED = 0

const names: Readonly<Record<TimeoutType, TimeoutTypeName>> = {
  [TimeoutType.START_TO_CLOSE]: "START_TO_CLOSE",
  [TimeoutType.SCHEDULE_TO_START]: "SCHEDULE_TO_START",
  [TimeoutType.SCHEDULE_TO_CLOSE]: "SCHEDULE_TO_CLOSE",
  [TimeoutType.HEARTBEAT]: "HEARTBEAT",
}

const byCode: ReadonlyMap<number, TimeoutType> = new Map(
  Object.values(TimeoutType).map((code): [number, TimeoutType] => [code, code]),
)

/**
 * Map a wire code to a TimeoutType.
 * Unspecified and unknown codes (e.g. from a newer server) yield `undefined`.
 */
export function timeoutTypeFromWire(code: number | null | undefined): TimeoutType | undefined {
  return code == null ? undefined : byCode.get(code)
}

export function timeoutTypeToWire(type: TimeoutType | undefined): number {
  return type ?? TIMEOUT_TYPE_UNSPECIFIED
}

export function timeoutTypeName(type: TimeoutType): TimeoutTypeName {
  return names[type]
}
