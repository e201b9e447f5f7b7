/**
 * Why a retryable activity or child workflow stopped retrying.
 *
 * Values are the protocol's `RetryState` codes and are sent on the wire as-is.
 */
export const RetryState = {
  IN_PROGRESS: 1,
  NON_RETRYABLE_FAILURE: 2,
  TIMEOUT: 3,
  MAXIMUM_ATTEMPTS_REACHED: 4,
  RETRY_POLICY_NOT_SET: 5,
  INTERNAL_SERVER_ERROR: 6,
  CANCEL_REQUESTED: 7,
} as const

export type RetryState = (typeof RetryState)[keyof typeof RetryState]

export type RetryStateName = keyof typeof RetryState

/** Protocol code meaning "no retry state". */
export const RETRY_STATE_UNSPECIFIED = 0

const names: Readonly<Record<RetryState, RetryStateName>> = {
  [RetryState.IN_PROGRESS]: "IN_PROGRESS",
  [RetryState.NON_RETRYABLE_FAILURE]: "NON_RETRYABLE_FAILURE",
  [RetryState.TIMEOUT]: "TIMEOUT",
  [RetryState.MAXIMUM_ATTEMPTS_REACHED]: "MAXIMUM_ATTEMPTS_REACHED",
  [RetryState.RETRY_POLICY_NOT_SET]: "RETRY_POLICY_NOT_SET",
  [RetryState.INTERNAL_SERVER_ERROR]: "INTERNAL_SERVER_ERROR",
  [RetryState.CANCEL_REQUESTED]: "CANCEL_REQUESTED",
}

const byCode: ReadonlyMap<number, RetryState> = new Map(
  Object.values(RetryState).map((code): [number, RetryState] => [code, code]),
)

/**
 * Map a wire code to a RetryState.
 * Unspecified and unknown codes yield `undefined`.
 */
export function retryStateFromWire(code: number | null | undefined): RetryState | undefined {
  return code == null ? undefined : byCode.get(code)
}

export function retryStateToWire(state: RetryState | undefined): number {
  return state ?? RETRY_STATE_UNSPECIFIED
}

export function retryStateName(state: RetryState): RetryStateName {
  return names[state]
}
