import { isRecord } from "./is-record"

/**
 * Whether `err` is the host's cooperative cancellation signal: the
 * `AbortError` DOMException that `AbortSignal` consumers (timers, fetch,
 * streams) reject with.
 */
export function isAbortError(err: unknown): boolean {
  return isRecord(err) && err.name === "AbortError"
}
