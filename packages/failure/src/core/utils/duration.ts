import type { WireDuration } from "../../ports/failure"
import type { Milliseconds } from "../../ports/time"

const NANOS_PER_MILLI = 1_000_000
const NANOS_PER_SECOND = 1_000_000_000

export function millisToWireDuration(ms: Milliseconds): WireDuration {
  const totalNanos = Math.round(ms * NANOS_PER_MILLI)
  const seconds = Math.floor(totalNanos / NANOS_PER_SECOND)
  return { seconds, nanos: totalNanos - seconds * NANOS_PER_SECOND }
}

export function wireDurationToMillis(d: WireDuration): Milliseconds {
  return d.seconds * 1000 + d.nanos / NANOS_PER_MILLI
}
