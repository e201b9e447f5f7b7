import { isRecord } from "./is-record"

export const DEFAULT_MAX_CAUSE_DEPTH = 50

export type ErrorChain = {
  /** Values from the outermost error inwards. */
  links: unknown[]
  /**
   * `true` when the walk stopped before the end of the chain, because a
   * value repeated (a cycle) or the depth limit was reached.
   */
  truncated: boolean
}

function getCause(v: unknown): unknown {
  return isRecord(v) ? v.cause : undefined
}

/**
 * Walk a `cause` chain and report whether it was cut short.
 *
 * Works for thrown values and wire failures alike, since both link through
 * a `cause` property. Cycles are detected by identity.
 */
export function walkErrorChain(
  err: unknown,
  maxDepth: number = DEFAULT_MAX_CAUSE_DEPTH,
): ErrorChain {
  const links: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null) {
    if (links.length >= maxDepth) return { links, truncated: true }

    if (typeof current === "object") {
      if (seen.has(current)) return { links, truncated: true }
      seen.add(current)
    }

    links.push(current)
    current = getCause(current)
  }

  return { links, truncated: false }
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * @example
 * ```ts
 * catch (err) {
 *   for (const e of errorChain(err)) {
 *     console.log(e instanceof Error ? e.message : e)
 *   }
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = DEFAULT_MAX_CAUSE_DEPTH): unknown[] {
  return walkErrorChain(err, maxDepth).links
}
