import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

type ZodIssueLike = {
  path: readonly PropertyKey[]
  message: string
}

export type WireFormatIssue = { path: string; message: string }

export type WireFormatErrorContext = ErrorContext & {
  issues: WireFormatIssue[]
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/** Raised when an untyped value does not have the shape of a wire failure. */
export class WireFormatError extends BaseError<"invalid_wire_failure"> {
  declare readonly context: WireFormatErrorContext

  constructor(message: string, issues: WireFormatIssue[]) {
    super(message, { code: "invalid_wire_failure", context: { issues } })
  }

  static fromZodIssues(issues: readonly ZodIssueLike[]): WireFormatError {
    const mapped = issues.map((i) => ({ path: formatPath(i.path), message: i.message }))
    const first = mapped[0]
    const message = first
      ? `Invalid wire failure at ${first.path || "<root>"}: ${first.message}`
      : "Invalid wire failure"

    return new WireFormatError(message, mapped)
  }
}
