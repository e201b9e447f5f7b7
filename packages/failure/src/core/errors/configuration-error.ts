import { BaseError } from "../base-error"

/** Raised when converter configuration fails validation. */
export class ConfigurationError extends BaseError<"invalid_config"> {
  constructor(message: string, sources: readonly string[]) {
    super(message, { code: "invalid_config", context: { sources: [...sources] } })
  }
}
