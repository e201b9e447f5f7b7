import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*: which levels are emitted and whether output
 * is rendered for humans. Adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Leave disabled in production, where JSON lines are expected.
   */
  prettify?: boolean
}
