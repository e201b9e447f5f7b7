export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (IDs, issues, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Codes of the failure taxonomy. Each concrete failure class carries exactly
 * one of these, so `code` discriminates the closed variant set.
 */
export type FailureCode =
  | "failure"
  | "application_error"
  | "cancelled"
  | "terminated"
  | "timeout"
  | "server_error"
  | "activity_error"
  | "child_workflow_error"
  | "workflow_already_started"
