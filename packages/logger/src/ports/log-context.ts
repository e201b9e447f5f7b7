/**
 * Fields that identify where a log entry was produced.
 *
 * Workflow and activity fields are filled by whoever scopes the logger, usually
 * through `child()` at the start of a task.
 */
export type LogContext = {
  namespace: string
  taskQueue: string

  workflowId: string
  runId: string
  workflowType: string

  activityId: string
  activityType: string
  attempt: number

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
