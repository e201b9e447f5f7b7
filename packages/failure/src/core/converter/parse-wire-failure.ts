import { z } from "zod"
import type { FailureInfo, FailureInfoCase, WireFailure } from "../../ports/failure"
import { WireFormatError } from "../errors/wire-format-error"
import { isRecord } from "../utils/is-record"

const bytes = z.instanceof(Uint8Array)

const payload = z.object({
  metadata: z.record(z.string(), bytes),
  data: bytes,
})

const payloads = z.object({ payloads: z.array(payload) })

const duration = z.object({
  seconds: z.number(),
  nanos: z.number().int(),
})

const named = z.object({ name: z.string() })

const failureInfo = z.union([
  z.object({
    case: z.literal("applicationFailureInfo"),
    value: z.object({
      type: z.string(),
      nonRetryable: z.boolean(),
      details: payloads.optional(),
      nextRetryDelay: duration.optional(),
    }),
  }),
  z.object({
    case: z.literal("timeoutFailureInfo"),
    value: z.object({
      timeoutType: z.number().int(),
      lastHeartbeatDetails: payloads.optional(),
    }),
  }),
  z.object({
    case: z.literal("canceledFailureInfo"),
    value: z.object({ details: payloads.optional() }),
  }),
  z.object({
    case: z.literal("terminatedFailureInfo"),
    value: z.object({ details: payloads.optional() }),
  }),
  z.object({
    case: z.literal("serverFailureInfo"),
    value: z.object({ nonRetryable: z.boolean() }),
  }),
  z.object({
    case: z.literal("resetWorkflowFailureInfo"),
    value: z.object({ lastHeartbeatDetails: payloads.optional() }),
  }),
  z.object({
    case: z.literal("activityFailureInfo"),
    value: z.object({
      scheduledEventId: z.number().int(),
      startedEventId: z.number().int(),
      identity: z.string(),
      activityType: named,
      activityId: z.string(),
      retryState: z.number().int(),
    }),
  }),
  z.object({
    case: z.literal("childWorkflowExecutionFailureInfo"),
    value: z.object({
      namespace: z.string(),
      workflowExecution: z.object({ workflowId: z.string(), runId: z.string() }),
      workflowType: named,
      initiatedEventId: z.number().int(),
      startedEventId: z.number().int(),
      retryState: z.number().int(),
    }),
  }),
  z.object({
    case: z.literal("nexusOperationExecutionFailureInfo"),
    value: z.object({
      scheduledEventId: z.number().int(),
      endpoint: z.string(),
      service: z.string(),
      operation: z.string(),
      operationToken: z.string(),
    }),
  }),
  z.object({
    case: z.literal("nexusHandlerFailureInfo"),
    value: z.object({ type: z.string() }),
  }),
  z.object({ case: z.undefined(), value: z.undefined().optional() }),
])

const knownCases: ReadonlySet<unknown> = new Set<FailureInfoCase>([
  "applicationFailureInfo",
  "timeoutFailureInfo",
  "canceledFailureInfo",
  "terminatedFailureInfo",
  "serverFailureInfo",
  "resetWorkflowFailureInfo",
  "activityFailureInfo",
  "childWorkflowExecutionFailureInfo",
  "nexusOperationExecutionFailureInfo",
  "nexusHandlerFailureInfo",
])

const UNSET_INFO: FailureInfo = { case: undefined }

// A case this version does not know is dropped, like an unknown oneof member.
const lenientFailureInfo = z.preprocess(
  (v) => (isRecord(v) && !knownCases.has(v.case) ? UNSET_INFO : v),
  failureInfo,
)

export const wireFailureSchema: z.ZodType<WireFailure> = z.lazy(() =>
  z.object({
    message: z.string(),
    source: z.string().optional(),
    stackTrace: z.string().optional(),
    encodedAttributes: payload.optional(),
    cause: wireFailureSchema.optional(),
    failureInfo: lenientFailureInfo.optional(),
  }),
)

/**
 * Validate an untyped value (e.g. a decoded JSON message) as a wire failure.
 *
 * @throws {WireFormatError} when the value does not have the failure shape.
 */
export function parseWireFailure(input: unknown): WireFailure {
  const result = wireFailureSchema.safeParse(input)

  if (!result.success) {
    throw WireFormatError.fromZodIssues(result.error.issues)
  }

  return result.data
}
