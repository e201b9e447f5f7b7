/**
 * Wire contract for failures exchanged with the orchestration backend.
 *
 * Shapes mirror the protocol's `Failure` message as TypeScript protobuf
 * runtimes expose it: camelCase fields, and the `failure_info` oneof as a
 * `{ case, value }` union. Binary encoding is owned by the transport.
 */

export type WirePayload = Readonly<{
  metadata: Readonly<Record<string, Uint8Array>>
  data: Uint8Array
}>

export type WirePayloads = Readonly<{
  payloads: readonly WirePayload[]
}>

export type WireDuration = Readonly<{
  seconds: number
  nanos: number
}>

export type ApplicationFailureInfo = Readonly<{
  /** Empty string when no type was given. */
  type: string
  nonRetryable: boolean
  details?: WirePayloads
  nextRetryDelay?: WireDuration
}>

export type TimeoutFailureInfo = Readonly<{
  /** Protocol `TimeoutType` code; 0 is unspecified. */
  timeoutType: number
  lastHeartbeatDetails?: WirePayloads
}>

export type CanceledFailureInfo = Readonly<{
  details?: WirePayloads
}>

export type TerminatedFailureInfo = Readonly<{
  details?: WirePayloads
}>

export type ServerFailureInfo = Readonly<{
  nonRetryable: boolean
}>

export type ResetWorkflowFailureInfo = Readonly<{
  lastHeartbeatDetails?: WirePayloads
}>

export type ActivityFailureInfo = Readonly<{
  scheduledEventId: number
  startedEventId: number
  identity: string
  activityType: Readonly<{ name: string }>
  activityId: string
  /** Protocol `RetryState` code; 0 is unspecified. */
  retryState: number
}>

export type ChildWorkflowExecutionFailureInfo = Readonly<{
  namespace: string
  workflowExecution: Readonly<{ workflowId: string; runId: string }>
  workflowType: Readonly<{ name: string }>
  initiatedEventId: number
  startedEventId: number
  retryState: number
}>

export type NexusOperationFailureInfo = Readonly<{
  scheduledEventId: number
  endpoint: string
  service: string
  operation: string
  operationToken: string
}>

export type NexusHandlerFailureInfo = Readonly<{
  type: string
}>

export type FailureInfo =
  | { readonly case: "applicationFailureInfo"; readonly value: ApplicationFailureInfo }
  | { readonly case: "timeoutFailureInfo"; readonly value: TimeoutFailureInfo }
  | { readonly case: "canceledFailureInfo"; readonly value: CanceledFailureInfo }
  | { readonly case: "terminatedFailureInfo"; readonly value: TerminatedFailureInfo }
  | { readonly case: "serverFailureInfo"; readonly value: ServerFailureInfo }
  | { readonly case: "resetWorkflowFailureInfo"; readonly value: ResetWorkflowFailureInfo }
  | { readonly case: "activityFailureInfo"; readonly value: ActivityFailureInfo }
  | {
      readonly case: "childWorkflowExecutionFailureInfo"
      readonly value: ChildWorkflowExecutionFailureInfo
    }
  | {
      readonly case: "nexusOperationExecutionFailureInfo"
      readonly value: NexusOperationFailureInfo
    }
  | { readonly case: "nexusHandlerFailureInfo"; readonly value: NexusHandlerFailureInfo }
  | { readonly case: undefined; readonly value?: undefined }

export type FailureInfoCase = Exclude<FailureInfo["case"], undefined>

export type WireFailure = Readonly<{
  message: string
  /** Which SDK produced the failure, e.g. "TypeScriptSDK". */
  source?: string
  stackTrace?: string
  /**
   * When set, `message` and `stackTrace` were moved into this payload and the
   * top-level fields hold placeholders.
   */
  encodedAttributes?: WirePayload
  cause?: WireFailure
  failureInfo?: FailureInfo
}>
