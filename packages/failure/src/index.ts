export {
  createFailureConverterFromConfig,
  type FailureConverterDeps,
  type LoadedFailureConverterConfig,
  type LoadFailureConverterConfigOptions,
  loadFailureConverterConfig,
  toFailureConverterOptions,
} from "./config/load-failure-converter-config"
export {
  type FailureConverterConfig,
  type FailureConverterConfigKey,
  failureConverterConfigSchema,
} from "./config/schema"
export {
  type ConfigSource,
  DEFAULT_ENV_PREFIX,
  EnvSource,
  type EnvSourceOptions,
  ObjectSource,
} from "./config/source"
export { BaseError, type BaseErrorOptions } from "./core/base-error"
export {
  createSuperjsonPayloadCodec,
  ENCODING_METADATA_KEY,
  SUPERJSON_ENCODING,
  SuperjsonPayloadCodec,
} from "./core/codec/superjson-payload-codec"
export {
  createFailureConverter,
  DEFAULT_FAILURE_SOURCE,
  DefaultFailureConverter,
  ENCODED_FAILURE_MESSAGE,
  type FailureConverterOptions,
} from "./core/converter/default-failure-converter"
export { parseWireFailure, wireFailureSchema } from "./core/converter/parse-wire-failure"
export {
  RETRY_STATE_UNSPECIFIED,
  RetryState,
  type RetryStateName,
  retryStateFromWire,
  retryStateName,
  retryStateToWire,
} from "./core/enums/retry-state"
export {
  TIMEOUT_TYPE_UNSPECIFIED,
  TimeoutType,
  type TimeoutTypeName,
  timeoutTypeFromWire,
  timeoutTypeName,
  timeoutTypeToWire,
} from "./core/enums/timeout-type"
export { ActivityError, type ActivityErrorOptions } from "./core/errors/activity-error"
export { ApplicationError, type ApplicationErrorOptions } from "./core/errors/application-error"
export { CancelledError, type CancelledErrorOptions } from "./core/errors/cancelled-error"
export {
  ChildWorkflowError,
  type ChildWorkflowErrorOptions,
} from "./core/errors/child-workflow-error"
export { ConfigurationError } from "./core/errors/configuration-error"
export {
  NondeterminismError,
  type NondeterminismErrorOptions,
} from "./core/errors/nondeterminism-error"
export { ServerError, type ServerErrorOptions } from "./core/errors/server-error"
export { TerminatedError, type TerminatedErrorOptions } from "./core/errors/terminated-error"
export { TimeoutError, type TimeoutErrorOptions } from "./core/errors/timeout-error"
export {
  WireFormatError,
  type WireFormatErrorContext,
  type WireFormatIssue,
} from "./core/errors/wire-format-error"
export {
  WorkflowAlreadyStartedError,
  type WorkflowAlreadyStartedErrorOptions,
} from "./core/errors/workflow-already-started-error"
export {
  FailureError,
  type FailureErrorInit,
  type FailureErrorOptions,
} from "./core/failure-error"
export {
  createWorkflowFailurePolicy,
  type ErrorClass,
  type TaskFailureOutcome,
  type WorkflowFailurePolicy,
  type WorkflowFailurePolicyOptions,
  type WorkflowFailurePredicate,
} from "./core/policy/workflow-failure-policy"
export { millisToWireDuration, wireDurationToMillis } from "./core/utils/duration"
export { ensureFailureError, NON_ERROR_THROWN_TYPE } from "./core/utils/ensure-failure-error"
export {
  DEFAULT_MAX_CAUSE_DEPTH,
  type ErrorChain,
  errorChain,
  walkErrorChain,
} from "./core/utils/error-chain"
export { isAbortError } from "./core/utils/is-abort-error"
export { isCancellation } from "./core/utils/is-cancellation"
export { isFailureError } from "./core/utils/is-failure-error"
export type { ErrorCode, ErrorContext, FailureCode } from "./ports/error"
export type * from "./ports/failure"
export type { FailureConverter } from "./ports/failure-converter"
export type { PayloadCodec } from "./ports/payload-codec"
export type { Milliseconds } from "./ports/time"
