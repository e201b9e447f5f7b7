import { type Logger, NullLogger } from "@weft/logger"
import type { FailureInfo, WireFailure, WirePayloads } from "../../ports/failure"
import type { FailureConverter } from "../../ports/failure-converter"
import type { PayloadCodec } from "../../ports/payload-codec"
import { SuperjsonPayloadCodec } from "../codec/superjson-payload-codec"
import { retryStateFromWire, retryStateToWire } from "../enums/retry-state"
import { timeoutTypeFromWire, timeoutTypeToWire } from "../enums/timeout-type"
import { ActivityError } from "../errors/activity-error"
import { ApplicationError } from "../errors/application-error"
import { CancelledError } from "../errors/cancelled-error"
import { ChildWorkflowError } from "../errors/child-workflow-error"
import { ServerError } from "../errors/server-error"
import { TerminatedError } from "../errors/terminated-error"
import { TimeoutError } from "../errors/timeout-error"
import { FailureError } from "../failure-error"
import { millisToWireDuration, wireDurationToMillis } from "../utils/duration"
import { ensureFailureError } from "../utils/ensure-failure-error"
import { DEFAULT_MAX_CAUSE_DEPTH, walkErrorChain } from "../utils/error-chain"
import { isRecord } from "../utils/is-record"

export const DEFAULT_FAILURE_SOURCE = "TypeScriptSDK"
export const ENCODED_FAILURE_MESSAGE = "Encoded failure"

export type FailureConverterOptions = Readonly<{
  /** Codec for details and encoded attributes. Default: superjson. */
  payloadCodec?: PayloadCodec

  logger?: Logger

  /**
   * Longest cause chain converted in either direction; deeper links are
   * dropped and a warning is logged.
   * @default 50
   */
  maxCauseDepth?: number

  /**
   * When an error was decoded from a wire failure, emit that stored failure
   * verbatim instead of re-deriving it from the error's fields.
   * @default true
   */
  reuseStoredFailure?: boolean

  /**
   * Move `message` and `stackTrace` into `encodedAttributes` so that a
   * payload codec (e.g. an encrypting one) covers them.
   * @default false
   */
  encodeCommonAttributes?: boolean

  /** @default true */
  includeStackTrace?: boolean

  /** @default "TypeScriptSDK" */
  source?: string
}>

type CommonAttributes = { message: string; stackTrace: string }

export class DefaultFailureConverter implements FailureConverter {
  private readonly codec: PayloadCodec
  private readonly logger: Logger
  private readonly maxCauseDepth: number
  private readonly reuseStoredFailure: boolean
  private readonly encodeCommonAttributes: boolean
  private readonly includeStackTrace: boolean
  private readonly source: string

  constructor(options: FailureConverterOptions = {}) {
    this.codec = options.payloadCodec ?? new SuperjsonPayloadCodec()
    this.logger = (options.logger ?? new NullLogger()).child({ module: "failure-converter" })
    this.maxCauseDepth = options.maxCauseDepth ?? DEFAULT_MAX_CAUSE_DEPTH
    this.reuseStoredFailure = options.reuseStoredFailure ?? true
    this.encodeCommonAttributes = options.encodeCommonAttributes ?? false
    this.includeStackTrace = options.includeStackTrace ?? true
    this.source = options.source ?? DEFAULT_FAILURE_SOURCE
  }

  errorToFailure(error: unknown): WireFailure {
    const chain = walkErrorChain(error, this.maxCauseDepth)

    if (chain.truncated) {
      this.logger.warn("Failure cause chain truncated", {
        direction: "serialize",
        depth: chain.links.length,
      })
    }

    const errors = (chain.links.length > 0 ? chain.links : [error]).map(ensureFailureError)

    let end = errors.length
    let cause: WireFailure | undefined

    if (this.reuseStoredFailure) {
      const stored = errors.findIndex((e) => e.failure !== undefined)

      if (stored !== -1) {
        end = stored
        cause = errors[stored]?.failure
      }
    }

    for (let i = end - 1; i >= 0; i--) {
      const err = errors[i]
      if (err) cause = this.toFailure(err, cause)
    }

    // `errors` is never empty, so the loop or the stored failure assigned it.
    return cause ?? this.toFailure(ensureFailureError(error), undefined)
  }

  failureToError(failure: WireFailure): FailureError {
    const links = this.wireChain(failure)

    let cause: FailureError | undefined

    for (let i = links.length - 1; i >= 0; i--) {
      const link = links[i]
      if (link) cause = this.toError(link, cause)
    }

    return cause ?? this.toError(failure, undefined)
  }

  private wireChain(failure: WireFailure): WireFailure[] {
    const links: WireFailure[] = []
    const seen = new WeakSet<WireFailure>()

    let current: WireFailure | undefined = failure

    while (current) {
      if (links.length >= this.maxCauseDepth || seen.has(current)) {
        this.logger.warn("Failure cause chain truncated", {
          direction: "deserialize",
          depth: links.length,
        })
        break
      }

      seen.add(current)
      links.push(current)
      current = current.cause
    }

    return links
  }

  private toFailure(err: FailureError, cause: WireFailure | undefined): WireFailure {
    const failure: WireFailure = {
      message: err.message,
      source: this.source,
      stackTrace: this.includeStackTrace ? (err.stackTrace ?? err.stack ?? "") : "",
      ...(cause && { cause }),
      failureInfo: this.toFailureInfo(err),
    }

    return this.encodeCommonAttributes ? this.encodeAttributes(failure) : failure
  }

  private toFailureInfo(err: FailureError): FailureInfo {
    if (err instanceof ApplicationError) {
      return {
        case: "applicationFailureInfo",
        value: {
          type: err.type ?? "",
          nonRetryable: err.nonRetryable,
          ...this.detailsField("details", err.details),
          ...(err.nextRetryDelay !== undefined && {
            nextRetryDelay: millisToWireDuration(err.nextRetryDelay),
          }),
        },
      }
    }

    if (err instanceof TimeoutError) {
      return {
        case: "timeoutFailureInfo",
        value: {
          timeoutType: timeoutTypeToWire(err.type),
          ...this.detailsField("lastHeartbeatDetails", err.lastHeartbeatDetails),
        },
      }
    }

    if (err instanceof CancelledError) {
      return { case: "canceledFailureInfo", value: this.detailsField("details", err.details) }
    }

    if (err instanceof TerminatedError) {
      return { case: "terminatedFailureInfo", value: this.detailsField("details", err.details) }
    }

    if (err instanceof ServerError) {
      return { case: "serverFailureInfo", value: { nonRetryable: err.nonRetryable } }
    }

    if (err instanceof ActivityError) {
      return {
        case: "activityFailureInfo",
        value: {
          scheduledEventId: err.scheduledEventId,
          startedEventId: err.startedEventId,
          identity: err.identity,
          activityType: { name: err.activityType },
          activityId: err.activityId,
          retryState: retryStateToWire(err.retryState),
        },
      }
    }

    if (err instanceof ChildWorkflowError) {
      return {
        case: "childWorkflowExecutionFailureInfo",
        value: {
          namespace: err.namespace,
          workflowExecution: { workflowId: err.workflowId, runId: err.runId },
          workflowType: { name: err.workflowType },
          initiatedEventId: err.initiatedEventId,
          startedEventId: err.startedEventId,
          retryState: retryStateToWire(err.retryState),
        },
      }
    }

    // Generic failures and WorkflowAlreadyStartedError have no failure info.
    return { case: undefined }
  }

  private toError(failure: WireFailure, cause: FailureError | undefined): FailureError {
    const { message, stackTrace } = this.decodeAttributes(failure)
    const common = { cause, failure, stackTrace }
    const info: FailureInfo = failure.failureInfo ?? { case: undefined }

    switch (info.case) {
      case "applicationFailureInfo":
        return new ApplicationError(message, {
          ...common,
          type: info.value.type || undefined,
          details: this.fromPayloads(info.value.details),
          nonRetryable: info.value.nonRetryable,
          nextRetryDelay: info.value.nextRetryDelay
            ? wireDurationToMillis(info.value.nextRetryDelay)
            : undefined,
        })

      case "timeoutFailureInfo":
        return new TimeoutError(message, {
          ...common,
          type: timeoutTypeFromWire(info.value.timeoutType),
          lastHeartbeatDetails: this.fromPayloads(info.value.lastHeartbeatDetails),
        })

      case "canceledFailureInfo":
        return new CancelledError(message, {
          ...common,
          details: this.fromPayloads(info.value.details),
        })

      case "terminatedFailureInfo":
        return new TerminatedError(message, {
          ...common,
          details: this.fromPayloads(info.value.details),
        })

      case "serverFailureInfo":
        return new ServerError(message, { ...common, nonRetryable: info.value.nonRetryable })

      case "activityFailureInfo":
        return new ActivityError(message, {
          ...common,
          scheduledEventId: info.value.scheduledEventId,
          startedEventId: info.value.startedEventId,
          identity: info.value.identity,
          activityType: info.value.activityType.name,
          activityId: info.value.activityId,
          retryState: retryStateFromWire(info.value.retryState),
        })

      case "childWorkflowExecutionFailureInfo":
        return new ChildWorkflowError(message, {
          ...common,
          namespace: info.value.namespace,
          workflowId: info.value.workflowExecution.workflowId,
          runId: info.value.workflowExecution.runId,
          workflowType: info.value.workflowType.name,
          initiatedEventId: info.value.initiatedEventId,
          startedEventId: info.value.startedEventId,
          retryState: retryStateFromWire(info.value.retryState),
        })

      default:
        this.logger.debug("Decoding failure without mapped failure info", {
          failureInfoCase: info.case ?? "none",
        })
        return new FailureError(message, { failure, stackTrace })
    }
  }

  private detailsField<K extends string>(
    key: K,
    values: readonly unknown[],
  ): Partial<Record<K, WirePayloads>> {
    if (values.length === 0) return {}
    const field: Partial<Record<K, WirePayloads>> = {}
    field[key] = { payloads: values.map((v) => this.codec.encode(v)) }
    return field
  }

  private fromPayloads(payloads: WirePayloads | undefined): unknown[] {
    return payloads ? payloads.payloads.map((p) => this.codec.decode(p)) : []
  }

  private encodeAttributes(failure: WireFailure): WireFailure {
    return {
      ...failure,
      message: ENCODED_FAILURE_MESSAGE,
      stackTrace: "",
      encodedAttributes: this.codec.encode({
        message: failure.message,
        stack_trace: failure.stackTrace ?? "",
      }),
    }
  }

  private decodeAttributes(failure: WireFailure): CommonAttributes {
    const plain = { message: failure.message, stackTrace: failure.stackTrace ?? "" }

    if (!failure.encodedAttributes) return plain

    const decoded = this.codec.decode(failure.encodedAttributes)

    if (!isRecord(decoded) || typeof decoded.message !== "string") {
      this.logger.warn("Ignoring undecodable encoded failure attributes")
      return plain
    }

    return {
      message: decoded.message,
      stackTrace: typeof decoded.stack_trace === "string" ? decoded.stack_trace : "",
    }
  }
}

export function createFailureConverter(options?: FailureConverterOptions): FailureConverter {
  return new DefaultFailureConverter(options)
}
