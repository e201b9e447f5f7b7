import { createPinoLogger, type Logger } from "@weft/logger"
import { z } from "zod"
import {
  createFailureConverter,
  type FailureConverterOptions,
} from "../core/converter/default-failure-converter"
import { ConfigurationError } from "../core/errors/configuration-error"
import type { FailureConverter } from "../ports/failure-converter"
import type { PayloadCodec } from "../ports/payload-codec"
import {
  type FailureConverterConfig,
  type FailureConverterConfigKey,
  failureConverterConfigSchema,
} from "./schema"
import { type ConfigSource, EnvSource } from "./source"

export type LoadedFailureConverterConfig = Readonly<{
  value: Readonly<FailureConverterConfig>

  /** Which source provided the final value for a key ("default" for schema defaults). */
  explain(key: FailureConverterConfigKey): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys provided by sources that the schema does not define. */
  unknownKeys(): string[]
}>

export type LoadFailureConverterConfigOptions = {
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

export async function loadFailureConverterConfig({
  sources,
}: LoadFailureConverterConfigOptions = {}): Promise<LoadedFailureConverterConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = failureConverterConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Failure converter configuration is invalid:\n${z.prettifyError(result.error)}`,
      resolvedSources.map((s) => s.name),
    )
  }

  const value = Object.freeze(result.data)
  const schemaKeys = new Set(Object.keys(failureConverterConfigSchema.shape))

  return {
    value,
    explain: (key) => provenance[key] ?? "default",
    sourcesUsed: () => [
      ...new Set(
        Object.keys(value).map((key) => provenance[key] ?? "default"),
      ),
    ],
    unknownKeys: () => Object.keys(merged).filter((key) => !schemaKeys.has(key)),
  }
}

export function toFailureConverterOptions(
  config: Readonly<FailureConverterConfig>,
): FailureConverterOptions {
  return {
    maxCauseDepth: config.MAX_CAUSE_DEPTH,
    reuseStoredFailure: config.REUSE_STORED_FAILURE,
    encodeCommonAttributes: config.ENCODE_COMMON_ATTRIBUTES,
    includeStackTrace: config.INCLUDE_STACK_TRACE,
  }
}

export type FailureConverterDeps = {
  /** Defaults to a pino logger at the configured level. */
  logger?: Logger
  payloadCodec?: PayloadCodec
}

export function createFailureConverterFromConfig(
  config: LoadedFailureConverterConfig,
  deps: FailureConverterDeps = {},
): FailureConverter {
  return createFailureConverter({
    ...toFailureConverterOptions(config.value),
    logger: deps.logger ?? createPinoLogger({}, { level: config.value.LOG_LEVEL }),
    payloadCodec: deps.payloadCodec,
  })
}
