import { logLevelNames } from "@weft/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

export const failureConverterConfigSchema = z.object({
  MAX_CAUSE_DEPTH: z.coerce.number().int().positive().default(50),
  REUSE_STORED_FAILURE: flag.default(true),
  ENCODE_COMMON_ATTRIBUTES: flag.default(false),
  INCLUDE_STACK_TRACE: flag.default(true),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type FailureConverterConfig = z.infer<typeof failureConverterConfigSchema>

export type FailureConverterConfigKey = keyof FailureConverterConfig
