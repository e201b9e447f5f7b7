import type { Logger } from "@weft/logger"
import { mock } from "vitest-mock-extended"
import { ApplicationError } from "../../core/errors/application-error"
import { ConfigurationError } from "../../core/errors/configuration-error"
import { ENCODED_FAILURE_MESSAGE } from "../../core/converter/default-failure-converter"
import {
  createFailureConverterFromConfig,
  loadFailureConverterConfig,
  toFailureConverterOptions,
} from "../load-failure-converter-config"
import { EnvSource, ObjectSource } from "../source"

describe("loadFailureConverterConfig", () => {
  it("applies defaults when no source provides values", async () => {
    const config = await loadFailureConverterConfig({ sources: [new EnvSource({ env: {} })] })

    expect(config.value).toEqual({
      MAX_CAUSE_DEPTH: 50,
      REUSE_STORED_FAILURE: true,
      ENCODE_COMMON_ATTRIBUTES: false,
      INCLUDE_STACK_TRACE: true,
      LOG_LEVEL: "info",
    })
    expect(config.explain("MAX_CAUSE_DEPTH")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["default"])
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("coerces environment strings", async () => {
    const config = await loadFailureConverterConfig({
      sources: [
        new EnvSource({
          env: {
            WEFT_FAILURE_MAX_CAUSE_DEPTH: "12",
            WEFT_FAILURE_ENCODE_COMMON_ATTRIBUTES: "true",
            WEFT_FAILURE_INCLUDE_STACK_TRACE: "false",
          },
        }),
      ],
    })

    expect(config.value.MAX_CAUSE_DEPTH).toBe(12)
    expect(config.value.ENCODE_COMMON_ATTRIBUTES).toBe(true)
    expect(config.value.INCLUDE_STACK_TRACE).toBe(false)
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    const config = await loadFailureConverterConfig({
      sources: [
        new EnvSource({ env: { WEFT_FAILURE_LOG_LEVEL: "debug", WEFT_FAILURE_MAX_CAUSE_DEPTH: "5" } }),
        new ObjectSource({ LOG_LEVEL: "error", REUSE_STORED_FAILURE: false }),
      ],
    })

    expect(config.value.LOG_LEVEL).toBe("error")
    expect(config.value.MAX_CAUSE_DEPTH).toBe(5)
    expect(config.value.REUSE_STORED_FAILURE).toBe(false)
    expect(config.explain("LOG_LEVEL")).toBe("object:overrides")
    expect(config.explain("MAX_CAUSE_DEPTH")).toBe("env:WEFT_FAILURE_")
    expect(config.sourcesUsed()).toEqual(["env:WEFT_FAILURE_", "object:overrides", "default"])
  })

  it("reports keys the schema does not define", async () => {
    const config = await loadFailureConverterConfig({
      sources: [new ObjectSource({ MAX_CAUSE_DEPT: 3, LOG_LEVEL: "warn" })],
    })

    expect(config.unknownKeys()).toEqual(["MAX_CAUSE_DEPT"])
  })

  it("throws ConfigurationError for invalid values", async () => {
    const load = loadFailureConverterConfig({
      sources: [new ObjectSource({ MAX_CAUSE_DEPTH: 0 })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigurationError)
  })

  it("names the sources in the error context", async () => {
    await expect(
      loadFailureConverterConfig({ sources: [new ObjectSource({ LOG_LEVEL: "loud" })] }),
    ).rejects.toMatchObject({
      code: "invalid_config",
      context: { sources: ["object:overrides"] },
    })
  })
})

describe("toFailureConverterOptions", () => {
  it("maps config keys to converter options", () => {
    expect(
      toFailureConverterOptions({
        MAX_CAUSE_DEPTH: 7,
        REUSE_STORED_FAILURE: false,
        ENCODE_COMMON_ATTRIBUTES: true,
        INCLUDE_STACK_TRACE: false,
        LOG_LEVEL: "warn",
      }),
    ).toEqual({
      maxCauseDepth: 7,
      reuseStoredFailure: false,
      encodeCommonAttributes: true,
      includeStackTrace: false,
    })
  })
})

describe("createFailureConverterFromConfig", () => {
  it("builds a converter that follows the configuration", async () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    const config = await loadFailureConverterConfig({
      sources: [new ObjectSource({ ENCODE_COMMON_ATTRIBUTES: true })],
    })

    const converter = createFailureConverterFromConfig(config, { logger })
    const failure = converter.errorToFailure(new ApplicationError("declined"))

    expect(failure.message).toBe(ENCODED_FAILURE_MESSAGE)
    expect(converter.failureToError(failure).message).toBe("declined")
    expect(logger.child).toHaveBeenCalledWith({ module: "failure-converter" })
  })

  it("creates its own logger when none is given", async () => {
    const config = await loadFailureConverterConfig({
      sources: [new ObjectSource({ LOG_LEVEL: "fatal" })],
    })

    const converter = createFailureConverterFromConfig(config)

    expect(converter.failureToError({ message: "plain" }).message).toBe("plain")
  })
})
