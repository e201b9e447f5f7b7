/**
 * A source of configuration values.
 *
 * A ConfigSource only *loads* raw values; validation, coercion and merging
 * happen in {@link loadFailureConverterConfig}. Later sources override
 * earlier ones.
 */
export interface ConfigSource {
  /** Human-readable name used in provenance, e.g. "env:WEFT_FAILURE_". */
  readonly name: string

  /**
   * Load configuration values. Returning undefined for a key means
   * "value not provided".
   */
  load(): Promise<Record<string, unknown>>
}

export const DEFAULT_ENV_PREFIX = "WEFT_FAILURE_"

export type EnvSourceOptions = {
  /** @default "WEFT_FAILURE_" */
  prefix?: string
  env?: Record<string, string | undefined>
}

/** Reads prefixed environment variables and strips the prefix. */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
    this.name = `env:${this.prefix}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}

/** In-code overrides, typically last in the source list. */
export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly obj: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
