// src/runtime/charm-config.ts — Charm configuration options (config.yaml equivalent)

import { Type, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { OperatorError } from "../charm/errors.js"

export type ConfigValue = string | number | boolean

export interface ConfigOptionSpec {
  type: "string" | "int" | "float" | "boolean"
  default?: ConfigValue
  description?: string
}

export interface CharmConfigSpec {
  options: Record<string, ConfigOptionSpec>
}

const OPTION_SCHEMAS: Record<ConfigOptionSpec["type"], TSchema> = {
  string: Type.String(),
  int: Type.Integer(),
  float: Type.Number(),
  boolean: Type.Boolean(),
}

export const VALID_APPLICATION_LOG_LEVEL_SETTINGS = [
  "debug",
  "info",
  "warning",
  "error",
  "critical",
] as const

export type ApplicationLogLevel = (typeof VALID_APPLICATION_LOG_LEVEL_SETTINGS)[number]

const LOG_LEVELS: ReadonlySet<string> = new Set<string>(VALID_APPLICATION_LOG_LEVEL_SETTINGS)

function isLogLevel(value: string): value is ApplicationLogLevel {
  return LOG_LEVELS.has(value)
}

export class CharmConfig {
  private values = new Map<string, ConfigValue>()

  constructor(readonly spec: CharmConfigSpec = { options: {} }) {
    for (const [name, option] of Object.entries(spec.options)) {
      if (option.default !== undefined) {
        this.assertValid(name, option.default)
        this.values.set(name, option.default)
      }
    }
  }

  get(name: string): ConfigValue | undefined {
    return this.values.get(name)
  }

  getString(name: string): string | undefined {
    const value = this.values.get(name)
    return typeof value === "string" ? value : undefined
  }

  /** Apply updates; `unset` names revert to their defaults. */
  update(values: Record<string, ConfigValue> = {}, unset: readonly string[] = []): void {
    for (const [name, value] of Object.entries(values)) {
      this.assertValid(name, value)
    }
    for (const [name, value] of Object.entries(values)) {
      this.values.set(name, value)
    }
    for (const name of unset) {
      const fallback = this.optionSpec(name).default
      if (fallback === undefined) this.values.delete(name)
      else this.values.set(name, fallback)
    }
  }

  snapshot(): Record<string, ConfigValue> {
    return Object.fromEntries(this.values)
  }

  /**
   * Log level from an option, lower-cased. Unset or unrecognised values
   * yield undefined.
   */
  getLoggingLevel(name: string): ApplicationLogLevel | undefined {
    const raw = this.getString(name)
    if (raw === undefined) return undefined
    const level = raw.trim().toLowerCase()
    return isLogLevel(level) ? level : undefined
  }

  private optionSpec(name: string): ConfigOptionSpec {
    const option = this.spec.options[name]
    if (!option) {
      throw new OperatorError("CONFIG_INVALID", `unknown config option "${name}"`, { option: name })
    }
    return option
  }

  private assertValid(name: string, value: ConfigValue): void {
    const option = this.optionSpec(name)
    if (!Value.Check(OPTION_SCHEMAS[option.type], value)) {
      throw new OperatorError(
        "CONFIG_INVALID",
        `config option "${name}" must be of type ${option.type} (got ${JSON.stringify(value)})`,
        { option: name },
      )
    }
  }
}
