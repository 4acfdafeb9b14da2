import { prettifyError, safeParse } from "zod/mini"
import type { $ZodType } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends object> = {
  schema: $ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]

  /**
   * Expand `${NAME}` references in string values using the merged values.
   * Unresolved references expand to an empty string.
   * @default false
   */
  expandEnv?: boolean
}

const REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export async function loadConfig<T extends object>({
  schema,
  sources,
  expandEnv = false,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  const applied = sources ?? [new EnvSource()]

  for (const source of applied) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const input = expandEnv ? expandReferences(merged) : merged
  const result = safeParse(schema, input)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${prettifyError(result.error)}`)
  }

  return new Config<T>(
    result.data,
    provenance,
    new Set(Object.keys(merged)),
    applied.map((source) => source.name),
  )
}

function expandReferences(values: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(values)) {
    out[key] =
      typeof value === "string"
        ? value.replace(REFERENCE, (_, name: string) => {
            const ref = values[name]
            return typeof ref === "string" ? ref : ""
          })
        : value
  }

  return out
}
