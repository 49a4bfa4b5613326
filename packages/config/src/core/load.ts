import { BaseError } from "@pgeo/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export class ConfigError extends BaseError<"config_invalid"> {}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order, later values winning. Defaults to the whole process environment. */
  sources?: ConfigSource[]
}

/**
 * Merges `sources` and validates the result against `schema`.
 *
 * @throws {ConfigError} `config_invalid` listing every failing key.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
    }
  }

  const result = schema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(`invalid configuration:\n${z.prettifyError(result.error)}`, {
      code: "config_invalid",
      context: { sources: sources.map((s) => s.name) },
      cause: result.error,
    })
  }

  return new Config(result.data)
}
