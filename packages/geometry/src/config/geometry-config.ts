import { EnvSource, type IConfig, loadConfig, ObjectSource } from "@pgeo/config"
import { logLevelNames } from "@pgeo/logger"
import { z } from "zod"

export const geometryConfigSchema = z.object({
  PG_CONNECTION_STRING: z.string().min(1),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type GeometryConfig = z.infer<typeof geometryConfigSchema>

export const GEOMETRY_ENV_PREFIX = "PGEO_"

export type LoadGeometryConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  /** Applied over the environment. */
  overrides?: Record<string, unknown>
}

/** Reads `PGEO_*` variables, then `overrides`. */
export async function loadGeometryConfig(
  options: LoadGeometryConfigOptions = {},
): Promise<IConfig<GeometryConfig>> {
  return loadConfig({
    schema: geometryConfigSchema,
    sources: [
      new EnvSource({ prefix: GEOMETRY_ENV_PREFIX, env: options.env }),
      new ObjectSource(options.overrides ?? {}),
    ],
  })
}
