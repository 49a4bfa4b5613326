/**
 * Validated, frozen configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ PG_CONNECTION_STRING: z.string() }),
 *   sources: [new EnvSource({ prefix: "PGEO_" })],
 * })
 *
 * config.get("PG_CONNECTION_STRING")
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]
}
