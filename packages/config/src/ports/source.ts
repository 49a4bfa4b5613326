/**
 * Loads raw configuration values. Sources do not validate or coerce; later
 * sources override earlier ones and `undefined` means "not provided".
 */
export interface ConfigSource {
  /** e.g. "env", "object:overrides" */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
