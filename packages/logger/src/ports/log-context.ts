export type LogContext = {
  service: string
  module: string
  env: string

  connectionId: string
  typeName: string
  oid: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a child logger's bindings.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
