import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const discard = (): void => {}

/** Default logger for the type map and the connection glue when none is given. */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace = discard
  readonly debug = discard
  readonly info = discard
  readonly warn = discard
  readonly error = discard
  readonly fatal = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return this
  }
}

export const createNullLogger = <TContext extends LogContext = LogContext>(): Logger<TContext> =>
  new NullLogger<TContext>()
