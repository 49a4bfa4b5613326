import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName
  /** Colored single-line output through pino-pretty instead of JSON lines. */
  prettify?: boolean
}
