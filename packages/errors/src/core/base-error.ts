import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { errorChain } from "./utils/error-chain"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Root of every error this project throws. Subclasses pin `C` to a closed
 * union so callers can switch on `code`.
 *
 * @example
 * ```ts
 * class HexDecodeError extends BaseError<"invalid_hex"> {}
 *
 * throw new HexDecodeError("odd length hex string", { code: "invalid_hex" })
 * ```
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError<C> {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp = new Date()

  constructor(message: string, { code, context, cause }: BaseErrorOptions<C>) {
    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  includeStack?: boolean
}>

/**
 * JSON-safe form of any thrown value, causes nested innermost last. Cyclic
 * cause chains are cut where they repeat.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  const [outer, ...causes] = errorChain(err).map((entry) => serializeOne(entry, options))
  if (!outer) return serializeOne(err, options)

  return [outer, ...causes].reduceRight((cause, entry) => ({ ...entry, cause }))
}

function serializeOne(err: unknown, { includeStack = false }: SerializeOptions): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonError",
      code: "unknown",
      message: typeof err === "string" ? err : String(err),
      context: { value: err },
    }
  }

  return {
    name: err.name,
    code: err instanceof BaseError ? err.code : "unknown",
    message: err.message,
    context: err instanceof BaseError ? { ...err.context } : {},
    ...(err instanceof BaseError && { timestamp: err.timestamp.toISOString() }),
    ...(includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
