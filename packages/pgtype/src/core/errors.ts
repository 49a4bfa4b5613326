import { BaseError, type ErrorContext } from "@pgeo/errors"

export type PgTypeErrorCode =
  | "format_unsupported"
  | "invalid_type"
  | "unknown_type"
  | "unsupported_operation"

export class PgTypeError extends BaseError<PgTypeErrorCode> {}

export function unsupportedOperation(context?: ErrorContext): PgTypeError {
  return new PgTypeError("operation not supported", { code: "unsupported_operation", context })
}
