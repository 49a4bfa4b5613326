import { BaseError } from "@pgeo/errors"

export type EwkbErrorCode =
  | "invalid_byte_order"
  | "invalid_geometry"
  | "invalid_srid"
  | "mixed_dimensions"
  | "truncated"
  | "unsupported_dimension"
  | "unsupported_geometry_type"

export class EwkbError extends BaseError<EwkbErrorCode> {}
