import { BaseError } from "@pgeo/errors"

export type GeometryCodecErrorCode =
  | "column_count_mismatch"
  | "encode_failed"
  | "invalid_destination"
  | "no_rows"
  | "not_registered"
  | "registration_failed"
  | "type_mismatch"

export class GeometryCodecError extends BaseError<GeometryCodecErrorCode> {}

export class HexDecodeError extends BaseError<"invalid_hex"> {}
