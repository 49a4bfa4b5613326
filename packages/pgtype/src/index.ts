export { appendBytes } from "./core/bytes"
export { PgTypeError, type PgTypeErrorCode, unsupportedOperation } from "./core/errors"
export { TypeMap, type TypeMapDeps } from "./core/type-map"
export type { EncodePlan, PgType, ScanPlan, TypeCodec, TypeRegistry } from "./ports/codec"
export { type FormatCode, FormatCodes, formatCodeOf } from "./ports/format"
export { isRef, type Ref } from "./ports/ref"
