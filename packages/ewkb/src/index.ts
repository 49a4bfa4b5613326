export { EwkbError, type EwkbErrorCode } from "./core/errors"
export { isGeometry, isGeometryKind } from "./core/is-geometry"
export { marshal } from "./core/marshal"
export { type UnmarshalResult, unmarshal } from "./core/unmarshal"
export { ByteOrder, DEFAULT_BYTE_ORDER, DEFAULT_SRID } from "./ports/byte-order"
export * from "./ports/geometry"
