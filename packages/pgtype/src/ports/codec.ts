import type { FormatCode } from "./format"

export interface EncodePlan {
  /**
   * Returns a new buffer holding `buf` followed by the encoding of `value`.
   * `buf` itself is never modified, so a failed encode leaves nothing behind.
   */
  encode(value: unknown, buf: Uint8Array): Uint8Array
}

export interface ScanPlan {
  /**
   * Decodes `src` into `target`. `null` or an empty `src` is SQL NULL and
   * leaves `target` untouched.
   */
  scan(src: Uint8Array | null, target: unknown): void
}

/** Read-only view of a connection's registered types, handed to codecs. */
export interface TypeRegistry {
  typeForOid(oid: number): PgType | undefined
  typeForName(name: string): PgType | undefined
}

/**
 * Converts values of one PostgreSQL type between memory and the wire.
 *
 * `format` is taken as a plain number so that codes outside {@link FormatCode}
 * can be rejected rather than coerced.
 */
export interface TypeCodec {
  formatSupported(format: number): boolean

  preferredFormat(): FormatCode

  /** Returns `null` when the codec cannot encode in `format`. */
  planEncode(registry: TypeRegistry, oid: number, format: number, value: unknown): EncodePlan | null

  /** Returns `null` when the codec cannot decode from `format`. */
  planScan(registry: TypeRegistry, oid: number, format: number, target: unknown): ScanPlan | null

  /** Decodes without a typed destination, e.g. for generic row inspection. */
  decodeValue(registry: TypeRegistry, oid: number, format: number, src: Uint8Array): unknown

  /** Decodes into a driver-level primitive (string, number, bytes). */
  decodeDriverValue(registry: TypeRegistry, oid: number, format: number, src: Uint8Array): unknown
}

export type PgType = Readonly<{
  name: string
  oid: number
  codec: TypeCodec
}>
