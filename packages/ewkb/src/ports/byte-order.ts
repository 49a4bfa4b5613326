/** WKB byte-order marker values. */
export const ByteOrder = {
  BigEndian: 0,
  LittleEndian: 1,
} as const

export type ByteOrder = (typeof ByteOrder)[keyof typeof ByteOrder]

export const DEFAULT_BYTE_ORDER: ByteOrder = ByteOrder.LittleEndian

/** SRID 0 means "unspecified"; marshalling with it produces plain WKB. */
export const DEFAULT_SRID = 0
