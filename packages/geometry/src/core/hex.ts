import { HexDecodeError } from "./errors"

/** Lower-case hex, no prefix or separators. */
export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex")
}

/**
 * Decodes ASCII hex of either case.
 *
 * `Buffer.from(s, "hex")` stops quietly at the first bad pair, so the input
 * is checked before it is handed over.
 *
 * @throws {HexDecodeError} on a non-hex byte or an odd length.
 */
export function decodeHex(src: Uint8Array): Uint8Array {
  const bad = src.findIndex((c) => !isHexDigit(c))
  if (bad >= 0) {
    throw new HexDecodeError(`invalid byte 0x${src[bad].toString(16).padStart(2, "0")} in hex string`, {
      code: "invalid_hex",
      context: { offset: bad },
    })
  }

  if (src.length % 2 !== 0) {
    throw new HexDecodeError("odd length hex string", {
      code: "invalid_hex",
      context: { length: src.length },
    })
  }

  const text = Buffer.from(src.buffer, src.byteOffset, src.byteLength).toString("latin1")
  return new Uint8Array(Buffer.from(text, "hex"))
}

function isHexDigit(c: number): boolean {
  return (c >= 0x30 && c <= 0x39) || (c >= 0x61 && c <= 0x66) || (c >= 0x41 && c <= 0x46)
}
