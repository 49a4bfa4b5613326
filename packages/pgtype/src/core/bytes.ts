export function appendBytes(buf: Uint8Array, bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(buf.length + bytes.length)
  out.set(buf)
  out.set(bytes, buf.length)
  return out
}
