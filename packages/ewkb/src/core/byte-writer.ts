const INITIAL_CAPACITY = 64

/**
 * Append-only byte sink with a fixed endianness.
 */
export class ByteWriter {
  private buf = new Uint8Array(INITIAL_CAPACITY)
  private view = new DataView(this.buf.buffer)
  private offset = 0

  constructor(private readonly littleEndian: boolean) {}

  uint8(value: number): void {
    this.reserve(1)
    this.view.setUint8(this.offset, value)
    this.offset += 1
  }

  uint32(value: number): void {
    this.reserve(4)
    this.view.setUint32(this.offset, value, this.littleEndian)
    this.offset += 4
  }

  float64(value: number): void {
    this.reserve(8)
    this.view.setFloat64(this.offset, value, this.littleEndian)
    this.offset += 8
  }

  bytes(): Uint8Array {
    return this.buf.slice(0, this.offset)
  }

  private reserve(n: number): void {
    const needed = this.offset + n
    if (needed <= this.buf.length) return

    const next = new Uint8Array(Math.max(needed, this.buf.length * 2))
    next.set(this.buf.subarray(0, this.offset))

    this.buf = next
    this.view = new DataView(next.buffer)
  }
}
