import { EwkbError } from "./errors"

export class ByteReader {
  private readonly view: DataView
  private position = 0

  /** Set from each geometry's own byte-order marker. */
  littleEndian = true

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.view.byteLength - this.position
  }

  uint8(): number {
    this.require(1)
    const value = this.view.getUint8(this.position)
    this.position += 1
    return value
  }

  uint32(): number {
    this.require(4)
    const value = this.view.getUint32(this.position, this.littleEndian)
    this.position += 4
    return value
  }

  float64(): number {
    this.require(8)
    const value = this.view.getFloat64(this.position, this.littleEndian)
    this.position += 8
    return value
  }

  /**
   * Reads an element count and checks that `minElementSize` bytes per element
   * are still available.
   */
  count(minElementSize: number): number {
    const n = this.uint32()

    if (n * minElementSize > this.remaining) {
      throw new EwkbError(`element count ${n} exceeds remaining ${this.remaining} bytes`, {
        code: "truncated",
        context: { count: n, offset: this.position, remaining: this.remaining },
      })
    }

    return n
  }

  private require(n: number): void {
    if (this.remaining >= n) return

    throw new EwkbError(`unexpected end of EWKB at offset ${this.position}`, {
      code: "truncated",
      context: { offset: this.position, needed: n, remaining: this.remaining },
    })
  }
}
