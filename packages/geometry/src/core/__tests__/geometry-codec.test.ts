import { EwkbError, type Geometry } from "@pgeo/ewkb"
import { FormatCodes, PgTypeError, TypeMap } from "@pgeo/pgtype"
import { GeometryCodec } from "../geometry-codec"
import { HexDecodeError } from "../errors"
import { geometryRef } from "../geometry-ref"
import {
  geometryBinaryEncodePlan,
  geometryTextEncodePlan,
} from "../plans/encode-plans"
import { geometryBinaryScanPlan, geometryTextScanPlan } from "../plans/scan-plans"

const OID = 16_400
const POINT_1_2_HEX = "0101000000000000000000f03f0000000000000040"

const ascii = (s: string) => new TextEncoder().encode(s)
const hex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex")

function caught(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected a throw")
}

function geometryTypeMap(): TypeMap {
  const map = new TypeMap()
  map.registerType({ name: "geometry", oid: OID, codec: new GeometryCodec() })
  return map
}

describe("GeometryCodec", () => {
  const codec = new GeometryCodec()
  const map = geometryTypeMap()

  describe("format negotiation", () => {
    it("supports text and binary only", () => {
      expect(codec.formatSupported(FormatCodes.Binary)).toBe(true)
      expect(codec.formatSupported(FormatCodes.Text)).toBe(true)
      expect(codec.formatSupported(2)).toBe(false)
      expect(codec.formatSupported(-1)).toBe(false)
    })

    it("prefers binary", () => {
      expect(codec.preferredFormat()).toBe(FormatCodes.Binary)
    })
  })

  describe("plan selection", () => {
    it("selects the plan for each format", () => {
      const point: Geometry = { type: "Point", coordinates: [1, 2] }
      const target = geometryRef("Point")

      expect(codec.planEncode(map, OID, FormatCodes.Binary, point)).toBe(geometryBinaryEncodePlan)
      expect(codec.planEncode(map, OID, FormatCodes.Text, point)).toBe(geometryTextEncodePlan)
      expect(codec.planScan(map, OID, FormatCodes.Binary, target)).toBe(geometryBinaryScanPlan)
      expect(codec.planScan(map, OID, FormatCodes.Text, target)).toBe(geometryTextScanPlan)
    })

    it("returns no plan for format code 2", () => {
      expect(codec.planEncode(map, OID, 2, { type: "Point", coordinates: [1, 2] })).toBeNull()
      expect(codec.planScan(map, OID, 2, geometryRef("Point"))).toBeNull()
    })

    it("makes the type map fail for an unsupported format", () => {
      const err = caught(() => map.encode(OID, 2, { type: "Point", coordinates: [1, 2] }))

      expect(err).toBeInstanceOf(PgTypeError)
      expect(err).toMatchObject({ code: "format_unsupported" })
    })
  })

  describe("decodeValue", () => {
    it("decodes binary EWKB", () => {
      const value = codec.decodeValue(map, OID, FormatCodes.Binary, Buffer.from(POINT_1_2_HEX, "hex"))

      expect(value).toEqual({ type: "Point", coordinates: [1, 2] })
    })

    it("hex-decodes text before decoding", () => {
      const value = codec.decodeValue(map, OID, FormatCodes.Text, ascii(POINT_1_2_HEX.toUpperCase()))

      expect(value).toEqual({ type: "Point", coordinates: [1, 2] })
    })

    it("returns whatever variant the payload holds", () => {
      const line: Geometry = { type: "LineString", coordinates: [[0, 0], [1, 1]] }
      const bytes = map.encode(OID, FormatCodes.Binary, line)

      expect(map.decodeValue(OID, FormatCodes.Binary, bytes)).toEqual(line)
    })

    it("propagates hex and EWKB errors", () => {
      expect(caught(() => codec.decodeValue(map, OID, FormatCodes.Text, ascii("0g")))).toBeInstanceOf(
        HexDecodeError,
      )
      expect(caught(() => codec.decodeValue(map, OID, FormatCodes.Binary, new Uint8Array([1])))).toBeInstanceOf(
        EwkbError,
      )
    })

    it("rejects other formats", () => {
      const err = caught(() => codec.decodeValue(map, OID, 2, new Uint8Array([1])))

      expect(err).toMatchObject({
        code: "unsupported_operation",
        message: "operation not supported",
        context: { format: 2 },
      })
    })
  })

  it("never decodes driver values", () => {
    for (const format of [FormatCodes.Binary, FormatCodes.Text]) {
      const err = caught(() => codec.decodeDriverValue(map, OID, format, ascii(POINT_1_2_HEX)))

      expect(err).toBeInstanceOf(PgTypeError)
      expect(err).toMatchObject({ code: "unsupported_operation" })
    }
  })

  describe("through a type map", () => {
    it("binary and text encodings carry the same EWKB", () => {
      const point: Geometry = { type: "Point", coordinates: [1, 2] }

      const binary = map.encode(OID, FormatCodes.Binary, point)
      const text = map.encode(OID, FormatCodes.Text, point)

      expect(hex(binary)).toBe(POINT_1_2_HEX)
      expect(new TextDecoder().decode(text)).toBe(POINT_1_2_HEX)
    })

    it.each([
      ["binary", FormatCodes.Binary],
      ["text", FormatCodes.Text],
    ])("round-trips Point(1, 2) in %s", (_name, format) => {
      const target = geometryRef("Point")

      map.scan(OID, format, map.encode(OID, format, { type: "Point", coordinates: [1, 2] }), target)

      expect(target.value).toEqual({ type: "Point", coordinates: [1, 2] })
    })
  })
})
