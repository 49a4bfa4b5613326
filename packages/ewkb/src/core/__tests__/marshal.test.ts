import type { Geometry } from "geojson"
import { ByteOrder } from "../../ports/byte-order"
import { EwkbError } from "../errors"
import { marshal } from "../marshal"

const hex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex")

const ONE = "000000000000f03f"
const TWO = "0000000000000040"
const THREE = "0000000000000840"
const FOUR = "0000000000001040"
const ZERO = "0000000000000000"

describe("marshal", () => {
  it("writes little-endian WKB without SRID by default", () => {
    const bytes = marshal({ type: "Point", coordinates: [1, 2] })

    expect(hex(bytes)).toBe(`0101000000${ONE}${TWO}`)
  })

  it("writes big-endian when asked", () => {
    const bytes = marshal({ type: "Point", coordinates: [1, 2] }, 0, ByteOrder.BigEndian)

    expect(hex(bytes)).toBe("0000000001" + "3ff0000000000000" + "4000000000000000")
  })

  it("sets the SRID flag and writes the SRID after the type", () => {
    const bytes = marshal({ type: "Point", coordinates: [3, 4] }, 4326)

    expect(hex(bytes)).toBe(`0101000020e6100000${THREE}${FOUR}`)
  })

  it("sets the Z flag for XYZ positions", () => {
    const bytes = marshal({ type: "Point", coordinates: [1, 2, 3] })

    expect(hex(bytes)).toBe(`0101000080${ONE}${TWO}${THREE}`)
  })

  it("writes a point count and positions for a LineString", () => {
    const bytes = marshal({ type: "LineString", coordinates: [[0, 0], [1, 1]] })

    expect(hex(bytes)).toBe(`010200000002000000${ZERO}${ZERO}${ONE}${ONE}`)
  })

  it("writes members with their own header and no SRID", () => {
    const bytes = marshal({ type: "MultiPoint", coordinates: [[1, 2]] }, 4326)

    expect(hex(bytes)).toBe(`0104000020e610000001000000` + `0101000000${ONE}${TWO}`)
  })

  it("writes an empty point as NaN NaN", () => {
    const bytes = marshal({ type: "Point", coordinates: [] })

    expect(hex(bytes)).toBe("0101000000000000000000f87f000000000000f87f")
  })

  describe("errors", () => {
    const expectCode = (fn: () => unknown, code: string) => {
      let caught: unknown
      try {
        fn()
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(EwkbError)
      expect(caught).toMatchObject({ code })
    }

    it("rejects mixed XY and XYZ positions", () => {
      expectCode(
        () => marshal({ type: "LineString", coordinates: [[0, 0], [1, 1, 1]] }),
        "mixed_dimensions",
      )
    })

    it("rejects positions with the wrong arity", () => {
      expectCode(() => marshal({ type: "Point", coordinates: [1] }), "invalid_geometry")
      expectCode(() => marshal({ type: "Point", coordinates: [1, 2, 3, 4] }), "invalid_geometry")
    })

    it("rejects non-numeric ordinates", () => {
      const point = JSON.parse('{"type":"Point","coordinates":["1","2"]}')

      expectCode(() => marshal(point), "invalid_geometry")
    })

    it("rejects unknown geometry types", () => {
      const triangle = JSON.parse('{"type":"Triangle","coordinates":[]}')

      expectCode(() => marshal(triangle), "unsupported_geometry_type")
    })

    it("rejects invalid SRIDs", () => {
      const point: Geometry = { type: "Point", coordinates: [1, 2] }

      expectCode(() => marshal(point, -1), "invalid_srid")
      expectCode(() => marshal(point, 1.5), "invalid_srid")
      expectCode(() => marshal(point, 2 ** 32), "invalid_srid")
    })
  })
})
