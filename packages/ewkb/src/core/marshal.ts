import { ByteOrder, DEFAULT_BYTE_ORDER, DEFAULT_SRID } from "../ports/byte-order"
import type { Dimensions, Geometry, Position } from "../ports/geometry"
import { ByteWriter } from "./byte-writer"
import { EwkbError } from "./errors"
import { EwkbFlag, WkbGeometryType } from "./wkb-type"

const MAX_UINT32 = 0xffffffff

/**
 * Encode a geometry as EWKB.
 *
 * A non-zero `srid` is stored on the outermost geometry with the SRID flag;
 * with the default SRID of 0 the output is plain WKB. XYZ geometries carry
 * the Z flag. An empty point is written as `NaN NaN`.
 *
 * @throws {EwkbError} when the geometry, SRID or byte order is invalid.
 */
export function marshal(
  geometry: Geometry,
  srid: number = DEFAULT_SRID,
  byteOrder: ByteOrder = DEFAULT_BYTE_ORDER,
): Uint8Array {
  if (!Number.isInteger(srid) || srid < 0 || srid > MAX_UINT32) {
    throw new EwkbError(`invalid SRID ${srid}`, { code: "invalid_srid", context: { srid } })
  }

  if (byteOrder !== ByteOrder.BigEndian && byteOrder !== ByteOrder.LittleEndian) {
    throw new EwkbError(`invalid byte order ${byteOrder}`, {
      code: "invalid_byte_order",
      context: { byteOrder },
    })
  }

  const writer = new ByteWriter(byteOrder === ByteOrder.LittleEndian)
  writeGeometry(writer, geometry, byteOrder, srid)

  return writer.bytes()
}

function writeGeometry(w: ByteWriter, g: Geometry, byteOrder: ByteOrder, srid: number): void {
  const dims = dimensionsOf(g)

  let type: number = WkbGeometryType[g.type]
  if (dims === 3) type |= EwkbFlag.Z
  if (srid !== DEFAULT_SRID) type |= EwkbFlag.SRID

  w.uint8(byteOrder)
  w.uint32(type >>> 0)
  if (srid !== DEFAULT_SRID) w.uint32(srid)

  switch (g.type) {
    case "Point":
      if (g.coordinates.length === 0) {
        w.float64(Number.NaN)
        w.float64(Number.NaN)
      } else {
        writePosition(w, g.coordinates)
      }
      return
    case "LineString":
      writePositions(w, g.coordinates)
      return
    case "Polygon":
      w.uint32(g.coordinates.length)
      for (const ring of g.coordinates) writePositions(w, ring)
      return
    case "MultiPoint":
      w.uint32(g.coordinates.length)
      for (const coordinates of g.coordinates) {
        writeGeometry(w, { type: "Point", coordinates }, byteOrder, DEFAULT_SRID)
      }
      return
    case "MultiLineString":
      w.uint32(g.coordinates.length)
      for (const coordinates of g.coordinates) {
        writeGeometry(w, { type: "LineString", coordinates }, byteOrder, DEFAULT_SRID)
      }
      return
    case "MultiPolygon":
      w.uint32(g.coordinates.length)
      for (const coordinates of g.coordinates) {
        writeGeometry(w, { type: "Polygon", coordinates }, byteOrder, DEFAULT_SRID)
      }
      return
    case "GeometryCollection":
      w.uint32(g.geometries.length)
      for (const member of g.geometries) writeGeometry(w, member, byteOrder, DEFAULT_SRID)
      return
  }
}

function writePositions(w: ByteWriter, positions: Position[]): void {
  w.uint32(positions.length)
  for (const p of positions) writePosition(w, p)
}

function writePosition(w: ByteWriter, p: Position): void {
  for (const ordinate of p) w.float64(ordinate)
}

/**
 * Validates every position of `g` and returns their shared dimension.
 * Geometries without positions count as XY.
 */
function dimensionsOf(g: Geometry): Dimensions {
  let dims: Dimensions | undefined

  for (const p of positionsOf(g)) {
    const d = positionDimensions(p, g)

    if (dims !== undefined && d !== dims) {
      throw new EwkbError(`${g.type} mixes XY and XYZ positions`, {
        code: "mixed_dimensions",
        context: { kind: g.type },
      })
    }

    dims = d
  }

  return dims ?? 2
}

function positionDimensions(p: unknown, g: Geometry): Dimensions {
  if (
    Array.isArray(p) &&
    (p.length === 2 || p.length === 3) &&
    p.every((n) => typeof n === "number")
  ) {
    return p.length === 2 ? 2 : 3
  }

  throw new EwkbError(`${g.type} has an invalid position`, {
    code: "invalid_geometry",
    context: { kind: g.type, position: p },
  })
}

function* positionsOf(g: Geometry): Generator<unknown> {
  switch (g.type) {
    case "Point":
      if (!isEmptyPoint(g.coordinates)) yield g.coordinates
      return
    case "LineString":
    case "MultiPoint":
      yield* listOf(g.coordinates, g)
      return
    case "Polygon":
    case "MultiLineString":
      for (const ring of listOf(g.coordinates, g)) yield* listOf(ring, g)
      return
    case "MultiPolygon":
      for (const polygon of listOf(g.coordinates, g)) {
        for (const ring of listOf(polygon, g)) yield* listOf(ring, g)
      }
      return
    case "GeometryCollection":
      for (const member of listOf(g.geometries, g)) {
        if (!isGeometryLike(member)) {
          throw new EwkbError("GeometryCollection has an invalid member", {
            code: "invalid_geometry",
            context: { kind: g.type },
          })
        }
        yield* positionsOf(member)
      }
      return
    default:
      throw new EwkbError("unknown geometry type", {
        code: "unsupported_geometry_type",
        context: { geometry: g },
      })
  }
}

function isEmptyPoint(coordinates: unknown): boolean {
  return Array.isArray(coordinates) && coordinates.length === 0
}

function listOf<T>(value: T[], g: Geometry): T[] {
  if (Array.isArray(value)) return value

  throw new EwkbError(`${g.type} has a malformed coordinate list`, {
    code: "invalid_geometry",
    context: { kind: g.type },
  })
}

function isGeometryLike(value: unknown): value is Geometry {
  return typeof value === "object" && value !== null && "type" in value
}
