import { GEOMETRY_KINDS, type GeometryKind } from "../ports/geometry"

export const WkbGeometryType = {
  Point: 1,
  LineString: 2,
  Polygon: 3,
  MultiPoint: 4,
  MultiLineString: 5,
  MultiPolygon: 6,
  GeometryCollection: 7,
} as const satisfies Record<GeometryKind, number>

/** PostGIS EWKB flag bits, set on the uint32 type word. */
export const EwkbFlag = {
  Z: 0x80000000,
  M: 0x40000000,
  SRID: 0x20000000,
} as const

export const EWKB_TYPE_MASK = 0x0fffffff

const kindByCode: ReadonlyMap<number, GeometryKind> = new Map(
  GEOMETRY_KINDS.map((kind) => [WkbGeometryType[kind], kind]),
)

export function kindForCode(code: number): GeometryKind | undefined {
  return kindByCode.get(code)
}
