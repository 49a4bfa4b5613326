import type { Geometry } from "geojson"

export type {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
  Position,
} from "geojson"

export type GeometryKind = Geometry["type"]

export type GeometryOfKind<K extends GeometryKind> = Extract<Geometry, { type: K }>

export const GEOMETRY_KINDS = [
  "Point",
  "LineString",
  "Polygon",
  "MultiPoint",
  "MultiLineString",
  "MultiPolygon",
  "GeometryCollection",
] as const satisfies readonly GeometryKind[]

/** Ordinates per position: XY or XYZ. */
export type Dimensions = 2 | 3
