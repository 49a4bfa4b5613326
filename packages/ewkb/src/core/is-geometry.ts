import { GEOMETRY_KINDS, type Geometry, type GeometryKind } from "../ports/geometry"

export function isGeometryKind(value: unknown): value is GeometryKind {
  return GEOMETRY_KINDS.some((kind) => kind === value)
}

/**
 * Shallow runtime check for a GeoJSON geometry: a known `type` with a
 * `coordinates` array, or a `geometries` array for a collection. Nested
 * content is validated by {@link marshal}.
 */
export function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== "object" || value === null || !("type" in value)) return false

  if (value.type === "GeometryCollection") {
    return "geometries" in value && Array.isArray(value.geometries)
  }

  return isGeometryKind(value.type) && "coordinates" in value && Array.isArray(value.coordinates)
}
