import type { Geometry } from "@pgeo/ewkb"

/**
 * Marks a query parameter as a PostGIS geometry. Parameters without it are
 * passed to pg untouched, so GeoJSON bound to a json column stays JSON.
 */
export class GeometryParam {
  constructor(readonly geometry: Geometry) {}
}

export function geometryParam(geometry: Geometry): GeometryParam {
  return new GeometryParam(geometry)
}
