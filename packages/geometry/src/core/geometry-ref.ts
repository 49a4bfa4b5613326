import { type Geometry, type GeometryKind, type GeometryOfKind, isGeometryKind } from "@pgeo/ewkb"
import type { Ref } from "@pgeo/pgtype"

/** Target kind that accepts any geometry variant. */
export const ANY_GEOMETRY = "Geometry"

export type TargetKind = GeometryKind | typeof ANY_GEOMETRY

export type GeometryFor<K extends TargetKind> = K extends GeometryKind ? GeometryOfKind<K> : Geometry

/**
 * Scan destination for a geometry column.
 *
 * @example
 * ```ts
 * const location = geometryRef("Point")
 * typeMap.scan(oid, FormatCodes.Binary, src, location)
 * location.value?.coordinates
 * ```
 */
export class GeometryRef<K extends TargetKind = typeof ANY_GEOMETRY> implements Ref<GeometryFor<K>> {
  value: GeometryFor<K> | undefined

  constructor(
    readonly kind: K,
    initial?: GeometryFor<K>,
  ) {
    this.value = initial
  }

  set(value: GeometryFor<K>): void {
    this.value = value
  }
}

export function geometryRef<K extends TargetKind>(kind: K, initial?: GeometryFor<K>): GeometryRef<K> {
  return new GeometryRef(kind, initial)
}

export function isTargetKind(kind: string): kind is TargetKind {
  return kind === ANY_GEOMETRY || isGeometryKind(kind)
}
