import { unmarshal } from "@pgeo/ewkb"
import { isRef, type Ref, type ScanPlan } from "@pgeo/pgtype"
import { ANY_GEOMETRY, isTargetKind } from "../geometry-ref"
import { GeometryCodecError } from "../errors"
import { decodeHex } from "../hex"

function requireGeometryRef(target: unknown): Ref<unknown> {
  if (isRef(target) && isTargetKind(target.kind)) return target

  throw new GeometryCodecError("target must be a reference to a geometry", {
    code: "invalid_destination",
    context: { target: describeTarget(target) },
  })
}

function describeTarget(target: unknown): string {
  if (isRef(target)) return `Ref<${target.kind}>`
  if (target === null) return "null"
  return typeof target
}

function scanEwkb(ewkb: Uint8Array, target: Ref<unknown>): void {
  const { geometry } = unmarshal(ewkb)

  if (target.kind !== ANY_GEOMETRY && target.kind !== geometry.type) {
    throw new GeometryCodecError(
      `target type ${target.kind} doesn't match geometry type ${geometry.type}`,
      {
        code: "type_mismatch",
        context: { targetKind: target.kind, geometryKind: geometry.type },
      },
    )
  }

  target.set(geometry)
}

export class GeometryBinaryScanPlan implements ScanPlan {
  scan(src: Uint8Array | null, target: unknown): void {
    const ref = requireGeometryRef(target)
    if (!src || src.length === 0) return

    scanEwkb(src, ref)
  }
}

/** Like the binary plan, with the payload hex-decoded first. */
export class GeometryTextScanPlan implements ScanPlan {
  scan(src: Uint8Array | null, target: unknown): void {
    const ref = requireGeometryRef(target)
    if (!src || src.length === 0) return

    scanEwkb(decodeHex(src), ref)
  }
}

export const geometryBinaryScanPlan = new GeometryBinaryScanPlan()
export const geometryTextScanPlan = new GeometryTextScanPlan()
