import { type Geometry, unmarshal } from "@pgeo/ewkb"
import {
  type EncodePlan,
  type FormatCode,
  FormatCodes,
  type ScanPlan,
  type TypeCodec,
  type TypeRegistry,
  unsupportedOperation,
} from "@pgeo/pgtype"
import { decodeHex } from "./hex"
import { geometryBinaryEncodePlan, geometryTextEncodePlan } from "./plans/encode-plans"
import { geometryBinaryScanPlan, geometryTextScanPlan } from "./plans/scan-plans"

/**
 * Codec for the PostGIS `geometry` type. Binary values are EWKB; text values
 * are the same EWKB hex-encoded.
 *
 * Stateless: one instance may serve any number of connections.
 */
export class GeometryCodec implements TypeCodec {
  formatSupported(format: number): boolean {
    switch (format) {
      case FormatCodes.Binary:
      case FormatCodes.Text:
        return true
      default:
        return false
    }
  }

  preferredFormat(): FormatCode {
    return FormatCodes.Binary
  }

  planEncode(_registry: TypeRegistry, _oid: number, format: number, _value: unknown): EncodePlan | null {
    switch (format) {
      case FormatCodes.Binary:
        return geometryBinaryEncodePlan
      case FormatCodes.Text:
        return geometryTextEncodePlan
      default:
        return null
    }
  }

  planScan(_registry: TypeRegistry, _oid: number, format: number, _target: unknown): ScanPlan | null {
    switch (format) {
      case FormatCodes.Binary:
        return geometryBinaryScanPlan
      case FormatCodes.Text:
        return geometryTextScanPlan
      default:
        return null
    }
  }

  /**
   * Decodes whatever geometry the payload holds. Unlike the scan plans there
   * is no destination kind to check against.
   */
  decodeValue(_registry: TypeRegistry, _oid: number, format: number, src: Uint8Array): Geometry {
    switch (format) {
      case FormatCodes.Text:
        return unmarshal(decodeHex(src)).geometry
      case FormatCodes.Binary:
        return unmarshal(src).geometry
      default:
        throw unsupportedOperation({ format })
    }
  }

  decodeDriverValue(_registry: TypeRegistry, _oid: number, _format: number, _src: Uint8Array): never {
    throw unsupportedOperation()
  }
}
