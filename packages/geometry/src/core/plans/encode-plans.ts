import { DEFAULT_BYTE_ORDER, DEFAULT_SRID, isGeometry, marshal } from "@pgeo/ewkb"
import { appendBytes, type EncodePlan, unsupportedOperation } from "@pgeo/pgtype"
import { GeometryCodecError } from "../errors"
import { encodeHex } from "../hex"

const ascii = new TextEncoder()

function marshalGeometry(value: unknown): Uint8Array {
  if (!isGeometry(value)) {
    throw unsupportedOperation({ valueType: value === null ? "null" : typeof value })
  }

  try {
    return marshal(value, DEFAULT_SRID, DEFAULT_BYTE_ORDER)
  } catch (err) {
    throw new GeometryCodecError("failed to encode geometry", {
      code: "encode_failed",
      context: { kind: value.type },
      cause: err,
    })
  }
}

/** Appends raw EWKB. */
export class GeometryBinaryEncodePlan implements EncodePlan {
  encode(value: unknown, buf: Uint8Array): Uint8Array {
    return appendBytes(buf, marshalGeometry(value))
  }
}

/** Appends hex-encoded EWKB, as PostGIS prints geometries in text mode. */
export class GeometryTextEncodePlan implements EncodePlan {
  encode(value: unknown, buf: Uint8Array): Uint8Array {
    return appendBytes(buf, ascii.encode(encodeHex(marshalGeometry(value))))
  }
}

export const geometryBinaryEncodePlan = new GeometryBinaryEncodePlan()
export const geometryTextEncodePlan = new GeometryTextEncodePlan()
