import type { Dimensions, Geometry, GeometryKind, GeometryOfKind, Position } from "../ports/geometry"
import { ByteReader } from "./byte-reader"
import { EwkbError } from "./errors"
import { EWKB_TYPE_MASK, EwkbFlag, kindForCode } from "./wkb-type"

export type UnmarshalResult = {
  geometry: Geometry
  /** 0 when the payload carries no SRID */
  srid: number
  bytesRead: number
}

type Header = {
  kind: GeometryKind
  dims: Dimensions
  srid: number
}

const HEADER_SIZE = 5

/**
 * Decode EWKB (or plain / ISO WKB) into a GeoJSON geometry.
 *
 * Either byte order is accepted, per geometry. Trailing bytes are left
 * unread and reflected in `bytesRead`.
 *
 * @throws {EwkbError} on malformed or unsupported input.
 */
export function unmarshal(bytes: Uint8Array): UnmarshalResult {
  const reader = new ByteReader(bytes)
  const { geometry, srid } = readGeometry(reader)

  return { geometry, srid, bytesRead: reader.offset }
}

function readHeader(r: ByteReader): Header {
  const order = r.uint8()
  if (order !== 0 && order !== 1) {
    throw new EwkbError(`invalid byte order marker ${order}`, {
      code: "invalid_byte_order",
      context: { order, offset: r.offset - 1 },
    })
  }
  r.littleEndian = order === 1

  const word = r.uint32()
  let hasZ = (word & EwkbFlag.Z) !== 0
  let hasM = (word & EwkbFlag.M) !== 0
  const hasSrid = (word & EwkbFlag.SRID) !== 0

  let code = word & EWKB_TYPE_MASK
  const isoDimension = Math.floor(code / 1000)
  if (isoDimension > 3) throw unsupportedType(word)

  code %= 1000
  hasZ ||= isoDimension === 1 || isoDimension === 3
  hasM ||= isoDimension === 2 || isoDimension === 3

  const kind = kindForCode(code)
  if (!kind) throw unsupportedType(word)

  if (hasM) {
    throw new EwkbError(`measured ${kind} geometries are not supported`, {
      code: "unsupported_dimension",
      context: { kind },
    })
  }

  const srid = hasSrid ? r.uint32() : 0

  return { kind, dims: hasZ ? 3 : 2, srid }
}

function unsupportedType(word: number): EwkbError {
  return new EwkbError(`unsupported geometry type 0x${(word >>> 0).toString(16)}`, {
    code: "unsupported_geometry_type",
    context: { type: word >>> 0 },
  })
}

function readGeometry(r: ByteReader): { geometry: Geometry; srid: number } {
  const { kind, dims, srid } = readHeader(r)

  return { geometry: readBody(r, kind, dims), srid }
}

function readBody(r: ByteReader, kind: GeometryKind, dims: Dimensions): Geometry {
  switch (kind) {
    case "Point": {
      const p = readPosition(r, dims)
      return { type: "Point", coordinates: p.every(Number.isNaN) ? [] : p }
    }
    case "LineString":
      return { type: "LineString", coordinates: readPositions(r, dims) }
    case "Polygon":
      return { type: "Polygon", coordinates: readRings(r, dims) }
    case "MultiPoint":
      return {
        type: "MultiPoint",
        coordinates: readMembers(r, "Point").map((m) => m.coordinates),
      }
    case "MultiLineString":
      return {
        type: "MultiLineString",
        coordinates: readMembers(r, "LineString").map((m) => m.coordinates),
      }
    case "MultiPolygon":
      return {
        type: "MultiPolygon",
        coordinates: readMembers(r, "Polygon").map((m) => m.coordinates),
      }
    case "GeometryCollection": {
      const n = r.count(HEADER_SIZE)
      const geometries: Geometry[] = []
      for (let i = 0; i < n; i++) geometries.push(readGeometry(r).geometry)
      return { type: "GeometryCollection", geometries }
    }
  }
}

function readPosition(r: ByteReader, dims: Dimensions): Position {
  const p: Position = [r.float64(), r.float64()]
  if (dims === 3) p.push(r.float64())
  return p
}

function readPositions(r: ByteReader, dims: Dimensions): Position[] {
  const n = r.count(dims * 8)
  const positions: Position[] = []
  for (let i = 0; i < n; i++) positions.push(readPosition(r, dims))
  return positions
}

function readRings(r: ByteReader, dims: Dimensions): Position[][] {
  const n = r.count(4)
  const rings: Position[][] = []
  for (let i = 0; i < n; i++) rings.push(readPositions(r, dims))
  return rings
}

function readMembers<K extends GeometryKind>(r: ByteReader, kind: K): GeometryOfKind<K>[] {
  const n = r.count(HEADER_SIZE)
  const members: GeometryOfKind<K>[] = []

  for (let i = 0; i < n; i++) {
    const { geometry } = readGeometry(r)

    if (!isKind(geometry, kind)) {
      throw new EwkbError(`expected ${kind} member, got ${geometry.type}`, {
        code: "invalid_geometry",
        context: { expected: kind, actual: geometry.type },
      })
    }

    members.push(geometry)
  }

  return members
}

function isKind<K extends GeometryKind>(g: Geometry, kind: K): g is GeometryOfKind<K> {
  return g.type === kind
}
