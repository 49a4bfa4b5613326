import { createNullLogger, type Logger } from "@pgeo/logger"
import type { PgType, TypeMap } from "@pgeo/pgtype"
import { z } from "zod"
import { GeometryCodecError } from "../../core/errors"
import { GeometryCodec } from "../../core/geometry-codec"
import type { PgQueryable } from "./pg-queryable"

export const GEOMETRY_TYPE_NAME = "geometry"

const GEOMETRY_OID_QUERY = "select 'geometry'::text::regtype::oid as oid"

const oidRowSchema = z.object({
  oid: z.coerce.number().int().min(1).max(0xffffffff),
})

export type RegisterGeometryDeps = {
  logger?: Logger
}

/**
 * Looks up the OID PostGIS assigned to `geometry` in this database and
 * registers a {@link GeometryCodec} for it.
 *
 * Run once per physical connection, before any query that binds or returns
 * geometries. On failure `typeMap` is left as it was.
 *
 * @throws {GeometryCodecError} `registration_failed` wrapping the query error.
 */
export async function registerGeometry(
  client: PgQueryable,
  typeMap: TypeMap,
  deps: RegisterGeometryDeps = {},
): Promise<PgType> {
  const logger = deps.logger ?? createNullLogger()

  let oid: number
  try {
    const result = await client.query({ text: GEOMETRY_OID_QUERY })
    oid = oidRowSchema.parse(result.rows[0]).oid
  } catch (err) {
    throw new GeometryCodecError("get geometry oid failed", {
      code: "registration_failed",
      context: { typeName: GEOMETRY_TYPE_NAME },
      cause: err,
    })
  }

  const type: PgType = { name: GEOMETRY_TYPE_NAME, oid, codec: new GeometryCodec() }
  typeMap.registerType(type)

  logger.info("registered geometry codec", { typeName: GEOMETRY_TYPE_NAME, oid })

  return type
}
