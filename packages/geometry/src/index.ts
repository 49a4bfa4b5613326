export {
  type ConnectedGeometry,
  type ConnectGeometryDeps,
  connectGeometry,
  createPgClient,
  type PgClientOptions,
} from "./adapters/postgres/connect-geometry"
export {
  GeometryConnection,
  type GeometryConnectionDeps,
  type GeometryRow,
} from "./adapters/postgres/geometry-connection"
export { GeometryParam, geometryParam } from "./adapters/postgres/geometry-param"
export type {
  PgConnectionClient,
  PgField,
  PgQueryable,
  PgQueryConfig,
  PgQueryResult,
} from "./adapters/postgres/pg-queryable"
export {
  GEOMETRY_TYPE_NAME,
  type RegisterGeometryDeps,
  registerGeometry,
} from "./adapters/postgres/register-geometry"
export {
  GEOMETRY_ENV_PREFIX,
  type GeometryConfig,
  geometryConfigSchema,
  loadGeometryConfig,
} from "./config/geometry-config"
export { GeometryCodecError, type GeometryCodecErrorCode, HexDecodeError } from "./core/errors"
export { GeometryCodec } from "./core/geometry-codec"
export {
  ANY_GEOMETRY,
  type GeometryFor,
  GeometryRef,
  geometryRef,
  isTargetKind,
  type TargetKind,
} from "./core/geometry-ref"
export { decodeHex, encodeHex } from "./core/hex"
export {
  GeometryBinaryEncodePlan,
  GeometryTextEncodePlan,
  geometryBinaryEncodePlan,
  geometryTextEncodePlan,
} from "./core/plans/encode-plans"
export {
  GeometryBinaryScanPlan,
  GeometryTextScanPlan,
  geometryBinaryScanPlan,
  geometryTextScanPlan,
} from "./core/plans/scan-plans"
