import { createPinoLogger, type Logger } from "@pgeo/logger"
import { Client } from "pg"
import type { GeometryConfig } from "../../config/geometry-config"
import { GeometryConnection } from "./geometry-connection"
import type { PgConnectionClient } from "./pg-queryable"

export type PgClientOptions = {
  connectionString: string
}

/**
 * Text results only: pg decodes every result field as a UTF-8 string, so
 * binary EWKB would not survive the trip. Geometries arrive as hex EWKB.
 */
export function createPgClient({ connectionString }: PgClientOptions): Client {
  return new Client({ connectionString })
}

export type ConnectGeometryDeps = {
  logger?: Logger
  createClient?: (options: PgClientOptions) => PgConnectionClient
}

export type ConnectedGeometry = {
  client: PgConnectionClient
  connection: GeometryConnection
}

/**
 * Opens a connection and registers the geometry codec on it. When
 * registration fails the client is closed and the registration error is
 * rethrown.
 */
export async function connectGeometry(
  config: GeometryConfig,
  deps: ConnectGeometryDeps = {},
): Promise<ConnectedGeometry> {
  const logger = deps.logger ?? createPinoLogger({ level: config.LOG_LEVEL })
  const createClient = deps.createClient ?? createPgClient

  const client = createClient({ connectionString: config.PG_CONNECTION_STRING })
  await client.connect()

  const connection = new GeometryConnection(client, { logger })

  try {
    await connection.register()
  } catch (err) {
    await client.end()
    throw err
  }

  return { client, connection }
}
