/**
 * The slice of a `pg` client the geometry glue relies on. `pg.Client`,
 * `pg.PoolClient` and `pg.Pool` all satisfy it.
 */
export type PgQueryConfig = {
  text: string
  values?: unknown[]
  rowMode?: "array"
}

export type PgField = {
  name: string
  dataTypeID: number
  /** "text" or "binary" */
  format: string
}

export type PgQueryResult = {
  rows: unknown[]
  fields: PgField[]
}

export interface PgQueryable {
  query(config: PgQueryConfig): Promise<PgQueryResult>
}

export interface PgConnectionClient extends PgQueryable {
  connect(): Promise<void>
  end(): Promise<void>
}
