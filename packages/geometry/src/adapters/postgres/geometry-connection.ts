import { createNullLogger, type Logger } from "@pgeo/logger"
import {
  type FormatCode,
  FormatCodes,
  formatCodeOf,
  isRef,
  type PgType,
  TypeMap,
  unsupportedOperation,
} from "@pgeo/pgtype"
import { GeometryCodecError } from "../../core/errors"
import { GeometryParam } from "./geometry-param"
import type { PgField, PgQueryable, PgQueryResult } from "./pg-queryable"
import { GEOMETRY_TYPE_NAME, registerGeometry } from "./register-geometry"

export type GeometryRow = Record<string, unknown>

export type GeometryConnectionDeps = {
  typeMap?: TypeMap
  logger?: Logger
}

type WireValue = {
  format: FormatCode
  src: Uint8Array
}

const utf8 = new TextEncoder()
const ascii = new TextDecoder()

/**
 * A `pg` client paired with its own {@link TypeMap}.
 *
 * Parameters wrapped with {@link GeometryParam} are sent as hex EWKB text;
 * result columns whose type is registered are decoded by their codec in the
 * column's wire format.
 */
export class GeometryConnection {
  readonly typeMap: TypeMap
  private readonly logger: Logger

  constructor(
    private readonly client: PgQueryable,
    deps: GeometryConnectionDeps = {},
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "geometry-connection" })
    this.typeMap = deps.typeMap ?? new TypeMap({ logger: this.logger })
  }

  async register(): Promise<PgType> {
    return registerGeometry(this.client, this.typeMap, { logger: this.logger })
  }

  /** Runs `sql` and returns rows keyed by column name, geometries decoded. */
  async query(sql: string, params: unknown[] = []): Promise<GeometryRow[]> {
    const result = await this.run(sql, params)

    return result.rows.map((row) =>
      Object.fromEntries(
        result.fields.map((field, i) => [field.name, this.decodeColumn(field, columnAt(row, i))]),
      ),
    )
  }

  /**
   * Runs `sql` and scans the first row into `targets`, one per column.
   * Registered types go through their codec's scan plan; other columns are
   * assigned as `pg` returned them.
   *
   * @throws {GeometryCodecError} `no_rows` for an empty result.
   */
  async queryRow(sql: string, params: unknown[], targets: unknown[]): Promise<void> {
    const result = await this.run(sql, params)

    if (result.rows.length === 0) {
      throw new GeometryCodecError("no rows in result set", { code: "no_rows" })
    }

    if (targets.length !== result.fields.length) {
      throw new GeometryCodecError(
        `expected ${result.fields.length} targets, got ${targets.length}`,
        {
          code: "column_count_mismatch",
          context: { columns: result.fields.length, targets: targets.length },
        },
      )
    }

    const row = result.rows[0]
    result.fields.forEach((field, i) => this.scanColumn(field, columnAt(row, i), targets[i]))
  }

  private async run(sql: string, params: unknown[]): Promise<PgQueryResult> {
    const values = params.map((p) => this.encodeParam(p))
    const result = await this.client.query({ text: sql, values, rowMode: "array" })

    this.logger.debug("query complete", { rows: result.rows.length, columns: result.fields.length })

    return result
  }

  private encodeParam(value: unknown): unknown {
    if (!(value instanceof GeometryParam)) return value

    const type = this.typeMap.typeForName(GEOMETRY_TYPE_NAME)
    if (!type) {
      throw new GeometryCodecError("geometry type is not registered on this connection", {
        code: "not_registered",
        context: { typeName: GEOMETRY_TYPE_NAME },
      })
    }

    return ascii.decode(this.typeMap.encode(type.oid, FormatCodes.Text, value.geometry))
  }

  private decodeColumn(field: PgField, raw: unknown): unknown {
    if (raw === null || raw === undefined) return null
    if (!this.typeMap.typeForOid(field.dataTypeID)) return raw

    const { format, src } = toWire(field, raw)
    return this.typeMap.decodeValue(field.dataTypeID, format, src)
  }

  private scanColumn(field: PgField, raw: unknown, target: unknown): void {
    if (this.typeMap.typeForOid(field.dataTypeID)) {
      const wire = raw === null || raw === undefined ? null : toWire(field, raw)
      const format = wire?.format ?? formatCodeOf(field.format) ?? FormatCodes.Text

      this.typeMap.scan(field.dataTypeID, format, wire?.src ?? null, target)
      return
    }

    if (!isRef(target)) {
      throw new GeometryCodecError(`target for column ${field.name} must be a reference`, {
        code: "invalid_destination",
        context: { column: field.name },
      })
    }

    if (raw !== null && raw !== undefined) target.set(raw)
  }
}

function columnAt(row: unknown, index: number): unknown {
  if (!Array.isArray(row)) throw unsupportedOperation({ reason: "expected array rows" })
  return row[index]
}

function toWire(field: PgField, raw: unknown): WireValue {
  const format = formatCodeOf(field.format) ?? FormatCodes.Text

  if (raw instanceof Uint8Array) return { format, src: raw }
  // pg hands out binary-format fields as UTF-8 decoded strings; the bytes are gone.
  if (typeof raw === "string" && format === FormatCodes.Text) return { format, src: utf8.encode(raw) }

  throw unsupportedOperation({ column: field.name, format, valueType: typeof raw })
}
