import { createNullLogger, type Logger } from "@pgeo/logger"
import { z } from "zod"
import type { EncodePlan, PgType, ScanPlan, TypeRegistry } from "../ports/codec"
import { PgTypeError } from "./errors"

const pgTypeSchema = z.object({
  name: z.string().min(1),
  oid: z.number().int().min(0).max(0xffffffff),
})

export type TypeMapDeps = {
  logger?: Logger
}

/**
 * Connection-scoped registry routing values of a type OID to its codec.
 *
 * Not shared between connections: OIDs of extension types such as
 * `geometry` differ per database.
 */
export class TypeMap implements TypeRegistry {
  private readonly byOid = new Map<number, PgType>()
  private readonly byName = new Map<string, PgType>()
  private readonly logger: Logger

  constructor(deps: TypeMapDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "type-map" })
  }

  /**
   * Registers `type`, replacing any entry with the same OID or name.
   *
   * @throws {PgTypeError} `invalid_type` for an empty name or an OID outside uint32.
   */
  registerType(type: PgType): void {
    const parsed = pgTypeSchema.safeParse(type)
    if (!parsed.success) {
      throw new PgTypeError(`invalid type registration: ${z.prettifyError(parsed.error)}`, {
        code: "invalid_type",
        context: { typeName: type.name, oid: type.oid },
      })
    }

    const sameOid = this.byOid.get(type.oid)
    if (sameOid) this.byName.delete(sameOid.name)

    const sameName = this.byName.get(type.name)
    if (sameName) this.byOid.delete(sameName.oid)

    this.byOid.set(type.oid, type)
    this.byName.set(type.name, type)

    this.logger.debug("registered type", { typeName: type.name, oid: type.oid })
  }

  typeForOid(oid: number): PgType | undefined {
    return this.byOid.get(oid)
  }

  typeForName(name: string): PgType | undefined {
    return this.byName.get(name)
  }

  planEncode(oid: number, format: number, value: unknown): EncodePlan {
    const type = this.requireType(oid)
    const plan = type.codec.planEncode(this, oid, format, value)

    if (!plan) throw formatUnsupported(type, format, "encode")
    return plan
  }

  planScan(oid: number, format: number, target: unknown): ScanPlan {
    const type = this.requireType(oid)
    const plan = type.codec.planScan(this, oid, format, target)

    if (!plan) throw formatUnsupported(type, format, "scan")
    return plan
  }

  encode(oid: number, format: number, value: unknown, buf: Uint8Array = new Uint8Array(0)): Uint8Array {
    return this.planEncode(oid, format, value).encode(value, buf)
  }

  scan(oid: number, format: number, src: Uint8Array | null, target: unknown): void {
    this.planScan(oid, format, target).scan(src, target)
  }

  decodeValue(oid: number, format: number, src: Uint8Array): unknown {
    return this.requireType(oid).codec.decodeValue(this, oid, format, src)
  }

  decodeDriverValue(oid: number, format: number, src: Uint8Array): unknown {
    return this.requireType(oid).codec.decodeDriverValue(this, oid, format, src)
  }

  private requireType(oid: number): PgType {
    const type = this.byOid.get(oid)
    if (type) return type

    throw new PgTypeError(`no type registered for OID ${oid}`, {
      code: "unknown_type",
      context: { oid },
    })
  }
}

function formatUnsupported(type: PgType, format: number, direction: "encode" | "scan"): PgTypeError {
  return new PgTypeError(`${type.name} cannot ${direction} format ${format}`, {
    code: "format_unsupported",
    context: { typeName: type.name, oid: type.oid, format, direction },
  })
}
