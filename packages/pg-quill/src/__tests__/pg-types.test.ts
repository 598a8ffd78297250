/**
 * Tests for PostgreSQL type mapping utilities
 */
import { describe, expect, it } from "@effect/vitest"
import { PgTypeOid, TsType, composeMappers, defaultPgToTs, extensionMapper, scalarMapper } from "../services/pg-types.js"

describe("defaultPgToTs", () => {
  it("maps built-in types the way pg parses them", () => {
    expect(defaultPgToTs(PgTypeOid.Int4)).toBe(TsType.Number)
    expect(defaultPgToTs(PgTypeOid.Int8)).toBe(TsType.String)
    expect(defaultPgToTs(PgTypeOid.TimestampTz)).toBe(TsType.Date)
    expect(defaultPgToTs(PgTypeOid.JsonB)).toBe(TsType.Unknown)
    expect(defaultPgToTs(PgTypeOid.Bytea)).toBe(TsType.Buffer)
    expect(defaultPgToTs(PgTypeOid.Interval)).toBe(TsType.Interval)
    expect(defaultPgToTs(PgTypeOid.Box)).toBe(TsType.String)
  })

  it("has no mapping for unknown OIDs", () => {
    expect(defaultPgToTs(99999)).toBeUndefined()
  })
})

describe("scalarMapper", () => {
  const int8 = { oid: PgTypeOid.Int8, schema: "pg_catalog", name: "int8" }
  const citext = { oid: 50001, schema: "public", name: "citext" }
  const money = { oid: 50002, schema: "billing", name: "cents" }

  it("prefers overrides by OID, name or qualified name", () => {
    expect(scalarMapper([{ type: 20, tsType: "bigint" }])(int8)).toBe("bigint")
    expect(scalarMapper([{ type: "int8", tsType: "bigint" }])(int8)).toBe("bigint")
    expect(scalarMapper([{ type: "billing.cents", tsType: "number" }])(money)).toBe("number")
    expect(scalarMapper([{ type: "other.cents", tsType: "number" }])(money)).toBeUndefined()
  })

  it("falls back to the built-in table, then to extension types", () => {
    expect(scalarMapper([])(int8)).toBe("string")
    expect(scalarMapper([])(citext)).toBe("string")
    expect(extensionMapper(money)).toBeUndefined()
  })

  it("composes mappers left to right", () => {
    const mapper = composeMappers(() => undefined, () => "first", () => "second")
    expect(mapper(money)).toBe("first")
  })
})
