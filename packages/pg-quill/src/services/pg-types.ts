/**
 * PostgreSQL Type Mapping Utilities
 *
 * Well-known PostgreSQL type OIDs and the default mapping from base types to
 * the TypeScript types node-postgres produces for them.
 */
import type { TypeOverride } from "../config.js"

export type { TypeOverride }

/**
 * Well-known PostgreSQL built-in type OIDs.
 * These are stable across PostgreSQL versions.
 */
export const PgTypeOid = {
  // Boolean
  Bool: 16,

  // Numeric
  Int2: 21,
  Int4: 23,
  Int8: 20,
  Float4: 700,
  Float8: 701,
  Numeric: 1700,

  // Text
  Char: 18,
  BpChar: 1042, // blank-padded char
  VarChar: 1043,
  Text: 25,
  Name: 19,

  // Binary
  Bytea: 17,

  // Date/Time
  Date: 1082,
  Time: 1083,
  TimeTz: 1266,
  Timestamp: 1114,
  TimestampTz: 1184,
  Interval: 1186,

  // Network
  Inet: 869,
  Cidr: 650,
  MacAddr: 829,
  MacAddr8: 774,

  // UUID
  Uuid: 2950,

  // JSON
  Json: 114,
  JsonB: 3802,
  JsonPath: 4072,

  // Geometric
  Point: 600,
  Line: 628,
  LSeg: 601,
  Box: 603,
  Path: 602,
  Polygon: 604,
  Circle: 718,

  // Other
  Oid: 26,
  Xml: 142,
  Money: 790,
  Bit: 1560,
  VarBit: 1562,
  TsVector: 3614,
  TsQuery: 3615,
} as const

export type PgTypeOid = (typeof PgTypeOid)[keyof typeof PgTypeOid]

/**
 * TypeScript types for code generation.
 *
 * `Interval`, `Point` and `Circle` are exported by the run-time module and
 * describe the objects pg's own parsers build.
 */
export const TsType = {
  String: "string",
  Number: "number",
  Boolean: "boolean",
  Date: "Date",
  Buffer: "Buffer",
  Unknown: "unknown",
  Interval: "Interval",
  Point: "Point",
  Circle: "Circle",
} as const

export type TsType = (typeof TsType)[keyof typeof TsType]

/** Type names the generated module must import from the run-time module */
export const RUNTIME_TYPES: ReadonlySet<string> = new Set([TsType.Interval, TsType.Point, TsType.Circle])

/**
 * Default mapping from PostgreSQL type OID to TypeScript type.
 *
 * Returns undefined for types without a built-in mapping.
 */
export function defaultPgToTs(oid: number): TsType | undefined {
  switch (oid) {
    // Boolean
    case PgTypeOid.Bool:
      return TsType.Boolean

    // Integer types → number
    case PgTypeOid.Int2:
    case PgTypeOid.Int4:
    case PgTypeOid.Oid:
      return TsType.Number

    // Floating point → number
    case PgTypeOid.Float4:
    case PgTypeOid.Float8:
      return TsType.Number

    // Big integers → string (pg does not parse them, to avoid precision loss)
    case PgTypeOid.Int8:
    case PgTypeOid.Numeric:
    case PgTypeOid.Money:
      return TsType.String

    // Text types → string
    case PgTypeOid.Char:
    case PgTypeOid.BpChar:
    case PgTypeOid.VarChar:
    case PgTypeOid.Text:
    case PgTypeOid.Name:
    case PgTypeOid.Xml:
    case PgTypeOid.Bit:
    case PgTypeOid.VarBit:
      return TsType.String

    // UUID → string
    case PgTypeOid.Uuid:
      return TsType.String

    // Network types → string
    case PgTypeOid.Inet:
    case PgTypeOid.Cidr:
    case PgTypeOid.MacAddr:
    case PgTypeOid.MacAddr8:
      return TsType.String

    // Date/Time with date component → Date
    case PgTypeOid.Date:
    case PgTypeOid.Timestamp:
    case PgTypeOid.TimestampTz:
      return TsType.Date

    // Time without date → string
    case PgTypeOid.Time:
    case PgTypeOid.TimeTz:
      return TsType.String

    case PgTypeOid.Interval:
      return TsType.Interval

    // JSON → unknown
    case PgTypeOid.Json:
    case PgTypeOid.JsonB:
      return TsType.Unknown

    case PgTypeOid.JsonPath:
      return TsType.String

    // Binary → Buffer
    case PgTypeOid.Bytea:
      return TsType.Buffer

    // pg parses points and circles; other geometric types stay text
    case PgTypeOid.Point:
      return TsType.Point
    case PgTypeOid.Circle:
      return TsType.Circle
    case PgTypeOid.Line:
    case PgTypeOid.LSeg:
    case PgTypeOid.Box:
    case PgTypeOid.Path:
    case PgTypeOid.Polygon:
      return TsType.String

    // Full-text search → string
    case PgTypeOid.TsVector:
    case PgTypeOid.TsQuery:
      return TsType.String

    default:
      return undefined
  }
}

/**
 * Type mapper function signature.
 * Takes a type and returns a TypeScript type string, or undefined to fall through.
 */
export type TypeMapper = (type: { readonly oid: number; readonly schema: string; readonly name: string }) =>
  | string
  | undefined

/**
 * Compose multiple type mappers into one.
 * Earlier mappers take precedence (first non-undefined wins).
 */
export function composeMappers(...mappers: readonly TypeMapper[]): TypeMapper {
  return type => {
    for (const mapper of mappers) {
      const result = mapper(type)
      if (result !== undefined) {
        return result
      }
    }
    return undefined
  }
}

// ============================================================================
// Extension Type Mapping
// ============================================================================

/**
 * Known extension types and their TypeScript mappings, keyed by type name.
 * Extension OIDs are assigned at install time, so these match by name.
 */
export const ExtensionTypeMap: Readonly<Record<string, TsType>> = {
  citext: TsType.String,
  ltree: TsType.String,
  lquery: TsType.String,
  ltxtquery: TsType.String,
  hstore: TsType.String,
  isbn: TsType.String,
  issn: TsType.String,
}

export const extensionMapper: TypeMapper = type =>
  Object.hasOwn(ExtensionTypeMap, type.name) ? ExtensionTypeMap[type.name] : undefined

// ============================================================================
// User overrides
// ============================================================================

/** Overrides match by OID, by name, or by `schema.name` */
export function overrideMapper(overrides: readonly TypeOverride[]): TypeMapper {
  return type =>
    overrides.find(o =>
      typeof o.type === "number" ? o.type === type.oid : o.type === type.name || o.type === `${type.schema}.${type.name}`,
    )?.tsType
}

/**
 * The mapper used for scalar base types: overrides first, then the built-in
 * table, then known extension types.
 */
export function scalarMapper(overrides: readonly TypeOverride[]): TypeMapper {
  return composeMappers(overrideMapper(overrides), type => defaultPgToTs(type.oid), extensionMapper)
}
