/**
 * Testing Utilities
 *
 * An in-memory Catalog for exercising the pipeline without a database.
 *
 * ```typescript
 * import { FakeCatalogLayer, builtinTypes } from "pg-quill/testing"
 *
 * const catalog = FakeCatalogLayer({
 *   types: builtinTypes,
 *   statements: new Map([["select 1 as one", { params: [], columns: [column("one", 23)] }]]),
 * })
 *
 * it.effect("describes", () => program.pipe(Effect.provide(catalog)))
 * ```
 */
import { Effect, Layer, Option } from "effect";
import { ConnectionFailed, EngineRejection } from "./errors.js";
import type { DescribedColumn, StatementDescription } from "./ir/query-ir.js";
import { type Catalog, type CatalogAttribute, CatalogService, type CatalogType } from "./services/catalog.js";
import { PgTypeOid } from "./services/pg-types.js";

// =============================================================================
// Catalog rows
// =============================================================================

/** A base type row */
export const baseType = (oid: number, name: string, schema = "pg_catalog"): CatalogType => ({
  oid,
  name,
  schema,
  typtype: "b",
  category: "U",
  element: 0,
  base: 0,
  relation: 0,
});

export const arrayType = (oid: number, name: string, element: number, schema = "pg_catalog"): CatalogType => ({
  ...baseType(oid, name, schema),
  category: "A",
  element,
});

export const enumType = (oid: number, name: string, schema = "public"): CatalogType => ({
  ...baseType(oid, name, schema),
  typtype: "e",
  category: "E",
});

export const domainType = (oid: number, name: string, base: number, schema = "public"): CatalogType => ({
  ...baseType(oid, name, schema),
  typtype: "d",
  base,
});

export const compositeType = (oid: number, name: string, relation: number, schema = "public"): CatalogType => ({
  ...baseType(oid, name, schema),
  typtype: "c",
  category: "C",
  relation,
});

export const rangeType = (oid: number, name: string, schema = "pg_catalog"): CatalogType => ({
  ...baseType(oid, name, schema),
  typtype: "r",
  category: "R",
});

export const pseudoType = (oid: number, name: string): CatalogType => ({
  ...baseType(oid, name),
  typtype: "p",
  category: "P",
});

/** The built-in types the tests use */
export const builtinTypes: readonly CatalogType[] = [
  baseType(PgTypeOid.Bool, "bool"),
  baseType(PgTypeOid.Int8, "int8"),
  baseType(PgTypeOid.Int4, "int4"),
  baseType(PgTypeOid.Text, "text"),
  baseType(PgTypeOid.Numeric, "numeric"),
  baseType(PgTypeOid.Date, "date"),
  baseType(PgTypeOid.TimestampTz, "timestamptz"),
  baseType(PgTypeOid.Interval, "interval"),
  baseType(PgTypeOid.Uuid, "uuid"),
  baseType(PgTypeOid.JsonB, "jsonb"),
  arrayType(1000, "_bool", PgTypeOid.Bool),
  arrayType(1007, "_int4", PgTypeOid.Int4),
  arrayType(1009, "_text", PgTypeOid.Text),
  rangeType(3904, "int4range"),
  pseudoType(2278, "void"),
];

/** A result column; computed unless `table` and `attnum` are given */
export const column = (name: string, typeOid: number, table = 0, attnum = 0): DescribedColumn => ({
  name,
  typeOid,
  tableOid: table,
  columnNumber: attnum,
});

// =============================================================================
// Fake catalog
// =============================================================================

/** What describing a statement yields */
export type FakeStatement = StatementDescription | EngineRejection | ConnectionFailed;

export interface FakeCatalogData {
  readonly types: readonly CatalogType[];
  readonly enums?: ReadonlyMap<number, readonly string[]>;
  /** Composite attributes by relation OID */
  readonly attributes?: ReadonlyMap<number, readonly CatalogAttribute[]>;
  /** Range subtypes by range type OID */
  readonly ranges?: ReadonlyMap<number, number>;
  /** NOT NULL table columns as `table:attnum` */
  readonly notNull?: ReadonlySet<string>;
  /** Descriptions by exact statement text; unknown text is a syntax error */
  readonly statements: ReadonlyMap<string, FakeStatement>;
}

export interface FakeCatalog extends Catalog {
  /** Every type OID looked up, in call order */
  readonly lookups: readonly number[];
  /** Every statement described, in call order */
  readonly described: readonly string[];
}

export function createFakeCatalog(data: FakeCatalogData): FakeCatalog {
  const types = new Map(data.types.map(t => [t.oid, t]));
  const lookups: number[] = [];
  const described: string[] = [];

  return {
    lookups,
    described,

    describe: text =>
      Effect.suspend((): Effect.Effect<StatementDescription, EngineRejection | ConnectionFailed> => {
        described.push(text);
        const statement = data.statements.get(text);
        if (statement === undefined) {
          return Effect.fail(new EngineRejection({ message: "syntax error", code: "42601" }));
        }
        if (statement instanceof EngineRejection || statement instanceof ConnectionFailed) {
          return Effect.fail(statement);
        }
        return Effect.succeed(statement);
      }),

    lookupType: oid =>
      Effect.sync(() => {
        lookups.push(oid);
        return Option.fromNullable(types.get(oid));
      }),

    enumLabels: oid => Effect.succeed(data.enums?.get(oid) ?? []),

    compositeAttributes: relation => Effect.succeed(data.attributes?.get(relation) ?? []),

    rangeSubtype: oid => Effect.succeed(Option.fromNullable(data.ranges?.get(oid))),

    columnNotNull: (table, column) => Effect.succeed(data.notNull?.has(`${table}:${column}`) ?? false),
  };
}

/** Layer providing an in-memory catalog */
export const FakeCatalogLayer = (data: FakeCatalogData): Layer.Layer<CatalogService> =>
  Layer.succeed(CatalogService, createFakeCatalog(data));
