/**
 * Catalog Service
 *
 * The only component that talks to the database. It prepares statements
 * without executing them and reads type definitions from pg_catalog.
 * Everything above it works on the plain values it returns, which lets tests
 * swap in an in-memory catalog (see testing.ts).
 */
import { Context, Effect, Layer, Option } from "effect"
import pg from "pg"
import type { StatementDescription } from "../ir/query-ir.js"
import { ConnectionFailed, EngineRejection } from "../errors.js"
import { DescribeStatement, type DescribeOutcome } from "../lib/pg-describe.js"

// ============================================================================
// Catalog rows
// ============================================================================

/** typtype codes from pg_type */
export type TypType = "b" | "c" | "d" | "e" | "p" | "r" | "m"

/** One pg_type row, reduced to what type resolution needs */
export interface CatalogType {
  readonly oid: number
  readonly name: string
  readonly schema: string
  readonly typtype: TypType
  /** typcategory, `A` for arrays */
  readonly category: string
  /** typelem: element type for arrays, 0 otherwise */
  readonly element: number
  /** typbasetype: base type for domains, 0 otherwise */
  readonly base: number
  /** typrelid: the composite's pg_class row, 0 otherwise */
  readonly relation: number
}

export interface CatalogAttribute {
  readonly name: string
  readonly type: number
}

// ============================================================================
// Service
// ============================================================================

/**
 * Catalog service interface
 */
export interface Catalog {
  /** Prepare and describe a statement without executing it */
  readonly describe: (text: string) => Effect.Effect<StatementDescription, EngineRejection | ConnectionFailed>
  readonly lookupType: (oid: number) => Effect.Effect<Option.Option<CatalogType>, ConnectionFailed>
  /** Enum labels in sort order */
  readonly enumLabels: (oid: number) => Effect.Effect<readonly string[], ConnectionFailed>
  /** Live attributes of a composite's relation, in attribute order */
  readonly compositeAttributes: (relation: number) => Effect.Effect<readonly CatalogAttribute[], ConnectionFailed>
  readonly rangeSubtype: (oid: number) => Effect.Effect<Option.Option<number>, ConnectionFailed>
  /**
   * Whether a table column is declared NOT NULL. Views, foreign tables and
   * missing attributes all answer false.
   */
  readonly columnNotNull: (table: number, column: number) => Effect.Effect<boolean, ConnectionFailed>
}

/**
 * Service tag for dependency injection
 */
export class CatalogService extends Context.Tag("Catalog")<CatalogService, Catalog>() {}

// ============================================================================
// Live implementation
// ============================================================================

export interface CatalogOptions {
  readonly connectionString: string
  /** Pool size, which bounds concurrent describes */
  readonly concurrency: number
}

/** Hide the password in anything we print */
export const maskConnectionString = (connectionString: string): string =>
  connectionString.replace(/:[^:@/]+@/, ":***@")

const TYPE_QUERY = `
select t.oid, t.typname as name, n.nspname as schema, t.typtype, t.typcategory as category,
       t.typelem as element, t.typbasetype as base, t.typrelid as relation
  from pg_catalog.pg_type t
  join pg_catalog.pg_namespace n on n.oid = t.typnamespace
 where t.oid = $1`

const ENUM_QUERY = `
select enumlabel as label
  from pg_catalog.pg_enum
 where enumtypid = $1
 order by enumsortorder`

const ATTRIBUTE_QUERY = `
select attname as name, atttypid as type
  from pg_catalog.pg_attribute
 where attrelid = $1 and attnum > 0 and not attisdropped
 order by attnum`

const RANGE_QUERY = `
select rngsubtype as subtype
  from pg_catalog.pg_range
 where rngtypid = $1`

const NOT_NULL_QUERY = `
select a.attnotnull and c.relkind in ('r', 'p') as not_null
  from pg_catalog.pg_attribute a
  join pg_catalog.pg_class c on c.oid = a.attrelid
 where a.attrelid = $1 and a.attnum = $2 and not a.attisdropped`

const TYPTYPES: ReadonlySet<string> = new Set(["b", "c", "d", "e", "p", "r", "m"])
const isTypType = (value: string): value is TypType => TYPTYPES.has(value)

/**
 * Create a Catalog backed by a pg pool.
 */
export function createCatalog(pool: pg.Pool, options: CatalogOptions): Catalog {
  const connectionString = maskConnectionString(options.connectionString)
  const connectionFailed = (message: string) => (cause: unknown) =>
    new ConnectionFailed({
      message: `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
      connectionString,
      cause,
    })

  const query = <R extends pg.QueryResultRow>(text: string, values: readonly unknown[]) =>
    Effect.tryPromise({
      try: () => pool.query<R>(text, [...values]),
      catch: connectionFailed("Catalog query failed"),
    }).pipe(Effect.map(result => result.rows))

  let statements = 0

  const runDescribe = (client: pg.PoolClient, text: string) =>
    Effect.async<DescribeOutcome>(resume => {
      statements++
      client.query(new DescribeStatement(`pgquill_${statements}`, text, outcome => resume(Effect.succeed(outcome))))
    })

  return {
    describe: text =>
      Effect.acquireUseRelease(
        Effect.tryPromise({
          try: () => pool.connect(),
          catch: connectionFailed("Failed to connect to database"),
        }),
        client =>
          runDescribe(client, text).pipe(
            Effect.flatMap((outcome): Effect.Effect<StatementDescription, EngineRejection | ConnectionFailed> => {
              switch (outcome._tag) {
                case "Described":
                  return Effect.succeed(outcome.description)
                case "Rejected": {
                  const position = Number(outcome.error.position)
                  return Effect.fail(
                    new EngineRejection({
                      message: outcome.error.message,
                      code: outcome.error.code,
                      position: Number.isInteger(position) && position > 0 ? position : undefined,
                      detail: outcome.error.detail,
                      hint: outcome.error.hint,
                    }),
                  )
                }
                case "Lost":
                  return Effect.fail(connectionFailed("Connection lost while describing a statement")(outcome.cause))
              }
            }),
          ),
        (client, exit) =>
          Effect.sync(() => {
            // A connection that failed mid-protocol is destroyed, not reused
            const lost = exit._tag === "Failure" && exit.cause._tag === "Fail" && exit.cause.error._tag === "ConnectionFailed"
            client.release(lost)
          }),
      ),

    lookupType: oid =>
      query<{
        oid: number
        name: string
        schema: string
        typtype: string
        category: string
        element: number
        base: number
        relation: number
      }>(TYPE_QUERY, [oid]).pipe(
        Effect.map(rows =>
          Option.fromNullable(rows[0]).pipe(
            Option.flatMap(row =>
              isTypType(row.typtype)
                ? Option.some({
                    oid: Number(row.oid),
                    name: row.name,
                    schema: row.schema,
                    typtype: row.typtype,
                    category: row.category,
                    element: Number(row.element),
                    base: Number(row.base),
                    relation: Number(row.relation),
                  })
                : Option.none(),
            ),
          ),
        ),
      ),

    enumLabels: oid =>
      query<{ label: string }>(ENUM_QUERY, [oid]).pipe(Effect.map(rows => rows.map(r => r.label))),

    compositeAttributes: relation =>
      query<{ name: string; type: number }>(ATTRIBUTE_QUERY, [relation]).pipe(
        Effect.map(rows => rows.map(r => ({ name: r.name, type: Number(r.type) }))),
      ),

    rangeSubtype: oid =>
      query<{ subtype: number }>(RANGE_QUERY, [oid]).pipe(
        Effect.map(rows => Option.map(Option.fromNullable(rows[0]), r => Number(r.subtype))),
      ),

    columnNotNull: (table, column) =>
      query<{ not_null: boolean }>(NOT_NULL_QUERY, [table, column]).pipe(
        Effect.map(rows => rows[0]?.not_null === true),
      ),
  }
}

/**
 * Live layer: one pool for the whole run, ended when the layer is released.
 */
export const CatalogLive = (options: CatalogOptions): Layer.Layer<CatalogService> =>
  Layer.scoped(
    CatalogService,
    Effect.acquireRelease(
      Effect.sync(() => new pg.Pool({ connectionString: options.connectionString, max: options.concurrency })),
      pool => Effect.promise(() => pool.end()),
    ).pipe(Effect.map(pool => createCatalog(pool, options))),
  )
