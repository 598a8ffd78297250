/**
 * Catalog Introspector
 *
 * Two phases against the Catalog service:
 *
 * 1. describe every query, concurrently and bounded, without executing it;
 * 2. fetch the definition of every type those descriptions mention,
 *    sequentially and in query order, into the run's TypeRegistry.
 *
 * Engine rejections and unmapped types are collected per query. A lost
 * connection or an inconsistent catalog stops the run.
 */
import { Array as Arr, Effect, Either, Option } from "effect";
import {
  CatalogConsistencyError,
  StatementRejected,
  UnsupportedTypeError,
  type ConnectionFailed,
  type EngineRejection,
} from "../errors.js";
import type {
  DescribedQuery,
  IntrospectedColumn,
  IntrospectedModule,
  IntrospectedQuery,
  PgType,
  Query,
  QueryModule,
  TypeRef,
} from "../ir/query-ir.js";
import type { TypeRegistry } from "../ir/type-registry.js";
import { CatalogService, type Catalog, type CatalogType } from "./catalog.js";
import { spanAt } from "./diagnostics.js";
import { scalarMapper, type TypeOverride } from "./pg-types.js";

// ============================================================================
// Describe
// ============================================================================

export interface DescribedModule {
  readonly module: QueryModule;
  readonly queries: readonly DescribedQuery[];
}

export interface DescribeResult {
  readonly modules: readonly DescribedModule[];
  readonly diagnostics: readonly StatementRejected[];
}

const WORD = /[\w$]/;

/**
 * Attribute an engine rejection to the query. When the engine reports a
 * position in a statement we sent verbatim, point at the word there.
 */
function toStatementRejected(module: QueryModule, query: Query, error: EngineRejection): StatementRejected {
  let span = query.bodySpan;
  // The engine counts characters; spans count UTF-16 code units
  const chars = Array.from(query.sql);
  if (error.position !== undefined && query.text === query.sql && error.position <= chars.length) {
    const start = query.bodySpan.start + chars.slice(0, error.position - 1).join("").length;
    let end = start;
    while (end < query.bodySpan.end && WORD.test(module.text.charAt(end))) end++;
    span = spanAt(module.path, module.text, start, end);
  }
  return new StatementRejected({
    message: error.message,
    query: query.name,
    span,
    code: error.code,
    detail: error.detail,
    hint: error.hint,
  });
}

/**
 * Describe every query of every module. Results keep file and query order
 * regardless of completion order.
 */
export const describeModules = (
  modules: readonly QueryModule[],
  concurrency: number,
): Effect.Effect<DescribeResult, ConnectionFailed, CatalogService> =>
  Effect.gen(function* () {
    const catalog = yield* CatalogService;
    const jobs = modules.flatMap(module => module.queries.map(query => ({ module, query })));

    const describeOne = (
      module: QueryModule,
      query: Query,
    ): Effect.Effect<Either.Either<DescribedQuery, StatementRejected>, ConnectionFailed> =>
      catalog.describe(query.text).pipe(
        Effect.tap(d =>
          Effect.logDebug(`Described ${module.path}#${query.name}: ${d.params.length} params, ${d.columns.length} columns`),
        ),
        Effect.map(description => Either.right({ query, description })),
        Effect.catchTag("EngineRejection", error => Effect.succeed(Either.left(toStatementRejected(module, query, error)))),
      );

    const outcomes = yield* Effect.forEach(jobs, ({ module, query }) => describeOne(module, query), { concurrency });

    const [diagnostics, described] = Arr.partitionMap(outcomes, o => o);
    return {
      modules: modules.map(module => ({
        module,
        queries: described.filter(d => module.queries.includes(d.query)),
      })),
      diagnostics,
    };
  });

// ============================================================================
// Type fetching
// ============================================================================

export type FetchError = UnsupportedTypeError | CatalogConsistencyError | ConnectionFailed;

export interface TypeFetcher {
  /** Resolve a type and everything it references into the registry */
  readonly fetch: (oid: TypeRef) => Effect.Effect<TypeRef, FetchError>;
  /** NOT NULL hint for a table column, cached per column */
  readonly columnNotNull: (table: number, column: number) => Effect.Effect<boolean, ConnectionFailed>;
}

const qualified = (type: CatalogType) => `${type.schema}.${type.name}`;

const unsupported = (type: CatalogType, reason: string) =>
  new UnsupportedTypeError({
    message: `unsupported type \`${qualified(type)}\`: ${reason}`,
    oid: type.oid,
    typeName: qualified(type),
  });

const inconsistent = (oid: TypeRef, path: readonly TypeRef[], message: string) =>
  new CatalogConsistencyError({ message, oid, path });

/**
 * Create a fetcher that writes into `registry`. Results are memoized per OID,
 * failures included, so a type shared by many queries is looked up once.
 */
export function createTypeFetcher(
  catalog: Catalog,
  registry: TypeRegistry,
  overrides: readonly TypeOverride[] = [],
): TypeFetcher {
  const mapScalar = scalarMapper(overrides);
  const failures = new Map<TypeRef, UnsupportedTypeError>();
  const notNull = new Map<string, boolean>();

  const define = (type: CatalogType, path: readonly TypeRef[]): Effect.Effect<PgType, FetchError> => {
    const base = { oid: type.oid, schema: type.schema, name: type.name };
    switch (type.typtype) {
      case "b": {
        if (type.category === "A" && type.element !== 0) {
          return fetchFrom(type.element, path).pipe(Effect.map((element): PgType => ({ ...base, kind: "array", element })));
        }
        const tsType = mapScalar(type);
        return tsType === undefined
          ? Effect.fail(unsupported(type, "no TypeScript mapping for this base type"))
          : Effect.succeed<PgType>({ ...base, kind: "scalar", tsType });
      }
      case "e":
        return catalog.enumLabels(type.oid).pipe(Effect.map((labels): PgType => ({ ...base, kind: "enum", labels })));
      case "d":
        return fetchFrom(type.base, path).pipe(Effect.map((baseType): PgType => ({ ...base, kind: "domain", base: baseType })));
      case "c":
        return catalog.compositeAttributes(type.relation).pipe(
          Effect.flatMap(attributes =>
            Effect.forEach(attributes, a => fetchFrom(a.type, path).pipe(Effect.map(t => ({ name: a.name, type: t })))),
          ),
          Effect.map((fields): PgType => ({ ...base, kind: "composite", fields })),
        );
      case "r":
        return catalog.rangeSubtype(type.oid).pipe(
          Effect.flatMap(
            Option.match({
              onNone: () =>
                Effect.fail(inconsistent(type.oid, path, `range type \`${qualified(type)}\` has no pg_range entry`)),
              onSome: subtype => fetchFrom(subtype, path),
            }),
          ),
          Effect.map((element): PgType => ({ ...base, kind: "range", element })),
        );
      case "m":
        return Effect.fail(unsupported(type, "multirange types are not supported"));
      case "p":
        return Effect.fail(unsupported(type, "pseudo-types have no fixed shape"));
    }
  };

  const fetchFrom = (oid: TypeRef, path: readonly TypeRef[]): Effect.Effect<TypeRef, FetchError> =>
    Effect.gen(function* () {
      if (registry.has(oid)) return oid;
      const failed = failures.get(oid);
      if (failed) return yield* Effect.fail(failed);

      const trail = [...path, oid];
      if (path.includes(oid)) {
        return yield* Effect.fail(inconsistent(oid, trail, `type ${oid} refers to itself (${trail.join(" -> ")})`));
      }
      const found = yield* catalog.lookupType(oid);
      if (Option.isNone(found)) {
        return yield* Effect.fail(inconsistent(oid, trail, `type ${oid} is not in the catalog; was it dropped during the run?`));
      }
      registry.add(yield* define(found.value, trail));
      return oid;
    }).pipe(
      Effect.tapError(error =>
        error._tag === "UnsupportedTypeError" ? Effect.sync(() => failures.set(oid, error)) : Effect.void,
      ),
    );

  return {
    fetch: oid => fetchFrom(oid, []),
    columnNotNull: (table, column) => {
      const key = `${table}:${column}`;
      const cached = notNull.get(key);
      return cached !== undefined
        ? Effect.succeed(cached)
        : catalog.columnNotNull(table, column).pipe(Effect.tap(value => Effect.sync(() => notNull.set(key, value))));
    },
  };
}

// ============================================================================
// Introspect
// ============================================================================

export interface IntrospectResult {
  readonly modules: readonly IntrospectedModule[];
  readonly diagnostics: readonly UnsupportedTypeError[];
}

const introspectQuery = (
  fetcher: TypeFetcher,
  { query, description }: DescribedQuery,
): Effect.Effect<IntrospectedQuery, FetchError> =>
  Effect.gen(function* () {
    const params = yield* Effect.forEach(description.params, oid => fetcher.fetch(oid));
    const columns = yield* Effect.forEach(description.columns, column =>
      Effect.gen(function* () {
        const type = yield* fetcher.fetch(column.typeOid);
        const notNullHint =
          column.tableOid !== 0 && column.columnNumber > 0
            ? yield* fetcher.columnNotNull(column.tableOid, column.columnNumber)
            : false;
        return { name: column.name, type, notNullHint } satisfies IntrospectedColumn;
      }),
    );
    return { query, params, columns };
  });

/**
 * Fetch the types of every described query, in file order then query order.
 * A query with an unmapped type is dropped and reported; the rest carry on.
 */
export const introspectModules = (
  described: readonly DescribedModule[],
  registry: TypeRegistry,
  overrides: readonly TypeOverride[] = [],
): Effect.Effect<IntrospectResult, CatalogConsistencyError | ConnectionFailed, CatalogService> =>
  Effect.gen(function* () {
    const catalog = yield* CatalogService;
    const fetcher = createTypeFetcher(catalog, registry, overrides);
    const diagnostics: UnsupportedTypeError[] = [];
    const modules: IntrospectedModule[] = [];

    for (const { module, queries } of described) {
      const introspected: IntrospectedQuery[] = [];
      for (const dq of queries) {
        const outcome = yield* introspectQuery(fetcher, dq).pipe(
          Effect.map(Option.some),
          Effect.catchTag("UnsupportedTypeError", error =>
            Effect.sync(() => {
              diagnostics.push(
                new UnsupportedTypeError({
                  message: error.message,
                  oid: error.oid,
                  typeName: error.typeName,
                  query: dq.query.name,
                  span: dq.query.bodySpan,
                }),
              );
              return Option.none<IntrospectedQuery>();
            }),
          ),
        );
        if (Option.isSome(outcome)) introspected.push(outcome.value);
      }
      modules.push({ path: module.path, queries: introspected });
    }

    yield* Effect.logDebug(`Registry holds ${registry.types().length} types`);
    return { modules, diagnostics };
  });
