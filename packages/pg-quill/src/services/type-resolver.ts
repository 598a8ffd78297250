/**
 * Type Resolver / Deduplicator
 *
 * Turns introspected queries into resolved signatures: nullability decided,
 * parameters named, and row and params shapes given their canonical names in
 * the shared TypeRegistry. Pure apart from the registry it is handed; queries
 * are visited in file order, then in-file order, so names are stable.
 */
import { QuerySyntaxError } from "../errors.js"
import type {
  IntrospectedModule,
  IntrospectedQuery,
  Query,
  ResolvedColumn,
  ResolvedModule,
  ResolvedParam,
  ResolvedQuery,
  TypeRef,
} from "../ir/query-ir.js"
import type { ShapeField, ShapeSpace, TypeRegistry } from "../ir/type-registry.js"
import { keywords } from "../lib/sql-lexer.js"
import { defaultInflection, type Inflection } from "./inflection.js"

// ============================================================================
// Nullability
// ============================================================================

/**
 * Keywords that can null out a column the catalog declares NOT NULL: outer
 * joins, set operations and grouping sets.
 */
export const ATTENUATING_KEYWORDS: readonly string[] = [
  "LEFT",
  "RIGHT",
  "FULL",
  "UNION",
  "INTERSECT",
  "EXCEPT",
  "ROLLUP",
  "CUBE",
  "GROUPING",
]

/** Whether the statement may turn a NOT NULL table column into NULL */
export function isAttenuated(sql: string): boolean {
  const words = keywords(sql)
  return ATTENUATING_KEYWORDS.some(k => words.has(k))
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveResult {
  readonly modules: readonly ResolvedModule[]
  readonly diagnostics: readonly QuerySyntaxError[]
}

const isArray = (registry: TypeRegistry, oid: TypeRef): boolean => registry.get(oid)?.kind === "array"

function checkQuery(registry: TypeRegistry, introspected: IntrospectedQuery): QuerySyntaxError | undefined {
  const { query, params, columns } = introspected
  const fail = (message: string, span = query.bodySpan) => new QuerySyntaxError({ message, span })

  if (params.length !== query.params.length) {
    return fail(
      `the statement takes ${params.length} parameter(s) but query \`${query.name}\` binds ${query.params.length}`,
    )
  }
  if (query.cardinality !== "execute" && columns.length === 0) {
    return fail(
      `query \`${query.name}\` is declared \`${query.cardinality}\` but returns no columns; declare it \`execute\``,
    )
  }
  const types = new Map<string, TypeRef>()
  for (const column of columns) {
    if (types.has(column.name)) {
      return fail(`column \`${column.name}\` appears more than once in the result of \`${query.name}\`; give it an alias`)
    }
    types.set(column.name, column.type)
  }
  const missing = query.columnOverrides.find(o => !types.has(o.name))
  if (missing !== undefined) {
    return fail(`\`${missing.name}\` is not a column of the result of \`${query.name}\``, query.span)
  }

  const scalarParam = query.params.find((p, i) => p.innerNullable && !isArray(registry, params[i] ?? 0))
  if (scalarParam !== undefined) {
    const label = scalarParam.name ?? `$${scalarParam.index}`
    return fail(
      `\`${label}[?]\` marks array elements nullable, but parameter \`${label}\` of \`${query.name}\` is not an array`,
      query.span,
    )
  }
  const scalarColumn = query.columnOverrides.find(o => o.innerNullable && !isArray(registry, types.get(o.name) ?? 0))
  if (scalarColumn !== undefined) {
    return fail(
      `\`${scalarColumn.name}[?]\` marks array elements nullable, but column \`${scalarColumn.name}\` of \`${query.name}\` is not an array`,
      query.span,
    )
  }
  return undefined
}

/** A checked query with nullability decided, before its shapes are named */
interface Draft {
  readonly query: Query
  readonly params: readonly ResolvedParam[]
  readonly columns: readonly ResolvedColumn[]
}

function draftQuery(introspected: IntrospectedQuery): Draft {
  const { query } = introspected
  const attenuated = isAttenuated(query.text)
  const overrides = new Map(query.columnOverrides.map(o => [o.name, o]))

  const params: ResolvedParam[] = query.params.map((param, i) => ({
    index: param.index,
    name: param.name ?? `p${param.index}`,
    type: introspected.params[i] ?? 0,
    nullable: param.nullable,
    innerNullable: param.innerNullable,
  }))

  const columns: ResolvedColumn[] = introspected.columns.map(column => ({
    name: column.name,
    type: column.type,
    nullable: !column.notNullHint || attenuated || (overrides.get(column.name)?.nullable ?? false),
    innerNullable: overrides.get(column.name)?.innerNullable ?? false,
  }))

  return { query, params, columns }
}

/** Bind the draft's user-chosen type names; the first problem is reported */
function claimNames(registry: TypeRegistry, { query, params, columns }: Draft): QuerySyntaxError | undefined {
  const claims: ReadonlyArray<readonly [ShapeSpace, string | undefined, readonly ShapeField[]]> = [
    ["params", query.paramsStruct, params],
    ["row", query.rowStruct, columns],
  ]
  for (const [space, name, fields] of claims) {
    if (name === undefined) continue
    switch (registry.namedShape(space, fields, name)) {
      case "bound":
        continue
      case "mismatch":
        return new QuerySyntaxError({
          message: `\`${name}\` is already used for a different shape; every use of a named type must have the same fields`,
          span: query.span,
        })
      case "taken":
        return new QuerySyntaxError({
          message: `\`${name}\` is already the name of a generated type; choose another name`,
          span: query.span,
        })
    }
  }
  return undefined
}

function nameShapes(registry: TypeRegistry, inflection: Inflection, { query, params, columns }: Draft): ResolvedQuery {
  return {
    query,
    params,
    columns,
    paramsType:
      params.length > 0
        ? (query.paramsStruct ?? registry.shapeName("params", params, inflection.paramsTypeName(query.name)))
        : undefined,
    rowType:
      query.cardinality !== "execute"
        ? (query.rowStruct ?? registry.shapeName("row", columns, inflection.rowTypeName(query.name)))
        : undefined,
  }
}

/**
 * Resolve every query. A query that fails a check is reported and left out
 * of its module; the others are unaffected. User-chosen type names are bound
 * before any name is minted, so a generated name never takes one.
 */
export function resolveModules(
  registry: TypeRegistry,
  modules: readonly IntrospectedModule[],
  inflection: Inflection = defaultInflection,
): ResolveResult {
  const diagnostics: QuerySyntaxError[] = []
  const keep = (problem: QuerySyntaxError | undefined): boolean => {
    if (problem) diagnostics.push(problem)
    return problem === undefined
  }

  const drafts = modules.map(module => ({
    path: module.path,
    drafts: module.queries.filter(q => keep(checkQuery(registry, q))).map(draftQuery),
  }))
  const claimed = drafts.map(module => ({
    path: module.path,
    drafts: module.drafts.filter(draft => keep(claimNames(registry, draft))),
  }))
  const resolved = claimed.map(module => ({
    path: module.path,
    queries: module.drafts.map(draft => nameShapes(registry, inflection, draft)),
  }))
  return { modules: resolved, diagnostics }
}
