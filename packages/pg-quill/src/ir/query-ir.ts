/**
 * Query IR - Intermediate representation of annotated queries
 *
 * Flows through the pipeline in stages:
 * parsed (Query) → described (DescribedQuery) → introspected (IntrospectedQuery)
 * → resolved (ResolvedQuery).
 * Each stage is a new value; earlier stages are never mutated.
 */

// ============================================================================
// Source locations
// ============================================================================

/**
 * A region of a source file. Offsets are UTF-16 code unit indexes into the
 * file text; line and column are 1-based and point at `start`.
 */
export interface Span {
  readonly path: string;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

// ============================================================================
// Parsed queries
// ============================================================================

export const Cardinalities = ["one", "maybe-one", "many", "execute"] as const;

/** Declared row-count contract of a query */
export type Cardinality = (typeof Cardinalities)[number];

export function isCardinality(value: string): value is Cardinality {
  return Cardinalities.some(c => c === value);
}

/**
 * A bind parameter as written in the query body.
 * Named binds (`:id`) are numbered by first appearance.
 */
export interface BindParam {
  /** 1-based position in the executable statement */
  readonly index: number;
  /** Bind name for `:name` binds, undefined for `$n` placeholders */
  readonly name?: string;
  /** Marked `name?` in the directive */
  readonly nullable: boolean;
  /** Marked `name[?]`: the elements of an array parameter may be NULL */
  readonly innerNullable: boolean;
}

/** A `name?`, `name[?]` or `name?[?]` entry of a nullability list */
export interface NullableField {
  readonly name: string;
  readonly nullable: boolean;
  /** Array elements may be NULL */
  readonly innerNullable: boolean;
}

export interface Query {
  /** Name as written in the directive */
  readonly name: string;
  readonly cardinality: Cardinality;
  /** Statement body exactly as written, without the terminator */
  readonly sql: string;
  /** Statement sent to the database: `sql` with named binds rewritten to `$n` */
  readonly text: string;
  readonly params: readonly BindParam[];
  /** Result columns marked `name?` or `name[?]` in the directive or the named row type */
  readonly columnOverrides: readonly NullableField[];
  /** User-chosen params type name: `--! name Params : ...` */
  readonly paramsStruct?: string;
  /** User-chosen row type name: `--! name : many Row` */
  readonly rowStruct?: string;
  /** The directive line */
  readonly span: Span;
  /** The statement body */
  readonly bodySpan: Span;
}

/** One input file and its queries, in source order */
export interface QueryModule {
  readonly path: string;
  readonly text: string;
  readonly queries: readonly Query[];
}

// ============================================================================
// Described queries
// ============================================================================

/** A result column as reported by the engine's RowDescription */
export interface DescribedColumn {
  readonly name: string;
  readonly typeOid: number;
  /** Source table OID, 0 for computed columns */
  readonly tableOid: number;
  /** Source attribute number, 0 for computed columns */
  readonly columnNumber: number;
}

export interface StatementDescription {
  /** Parameter type OIDs, in placeholder order */
  readonly params: readonly number[];
  /** Result columns in select-list order; empty for statements without rows */
  readonly columns: readonly DescribedColumn[];
}

export interface DescribedQuery {
  readonly query: Query;
  readonly description: StatementDescription;
}

/** A result column with its type fetched and the catalog's NOT NULL hint */
export interface IntrospectedColumn {
  readonly name: string;
  readonly type: TypeRef;
  /**
   * The column is a direct reference to a table column declared NOT NULL.
   * Only a hint: the statement may still attenuate it (outer joins, set operations).
   */
  readonly notNullHint: boolean;
}

export interface IntrospectedQuery {
  readonly query: Query;
  readonly params: readonly TypeRef[];
  readonly columns: readonly IntrospectedColumn[];
}

export interface IntrospectedModule {
  readonly path: string;
  readonly queries: readonly IntrospectedQuery[];
}

// ============================================================================
// Catalog types
// ============================================================================

/** Catalog identity of a type (its OID), stable for the duration of a run */
export type TypeRef = number;

export type PgTypeKind = "scalar" | "enum" | "domain" | "composite" | "array" | "range";

interface PgTypeBase {
  readonly kind: PgTypeKind;
  readonly oid: TypeRef;
  readonly schema: string;
  readonly name: string;
}

/** A base type with a direct TypeScript mapping */
export interface ScalarType extends PgTypeBase {
  readonly kind: "scalar";
  /** TypeScript type text from the mapping table */
  readonly tsType: string;
}

export interface EnumType extends PgTypeBase {
  readonly kind: "enum";
  /** Labels in catalog sort order */
  readonly labels: readonly string[];
}

export interface DomainType extends PgTypeBase {
  readonly kind: "domain";
  readonly base: TypeRef;
}

export interface CompositeField {
  readonly name: string;
  readonly type: TypeRef;
}

export interface CompositeType extends PgTypeBase {
  readonly kind: "composite";
  readonly fields: readonly CompositeField[];
}

export interface ArrayType extends PgTypeBase {
  readonly kind: "array";
  readonly element: TypeRef;
}

export interface RangeType extends PgTypeBase {
  readonly kind: "range";
  readonly element: TypeRef;
}

export type PgType = ScalarType | EnumType | DomainType | CompositeType | ArrayType | RangeType;

/** Kinds that get their own generated declaration */
export type NamedPgType = EnumType | DomainType | CompositeType;

export function isNamedPgType(type: PgType): type is NamedPgType {
  return type.kind === "enum" || type.kind === "domain" || type.kind === "composite";
}

// ============================================================================
// Resolved queries
// ============================================================================

export interface ResolvedParam {
  readonly index: number;
  /** Property name in the generated params object */
  readonly name: string;
  readonly type: TypeRef;
  readonly nullable: boolean;
  /** Array elements may be NULL; only ever set on array types */
  readonly innerNullable: boolean;
}

export interface ResolvedColumn {
  readonly name: string;
  readonly type: TypeRef;
  readonly nullable: boolean;
  /** Array elements may be NULL; only ever set on array types */
  readonly innerNullable: boolean;
}

export interface ResolvedQuery {
  readonly query: Query;
  readonly params: readonly ResolvedParam[];
  readonly columns: readonly ResolvedColumn[];
  /** Generated params type name; absent when the query takes no parameters */
  readonly paramsType?: string;
  /** Generated row type name; absent for `execute` queries */
  readonly rowType?: string;
}

export interface ResolvedModule {
  readonly path: string;
  readonly queries: readonly ResolvedQuery[];
}
