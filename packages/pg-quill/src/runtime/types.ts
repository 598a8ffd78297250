/**
 * Shapes shared by generated modules
 */
import type { QueryResult, QueryResultRow } from "pg"

/** What generated accessors need from a pg Pool, PoolClient or Client */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}

/** Parses one value from its PostgreSQL text form */
export type TextParser<T> = (text: string) => T

export interface Decoder<T> {
  readonly parse: TextParser<T>
}

/** Decoder for types that also need encoding when sent as a parameter */
export interface Codec<T> extends Decoder<T> {
  readonly encode: (value: T) => string
}

/** `interval`, as parsed by pg */
export interface Interval {
  readonly years?: number
  readonly months?: number
  readonly days?: number
  readonly hours?: number
  readonly minutes?: number
  readonly seconds?: number
  readonly milliseconds?: number
}

/** `point`, as parsed by pg */
export interface Point {
  readonly x: number
  readonly y: number
}

/** `circle`, as parsed by pg */
export interface Circle {
  readonly x: number
  readonly y: number
  readonly radius: number
}
