/**
 * Decoders for values pg leaves in text form
 *
 * pg parses top-level columns of built-in types itself. Enum, domain,
 * composite and range columns, and arrays of them, arrive as text; so does
 * every field nested inside a composite. Generated row decoders run these
 * parsers only on values that are still strings.
 */
import pg from "pg"
import { parse as parseArray } from "postgres-array"
import { parse as parseRange, type Range } from "postgres-range"
import { DecodeError } from "./errors.js"
import { parseRecord } from "./record.js"
import type { TextParser } from "./types.js"

/** pg's own text parser for a type, the identity for types it does not know */
export const builtin = <T>(oid: number): TextParser<T> => {
  const parser = pg.types.getTypeParser(oid, "text")
  return text => parser(text)
}

export const text: TextParser<string> = value => value

/** Accept only the given labels */
export const enumOf =
  <const L extends string>(labels: readonly L[]): TextParser<L> =>
  value => {
    const label = labels.find(l => l === value)
    if (label === undefined) {
      throw new DecodeError({ message: `unexpected enum label \`${value}\`; expected one of ${labels.join(", ")}`, input: value })
    }
    return label
  }

/**
 * NULL elements come back as null. The declared element type says whether a
 * column may hold them, so the result is typed by the element parser alone.
 */
export const array =
  <T>(element: TextParser<T>): TextParser<Array<T>> =>
  value =>
    parseArray(value, element)

export const range =
  <T>(element: TextParser<T>): TextParser<Range<T>> =>
  value =>
    parseRange(value, element)

/** Parse a record literal, then build the value from its field texts */
export const composite =
  <T>(build: (fields: ReadonlyArray<string | null>) => T): TextParser<T> =>
  value =>
    build(parseRecord(value))

/** Parse one field of a record; NULL and missing fields are null */
export const field = <T>(fields: ReadonlyArray<string | null>, index: number, parser: TextParser<T>): T | null => {
  const raw = fields[index]
  return raw === undefined || raw === null ? null : parser(raw)
}

/** Parse a column value if pg left it as text */
export const value = <T>(input: T | string, parser: TextParser<T>): T =>
  typeof input === "string" ? parser(input) : input

export const nullable = <T>(input: T | string | null, parser: TextParser<T>): T | null =>
  input === null ? null : value(input, parser)
