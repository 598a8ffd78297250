/**
 * Run-time support imported by generated query modules
 */
export * as decode from "./decode.js"
export * as encode from "./encode.js"
export { expectMaybeOne, expectOne } from "./cardinality.js"
export { DecodeError, QueryNotFoundError, TooManyRowsError } from "./errors.js"
export { parseRecord, writeArray, writeRecord } from "./record.js"
export type { Circle, Codec, Decoder, Interval, Point, Queryable, TextParser } from "./types.js"
export { Range } from "postgres-range"
