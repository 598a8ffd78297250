/**
 * Encoders for parameters pg cannot serialize on its own
 *
 * pg serializes strings, numbers, dates, buffers and arrays of them. Composite
 * values are sent as record literals and ranges as range literals; points,
 * circles and intervals, which pg parses into objects but does not write back,
 * get their text forms here.
 */
import { Range, serialize } from "postgres-range"
import { writeArray, writeRecord } from "./record.js"
import type { Circle, Interval, Point } from "./types.js"

const pad = (value: number, width: number): string => String(value).padStart(width, "0")

/**
 * A timestamp in local time with its UTC offset, the way pg writes Date
 * parameters, so a date nested in a literal names the same day as a top-level one.
 */
export function date(value: Date): string {
  let year = value.getFullYear()
  const bc = year < 1
  if (bc) year = Math.abs(year) + 1
  const offset = -value.getTimezoneOffset()
  const sign = offset < 0 ? "-" : "+"
  const minutes = Math.abs(offset)
  return (
    `${pad(year, 4)}-${pad(value.getMonth() + 1, 2)}-${pad(value.getDate(), 2)}` +
    `T${pad(value.getHours(), 2)}:${pad(value.getMinutes(), 2)}:${pad(value.getSeconds(), 2)}.${pad(value.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(minutes / 60), 2)}:${pad(minutes % 60, 2)}` +
    (bc ? " BC" : "")
  )
}

/** `(x,y)` */
export const point = (value: Point): string => `(${value.x},${value.y})`

/** `<(x,y),r>` */
export const circle = (value: Circle): string => `<(${value.x},${value.y}),${value.radius}>`

/** ISO 8601 duration; milliseconds are folded into the seconds */
export const interval = (value: Interval): string => {
  const seconds = (value.seconds ?? 0) + (value.milliseconds ?? 0) / 1000
  return `P${value.years ?? 0}Y${value.months ?? 0}M${value.days ?? 0}DT${value.hours ?? 0}H${value.minutes ?? 0}M${seconds}S`
}

/** Text form of a value nested in a record, array or range literal */
export function text(value: unknown): string {
  if (typeof value === "string") return value
  if (typeof value === "boolean") return value ? "t" : "f"
  if (typeof value === "number" || typeof value === "bigint") return String(value)
  if (value instanceof Date) return date(value)
  if (Buffer.isBuffer(value)) return `\\x${value.toString("hex")}`
  if (value instanceof Range) return serialize(value, text)
  if (Array.isArray(value)) {
    return writeArray(value.map((v: unknown) => (v === null || v === undefined ? null : text(v))))
  }
  return JSON.stringify(value)
}

/** A record literal from field values in attribute order */
export const record = (values: readonly unknown[]): string =>
  writeRecord(values.map(v => (v === null || v === undefined ? null : text(v))))

export const range = <T>(value: Range<T>): string => serialize(value, text)

/** Encode every non-null element of an array parameter */
export const array =
  <T, U>(element: (value: T) => U) =>
  (values: ReadonlyArray<T | null>): Array<U | null> =>
    values.map(v => (v === null ? null : element(v)))
