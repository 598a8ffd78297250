/**
 * Row-count contracts of `one` and `maybe-one` queries
 */
import { QueryNotFoundError, TooManyRowsError } from "./errors.js"

const tooMany = (query: string, rowCount: number) =>
  new TooManyRowsError({ message: `query \`${query}\` returned ${rowCount} rows, expected at most one`, query, rowCount })

/** The only row, or a QueryNotFoundError / TooManyRowsError */
export function expectOne<T>(rows: readonly T[], query: string): T {
  const [row] = rows
  if (rows.length > 1) throw tooMany(query, rows.length)
  if (row === undefined) {
    throw new QueryNotFoundError({ message: `query \`${query}\` returned no rows`, query })
  }
  return row
}

/** The only row, undefined for none, or a TooManyRowsError */
export function expectMaybeOne<T>(rows: readonly T[], query: string): T | undefined {
  if (rows.length > 1) throw tooMany(query, rows.length)
  return rows[0]
}
