/**
 * Diagnostics rendering tests
 */
import { describe, expect, it } from "@effect/vitest"
import { QuerySyntaxError, StatementRejected, UnsupportedTypeError } from "../errors.js"
import { formatDiagnostic, formatDiagnostics, sortDiagnostics, spanAt } from "../services/diagnostics.js"

const text = "--! get_user : one\nSELECT nme FROM users;\n"
const sources = new Map([["users.sql", text]])

const rejected = new StatementRejected({
  message: 'column "nme" does not exist',
  query: "get_user",
  span: spanAt("users.sql", text, 26, 29),
  code: "42703",
})

describe("spanAt", () => {
  it("computes 1-based line and column", () => {
    expect(spanAt("users.sql", text, 26, 29)).toEqual({ path: "users.sql", start: 26, end: 29, line: 2, column: 8 })
  })
})

describe("formatDiagnostic", () => {
  it("renders the location, an excerpt and the cause chain", () => {
    expect(formatDiagnostic(rejected, sources)).toBe(
      [
        'users.sql:2:8: StatementRejected: column "nme" does not exist',
        "2 | SELECT nme FROM users;",
        "  |        ^^^",
        "  = SQLSTATE 42703",
        "  = while preparing query `get_user`",
      ].join("\n"),
    )
  })

  it("renders diagnostics without a span as a headline", () => {
    const error = new UnsupportedTypeError({ message: "unsupported type `public.geometry`", oid: 7000, typeName: "public.geometry" })
    expect(formatDiagnostic(error, sources)).toBe(
      [
        "UnsupportedTypeError: unsupported type `public.geometry`",
        " = type public.geometry (oid 7000) has no TypeScript mapping",
      ].join("\n"),
    )
  })
})

describe("formatDiagnostics", () => {
  it("sorts by file and position and ends with a summary", () => {
    const other = new QuerySyntaxError({ message: "bad", span: spanAt("a.sql", "x", 0, 1) })
    expect(sortDiagnostics([rejected, other])).toEqual([other, rejected])

    const report = formatDiagnostics([rejected, other], new Map([...sources, ["a.sql", "x"]]))
    expect(report.startsWith("a.sql:1:1: QuerySyntaxError: bad")).toBe(true)
    expect(report.endsWith("2 problems in 2 files")).toBe(true)
  })

  it("uses the singular for one problem", () => {
    expect(formatDiagnostics([rejected], sources).endsWith("1 problem in 1 file")).toBe(true)
  })
})
