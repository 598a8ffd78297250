/**
 * Diagnostics
 *
 * Source spans and the aggregated error report printed at the end of a run.
 * Every non-fatal problem found while parsing, describing or resolving
 * queries ends up here, attributed to the file region that caused it.
 */
import { Array as Arr, Order, pipe } from "effect"
import type { Diagnostic } from "../errors.js"
import type { Span } from "../ir/query-ir.js"

// ============================================================================
// Spans
// ============================================================================

/** Build a span for `[start, end)` of `text`, computing its line and column */
export function spanAt(path: string, text: string, start: number, end: number = start): Span {
  const before = text.slice(0, start)
  const line = before.split("\n").length
  const column = start - (before.lastIndexOf("\n") + 1) + 1
  return { path, start, end, line, column }
}

const byLocation: Order.Order<Diagnostic> = Order.combine(
  Order.mapInput(Order.string, (d: Diagnostic) => d.span?.path ?? ""),
  Order.mapInput(Order.number, (d: Diagnostic) => d.span?.start ?? 0),
)

/** Diagnostics ordered by file, then by position */
export const sortDiagnostics = (diagnostics: readonly Diagnostic[]): readonly Diagnostic[] =>
  Arr.sort(diagnostics, byLocation)

// ============================================================================
// Rendering
// ============================================================================

/** The lines after the headline: engine detail, hints, causes */
function causeChain(diagnostic: Diagnostic): readonly string[] {
  switch (diagnostic._tag) {
    case "StatementRejected":
      return [
        ...(diagnostic.code ? [`SQLSTATE ${diagnostic.code}`] : []),
        ...(diagnostic.detail ? [`detail: ${diagnostic.detail}`] : []),
        ...(diagnostic.hint ? [`hint: ${diagnostic.hint}`] : []),
        `while preparing query \`${diagnostic.query}\``,
      ]
    case "UnsupportedTypeError":
      return [
        `type ${diagnostic.typeName} (oid ${diagnostic.oid}) has no TypeScript mapping`,
        ...(diagnostic.query ? [`while resolving query \`${diagnostic.query}\``] : []),
      ]
    case "QuerySyntaxError":
      return []
  }
}

/** The offending source line with a caret underline */
function excerpt(span: Span, text: string): readonly string[] {
  const lines = text.split("\n")
  const source = lines[span.line - 1]
  if (source === undefined) return []

  const gutter = String(span.line)
  const pad = " ".repeat(gutter.length)
  const lineEnd = source.length - (span.column - 1)
  const width = Math.max(1, Math.min(span.end - span.start, lineEnd))
  return [
    `${gutter} | ${source.trimEnd()}`,
    `${pad} | ${" ".repeat(span.column - 1)}${"^".repeat(width)}`,
  ]
}

/**
 * Render one diagnostic:
 *
 * ```
 * queries/users.sql:3:8: StatementRejected: column "nme" does not exist
 * 3 | SELECT nme FROM users;
 *   |        ^^^
 *   = while preparing query `get_user`
 * ```
 */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  sources: ReadonlyMap<string, string>,
): string {
  const span = diagnostic.span
  const location = span ? `${span.path}:${span.line}:${span.column}: ` : ""
  const headline = `${location}${diagnostic._tag}: ${diagnostic.message}`
  const text = span ? sources.get(span.path) : undefined
  const code = span && text !== undefined ? excerpt(span, text) : []
  const indent = code.length > 0 ? " ".repeat(String(span?.line ?? "").length) : ""
  const causes = causeChain(diagnostic).map(c => `${indent} = ${c}`)
  return [headline, ...code, ...causes].join("\n")
}

/** Render every diagnostic, sorted by location, followed by a summary line */
export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  sources: ReadonlyMap<string, string>,
): string {
  const blocks = pipe(
    sortDiagnostics(diagnostics),
    Arr.map(d => formatDiagnostic(d, sources)),
  )
  const files = new Set(diagnostics.map(d => d.span?.path ?? "")).size
  const summary = `${diagnostics.length} ${diagnostics.length === 1 ? "problem" : "problems"} in ${files} ${files === 1 ? "file" : "files"}`
  return [...blocks, summary].join("\n\n")
}
