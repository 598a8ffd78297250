/**
 * SQL lexical scanning
 *
 * Just enough of PostgreSQL's lexical rules to find statement boundaries and
 * bind markers: string constants (standard, E'' escape, dollar-quoted),
 * quoted identifiers, line comments and nested block comments.
 * Statement bodies are never parsed beyond that.
 */

// ============================================================================
// Character classes
// ============================================================================

const IDENT_CHAR = /[A-Za-z0-9_$\u0080-\uffff]/
const DOLLAR_TAG = /\$(?:[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)?\$/y
const BIND_NAME = /[A-Za-z_][A-Za-z0-9_]*/y
const DIGITS = /[0-9]+/y
const WORD = /[A-Za-z_][A-Za-z0-9_$]*/g

const isIdentChar = (c: string | undefined): boolean => c !== undefined && IDENT_CHAR.test(c)

const matchAt = (pattern: RegExp, text: string, index: number): string | undefined => {
  pattern.lastIndex = index
  return pattern.exec(text)?.[0]
}

// ============================================================================
// Literals and comments
// ============================================================================

function skipQuoted(text: string, open: number, quote: string, backslashEscapes: boolean): number {
  let i = open + 1
  while (i < text.length) {
    const c = text[i]
    if (backslashEscapes && c === "\\") {
      i += 2
    } else if (c === quote) {
      if (text[i + 1] === quote) {
        i += 2
      } else {
        return i + 1
      }
    } else {
      i++
    }
  }
  return text.length
}

function skipBlockComment(text: string, open: number): number {
  let depth = 0
  let i = open
  while (i < text.length) {
    if (text.startsWith("/*", i)) {
      depth++
      i += 2
    } else if (text.startsWith("*/", i)) {
      depth--
      i += 2
      if (depth === 0) return i
    } else {
      i++
    }
  }
  return text.length
}

/**
 * If a comment, string constant or quoted identifier starts at `i`, return the
 * index just past its end (the text length when it is unterminated).
 * Returns -1 when `i` is ordinary code.
 */
export function skipNonCode(text: string, i: number): number {
  const c = text[i]
  const next = text[i + 1]

  if (c === "-" && next === "-") {
    const newline = text.indexOf("\n", i)
    return newline === -1 ? text.length : newline
  }
  if (c === "/" && next === "*") {
    return skipBlockComment(text, i)
  }
  if (c === "'") {
    return skipQuoted(text, i, "'", false)
  }
  if ((c === "E" || c === "e") && next === "'" && !isIdentChar(text[i - 1])) {
    return skipQuoted(text, i + 1, "'", true)
  }
  if (c === '"') {
    return skipQuoted(text, i, '"', false)
  }
  if (c === "$" && !isIdentChar(text[i - 1])) {
    const tag = matchAt(DOLLAR_TAG, text, i)
    if (tag !== undefined) {
      const close = text.indexOf(tag, i + tag.length)
      return close === -1 ? text.length : close + tag.length
    }
  }
  return -1
}

// ============================================================================
// Statement boundaries
// ============================================================================

export type StatementEnd =
  | { readonly _tag: "Terminated"; readonly index: number }
  | { readonly _tag: "Unterminated"; readonly index: number }

const startsDirective = (text: string, i: number): boolean => {
  if (!text.startsWith("--!", i)) return false
  const lineStart = text.lastIndexOf("\n", i - 1) + 1
  return text.slice(lineStart, i).trim() === ""
}

/**
 * Find the `;` ending the statement that starts at `from`.
 *
 * Scanning stops early at the start of a directive line, so a missing
 * terminator never swallows the next query.
 */
export function findStatementEnd(text: string, from: number): StatementEnd {
  let i = from
  while (i < text.length) {
    if (startsDirective(text, i)) {
      return { _tag: "Unterminated", index: i }
    }
    const skipped = skipNonCode(text, i)
    if (skipped !== -1) {
      i = skipped
      continue
    }
    if (text[i] === ";") {
      return { _tag: "Terminated", index: i }
    }
    i++
  }
  return { _tag: "Unterminated", index: text.length }
}

// ============================================================================
// Bind markers
// ============================================================================

export type BindToken =
  | { readonly _tag: "Named"; readonly name: string; readonly start: number; readonly end: number }
  | { readonly _tag: "Positional"; readonly index: number; readonly start: number; readonly end: number }

/**
 * Find `:name` binds and `$n` placeholders outside literals and comments.
 * `::type` casts are not binds.
 */
export function findBinds(sql: string): readonly BindToken[] {
  const tokens: BindToken[] = []
  let i = 0
  while (i < sql.length) {
    const skipped = skipNonCode(sql, i)
    if (skipped !== -1) {
      i = skipped
      continue
    }
    const c = sql[i]
    if (c === ":" && sql[i + 1] === ":") {
      i += 2
      continue
    }
    if (c === ":" && sql[i - 1] !== ":") {
      const name = matchAt(BIND_NAME, sql, i + 1)
      if (name !== undefined) {
        tokens.push({ _tag: "Named", name, start: i, end: i + 1 + name.length })
        i += 1 + name.length
        continue
      }
    }
    if (c === "$" && !isIdentChar(sql[i - 1])) {
      const digits = matchAt(DIGITS, sql, i + 1)
      if (digits !== undefined) {
        tokens.push({ _tag: "Positional", index: Number(digits), start: i, end: i + 1 + digits.length })
        i += 1 + digits.length
        continue
      }
    }
    i++
  }
  return tokens
}

// ============================================================================
// Keywords
// ============================================================================

/**
 * Replace comments, string constants and quoted identifiers with spaces.
 * Offsets and newlines are preserved.
 */
export function maskNonCode(sql: string): string {
  let out = ""
  let i = 0
  while (i < sql.length) {
    const skipped = skipNonCode(sql, i)
    if (skipped !== -1) {
      out += sql.slice(i, skipped).replace(/[^\n]/g, " ")
      i = skipped
    } else {
      out += sql.charAt(i)
      i++
    }
  }
  return out
}

/** Upper-cased bare words of a statement, ignoring literals and comments */
export function keywords(sql: string): ReadonlySet<string> {
  const words = new Set<string>()
  for (const match of maskNonCode(sql).matchAll(WORD)) {
    words.add(match[0].toUpperCase())
  }
  return words
}
