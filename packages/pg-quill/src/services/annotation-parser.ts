/**
 * Annotation Parser
 *
 * Splits a `.sql` file into named queries. Each query is introduced by a
 * directive line and runs until the first `;` outside literals and comments:
 *
 * ```sql
 * --! get_user (email?) : maybe-one (nickname?, tags[?])
 * SELECT id, name, nickname, tags FROM users WHERE email = :email;
 * ```
 *
 * The optional lists after the name and after the cardinality mark
 * parameters and result columns as nullable (`name?`) or as arrays whose
 * elements may be NULL (`name[?]`). Either list can instead name a type that
 * several queries share; a `--:` line gives such a type its nullable fields:
 *
 * ```sql
 * --: User(nickname?)
 * --! get_user : one User
 * SELECT id, name, nickname FROM users WHERE id = :id;
 * ```
 *
 * Statement bodies are opaque: only bind markers are located, and named
 * binds are rewritten to `$n`.
 */
import { Array as Arr, Either, Order } from "effect"
import { QuerySyntaxError } from "../errors.js"
import {
  Cardinalities,
  isCardinality,
  type BindParam,
  type Cardinality,
  type NullableField,
  type Query,
  type QueryModule,
  type Span,
} from "../ir/query-ir.js"
import { findBinds, findStatementEnd, skipNonCode, type BindToken } from "../lib/sql-lexer.js"
import { spanAt } from "./diagnostics.js"
import { camelCase, safeIdentifier } from "./inflection.js"

const DIRECTIVE = "--!"
const TYPE_DIRECTIVE = "--:"
const QUERY_NAME = /^[A-Za-z][A-Za-z0-9_]*$/
const TYPE_NAME = /^[A-Z][A-Za-z0-9_]*$/
const BIND_REF = /^(?:[A-Za-z_][A-Za-z0-9_]*|\$[1-9][0-9]*)$/
const FIELD_REF = /^[^\s(),:?[\]]+$/
const PUNCTUATION = /^[(),:?[\]]$/

type Fail = (message: string, start: number, end: number) => QuerySyntaxError

const bySourceOrder = Order.mapInput(Order.number, (error: QuerySyntaxError) => error.span.start)

// ============================================================================
// Directive tokens
// ============================================================================

interface Token {
  readonly text: string
  /** Offset within the file */
  readonly start: number
}

const TOKEN = /[(),:?[\]]|[^\s(),:?[\]]+/g

function tokenize(line: string, offset: number): readonly Token[] {
  return Array.from(line.matchAll(TOKEN), m => ({ text: m[0], start: offset + (m.index ?? 0) }))
}

/** One entry of a nullability list */
interface Override {
  readonly token: Token
  readonly nullable: boolean
  readonly innerNullable: boolean
}

/** The params or row side of a directive: an inline list, or a named type */
type Shape =
  | { readonly _tag: "Inline"; readonly items: readonly Override[] }
  | { readonly _tag: "Named"; readonly name: Token }

const noOverrides: Shape = { _tag: "Inline", items: [] }

interface Directive {
  readonly name: Token
  readonly cardinality: Cardinality
  readonly params: Shape
  readonly columns: Shape
}

/** A `--: Name(field?, ...)` line */
interface TypeAnnotation {
  readonly name: Token
  readonly fields: readonly Override[]
}

type ListKind = "parameter" | "column" | "field"

/**
 * Recursive-descent reader over one directive's tokens.
 * Fails with the first problem found; each line reports at most one error.
 */
class DirectiveReader {
  private index = 0

  constructor(
    private readonly tokens: readonly Token[],
    private readonly end: number,
    private readonly fail: Fail,
  ) {}

  private peek(): Token | undefined {
    return this.tokens[this.index]
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index]
    this.index++
    return token
  }

  private failAt(token: Token | undefined, message: string): QuerySyntaxError {
    return token
      ? this.fail(message, token.start, token.start + token.text.length)
      : this.fail(message, this.end, this.end)
  }

  /** `( item, ... )`, the opening parenthesis not yet consumed */
  private list(kind: ListKind): Either.Either<readonly Override[], QuerySyntaxError> {
    this.next()
    const items: Override[] = []
    for (;;) {
      const item = this.next()
      if (item?.text === ")" && items.length === 0) return Either.right(items)
      if (!item || !(kind === "parameter" ? BIND_REF : FIELD_REF).test(item.text)) {
        return Either.left(this.failAt(item, `expected a ${kind} name in the nullable ${kind} list`))
      }
      const nullable = this.peek()?.text === "?"
      if (nullable) this.next()
      const innerNullable = this.peek()?.text === "["
      if (innerNullable) {
        this.next()
        const mark = this.next()
        const close = mark?.text === "?" ? this.next() : mark
        if (close?.text !== "]" || mark?.text !== "?") {
          return Either.left(this.failAt(close, "expected `[?]`"))
        }
      }
      if (!nullable && !innerNullable) {
        return Either.left(
          this.failAt(this.peek(), `expected \`?\` or \`[?]\` after \`${item.text}\`; only nullable ${kind}s can be listed`),
        )
      }
      items.push({ token: item, nullable, innerNullable })
      const separator = this.next()
      if (separator?.text === ")") return Either.right(items)
      if (separator?.text !== ",") {
        return Either.left(this.failAt(separator, "expected `,` or `)`"))
      }
    }
  }

  private typeName(token: Token): Either.Either<Token, QuerySyntaxError> {
    if (!TYPE_NAME.test(token.text)) {
      return Either.left(
        this.failAt(
          token,
          `\`${token.text}\` is not a valid type name; type names start with an uppercase letter and contain only letters, digits and underscores`,
        ),
      )
    }
    if (safeIdentifier(token.text) !== token.text) {
      return Either.left(this.failAt(token, `\`${token.text}\` is reserved in generated code; choose another type name`))
    }
    return Either.right(token)
  }

  private shape(kind: "parameter" | "column"): Either.Either<Shape, QuerySyntaxError> {
    const token = this.peek()
    if (token?.text === "(") return Either.map(this.list(kind), (items): Shape => ({ _tag: "Inline", items }))
    if (token === undefined || PUNCTUATION.test(token.text)) return Either.right(noOverrides)
    this.next()
    return Either.map(this.typeName(token), (name): Shape => ({ _tag: "Named", name }))
  }

  /** An error for anything left on the line */
  private leftover(): QuerySyntaxError | undefined {
    const extra = this.peek()
    return extra ? this.failAt(extra, `unexpected \`${extra.text}\` after the directive`) : undefined
  }

  read(): Either.Either<Directive, QuerySyntaxError> {
    const name = this.next()
    if (!name || !QUERY_NAME.test(name.text)) {
      return Either.left(
        this.failAt(
          name,
          name
            ? `\`${name.text}\` is not a valid query name; names start with a letter and contain only letters, digits and underscores`
            : "expected a query name after `--!`",
        ),
      )
    }
    const params = this.shape("parameter")
    if (Either.isLeft(params)) return Either.left(params.left)

    const colon = this.next()
    if (colon?.text !== ":") {
      return Either.left(this.failAt(colon, `expected \`:\` followed by a cardinality (${Cardinalities.join(", ")})`))
    }
    const keyword = this.next()
    const cardinality = keyword?.text ?? ""
    if (!isCardinality(cardinality)) {
      return Either.left(
        this.failAt(
          keyword,
          keyword
            ? `unknown cardinality \`${keyword.text}\`; expected one of ${Cardinalities.join(", ")}`
            : `expected a cardinality (${Cardinalities.join(", ")})`,
        ),
      )
    }
    const columns = this.shape("column")
    if (Either.isLeft(columns)) return Either.left(columns.left)
    if (cardinality === "execute" && columns.right._tag === "Named") {
      return Either.left(
        this.failAt(columns.right.name, `\`execute\` queries return no rows; remove the row type \`${columns.right.name.text}\``),
      )
    }

    const extra = this.leftover()
    return extra ? Either.left(extra) : Either.right({ name, cardinality, params: params.right, columns: columns.right })
  }

  readType(): Either.Either<TypeAnnotation, QuerySyntaxError> {
    const token = this.next()
    if (!token) return Either.left(this.failAt(token, "expected a type name after `--:`"))
    const name = this.typeName(token)
    if (Either.isLeft(name)) return Either.left(name.left)

    const fields: Either.Either<readonly Override[], QuerySyntaxError> =
      this.peek()?.text === "(" ? this.list("field") : Either.right([])
    if (Either.isLeft(fields)) return Either.left(fields.left)

    const extra = this.leftover()
    return extra ? Either.left(extra) : Either.right({ name: name.right, fields: fields.right })
  }
}

/** One entry per name, markers from repeated entries combined */
const mergeOverrides = (items: readonly Override[]): readonly NullableField[] => {
  const merged = new Map<string, NullableField>()
  for (const { token, nullable, innerNullable } of items) {
    const previous = merged.get(token.text)
    merged.set(token.text, {
      name: token.text,
      nullable: nullable || (previous?.nullable ?? false),
      innerNullable: innerNullable || (previous?.innerNullable ?? false),
    })
  }
  return Array.from(merged.values())
}

// ============================================================================
// Bind parameters
// ============================================================================

interface Binds {
  readonly text: string
  readonly params: readonly BindParam[]
}

/**
 * Number the statement's binds. Named binds become `$n` in order of first
 * appearance; positional placeholders must be numbered contiguously from `$1`.
 */
function resolveBinds(
  sql: string,
  overrides: readonly Override[],
  fail: Fail,
  offsetInFile: number,
  unknownParam: (ref: string) => string,
): Either.Either<Binds, QuerySyntaxError> {
  const tokens = findBinds(sql)
  const named = tokens.filter((t): t is Extract<BindToken, { _tag: "Named" }> => t._tag === "Named")
  const positional = tokens.filter((t): t is Extract<BindToken, { _tag: "Positional" }> => t._tag === "Positional")
  const at = (t: BindToken, message: string) => fail(message, offsetInFile + t.start, offsetInFile + t.end)

  const firstNamed = named[0]
  const firstPositional = positional[0]
  if (firstNamed && firstPositional) {
    const later = firstNamed.start > firstPositional.start ? firstNamed : firstPositional
    return Either.left(at(later, "cannot mix `$n` placeholders and `:name` binds in one query"))
  }

  for (const { token } of overrides) {
    const known = token.text.startsWith("$")
      ? positional.some(t => `$${t.index}` === token.text)
      : named.some(t => t.name === token.text)
    if (!known) {
      return Either.left(fail(unknownParam(token.text), token.start, token.start + token.text.length))
    }
  }
  const marks = new Map(mergeOverrides(overrides).map(f => [f.name, f]))
  const bindParam = (index: number, ref: string, name?: string): BindParam => ({
    index,
    ...(name === undefined ? {} : { name }),
    nullable: marks.get(ref)?.nullable ?? false,
    innerNullable: marks.get(ref)?.innerNullable ?? false,
  })

  if (firstNamed) {
    const order: string[] = []
    let text = ""
    let cursor = 0
    for (const token of named) {
      let index = order.indexOf(token.name) + 1
      if (index === 0) {
        order.push(token.name)
        index = order.length
      }
      text += sql.slice(cursor, token.start) + `$${index}`
      cursor = token.end
    }
    text += sql.slice(cursor)
    return Either.right({ text, params: order.map((name, i) => bindParam(i + 1, name, name)) })
  }

  const used = new Set(positional.map(t => t.index))
  const zero = positional.find(t => t.index === 0)
  if (zero) return Either.left(at(zero, "placeholders are numbered from `$1`"))
  const count = Math.max(0, ...used)
  const gap = Arr.range(1, count).find(n => !used.has(n))
  if (gap !== undefined && count > 0) {
    const last = positional.find(t => t.index === count) ?? positional[0]
    if (last) {
      return Either.left(at(last, `placeholder \`$${gap}\` is never used; placeholders must be numbered without gaps`))
    }
  }
  return Either.right({
    text: sql,
    params: count === 0 ? [] : Arr.range(1, count).map(index => bindParam(index, `$${index}`)),
  })
}

// ============================================================================
// File parser
// ============================================================================

/** A query whose directive and body were read, waiting for the file's type annotations */
interface PendingQuery {
  readonly directive: Directive
  readonly sql: string
  readonly sqlStart: number
  readonly span: Span
  readonly bodySpan: Span
}

/**
 * Parse one query file.
 *
 * Every problem in the file is reported, in source order; a file with any
 * error yields no module.
 */
export function parseQueryModule(
  path: string,
  text: string,
): Either.Either<QueryModule, Arr.NonEmptyReadonlyArray<QuerySyntaxError>> {
  const errors: QuerySyntaxError[] = []
  const fail: Fail = (message, start, end) => new QuerySyntaxError({ message, span: spanAt(path, text, start, end) })

  const annotations = new Map<string, TypeAnnotation>()
  const pending: PendingQuery[] = []
  const seen = new Map<string, string>()
  let pos = 0

  while (pos < text.length) {
    const newline = text.indexOf("\n", pos)
    const lineEnd = newline === -1 ? text.length : newline
    const line = text.slice(pos, lineEnd)
    const indent = line.length - line.trimStart().length
    const first = pos + indent

    if (line.trim() === "") {
      pos = lineEnd + 1
      continue
    }

    // Type annotation line
    if (text.startsWith(TYPE_DIRECTIVE, first)) {
      const start = first + TYPE_DIRECTIVE.length
      const parsed = new DirectiveReader(tokenize(text.slice(start, lineEnd), start), lineEnd, fail).readType()
      pos = lineEnd + 1
      if (Either.isLeft(parsed)) {
        errors.push(parsed.left)
      } else if (annotations.has(parsed.right.name.text)) {
        const { name } = parsed.right
        errors.push(fail(`type \`${name.text}\` is declared more than once in this file`, name.start, name.start + name.text.length))
      } else {
        annotations.set(parsed.right.name.text, parsed.right)
      }
      continue
    }

    if (!text.startsWith(DIRECTIVE, first)) {
      const skipped = skipNonCode(text, first)
      if (skipped !== -1 && (text.startsWith("--", first) || text.startsWith("/*", first))) {
        pos = skipped
        continue
      }
      // Stray SQL: report it and resynchronise after its terminator
      const end = findStatementEnd(text, first)
      errors.push(fail("SQL outside a query; every statement needs a `--! name : cardinality` line above it", first, lineEnd))
      pos = end._tag === "Terminated" ? end.index + 1 : end.index
      continue
    }

    // Directive line
    const directiveStart = first + DIRECTIVE.length
    const parsed = new DirectiveReader(tokenize(text.slice(directiveStart, lineEnd), directiveStart), lineEnd, fail).read()

    const bodyStart = lineEnd + 1
    const end = findStatementEnd(text, Math.min(bodyStart, text.length))
    pos = end._tag === "Terminated" ? end.index + 1 : end.index

    if (Either.isLeft(parsed)) {
      errors.push(parsed.left)
      continue
    }
    const directive = parsed.right
    const name = directive.name.text

    if (end._tag === "Unterminated") {
      errors.push(fail(`query \`${name}\` is missing its terminating \`;\``, first, lineEnd))
      continue
    }

    const previous = seen.get(camelCase(name))
    if (previous !== undefined) {
      errors.push(
        fail(
          previous === name
            ? `duplicate query name \`${name}\``
            : `query name \`${name}\` collides with \`${previous}\` in generated code`,
          directive.name.start,
          directive.name.start + name.length,
        ),
      )
      continue
    }
    seen.set(camelCase(name), name)

    const rawBody = text.slice(bodyStart, end.index)
    const sql = rawBody.trim()
    if (sql === "") {
      errors.push(fail(`query \`${name}\` has an empty body`, first, lineEnd))
      continue
    }
    const sqlStart = bodyStart + (rawBody.length - rawBody.trimStart().length)
    pending.push({
      directive,
      sql,
      sqlStart,
      span: spanAt(path, text, first, lineEnd),
      bodySpan: spanAt(path, text, sqlStart, sqlStart + sql.length),
    })
  }

  // Named types may be annotated anywhere in the file
  const overridesOf = (shape: Shape): readonly Override[] =>
    shape._tag === "Inline" ? shape.items : (annotations.get(shape.name.text)?.fields ?? [])
  const structName = (shape: Shape): string | undefined => (shape._tag === "Named" ? shape.name.text : undefined)

  const queries: Query[] = []
  for (const { directive, sql, sqlStart, span, bodySpan } of pending) {
    const name = directive.name.text
    const { params } = directive
    const binds = resolveBinds(sql, overridesOf(params), fail, sqlStart, ref =>
      params._tag === "Named"
        ? `\`${ref}\` in \`${params.name.text}\` is not a parameter of query \`${name}\``
        : `\`${ref}\` is not a parameter of this query`,
    )
    if (Either.isLeft(binds)) {
      errors.push(binds.left)
      continue
    }
    if (params._tag === "Named" && binds.right.params.length === 0) {
      errors.push(
        fail(
          `query \`${name}\` takes no parameters; remove the params type \`${params.name.text}\``,
          params.name.start,
          params.name.start + params.name.text.length,
        ),
      )
      continue
    }

    queries.push({
      name,
      cardinality: directive.cardinality,
      sql,
      text: binds.right.text,
      params: binds.right.params,
      columnOverrides: mergeOverrides(overridesOf(directive.columns)),
      paramsStruct: structName(params),
      rowStruct: structName(directive.columns),
      span,
      bodySpan,
    })
  }

  const sorted = Arr.sort(errors, bySourceOrder)
  return Arr.isNonEmptyReadonlyArray(sorted) ? Either.left(sorted) : Either.right({ path, text, queries })
}
