/**
 * Core error types for pg-quill
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect"
import type { Span } from "./ir/query-ir.js"

// Base error type with common fields
interface ErrorBase {
  readonly message: string
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

// Source errors

/** Malformed directive, cardinality or duplicate name. Scoped to one file. */
export class QuerySyntaxError extends Data.TaggedError("QuerySyntaxError")<
  ErrorBase & { readonly span: Span }
> {}

export class SourceReadError extends Data.TaggedError("SourceReadError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

// Database errors

/** Connection-level failure. Aborts the run. */
export class ConnectionFailed extends Data.TaggedError("ConnectionFailed")<
  ErrorBase & { readonly connectionString: string; readonly cause: unknown }
> {}

/** Raw engine error from a prepare/describe round trip, before it is attributed to a query */
export class EngineRejection extends Data.TaggedError("EngineRejection")<
  ErrorBase & {
    readonly code?: string
    /** 1-based character position in the statement text */
    readonly position?: number
    readonly detail?: string
    readonly hint?: string
  }
> {}

/** The engine refused to prepare a statement. Scoped to one query. */
export class StatementRejected extends Data.TaggedError("StatementRejected")<
  ErrorBase & {
    readonly query: string
    readonly span: Span
    readonly code?: string
    readonly detail?: string
    readonly hint?: string
  }
> {}

/** A type vanished or turned out cyclic mid-run. Aborts the run. */
export class CatalogConsistencyError extends Data.TaggedError("CatalogConsistencyError")<
  ErrorBase & { readonly oid: number; readonly path: readonly number[] }
> {}

/** No mapping exists for an encountered type. Scoped to one query. */
export class UnsupportedTypeError extends Data.TaggedError("UnsupportedTypeError")<
  ErrorBase & {
    readonly oid: number
    readonly typeName: string
    readonly query?: string
    readonly span?: Span
  }
> {}

// Emission errors
export class WriteError extends Data.TaggedError("WriteError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

/** Diagnostics collected during a run that were not fatal on their own */
export type Diagnostic = QuerySyntaxError | StatementRejected | UnsupportedTypeError

export class GenerationFailed extends Data.TaggedError("GenerationFailed")<
  ErrorBase & {
    readonly diagnostics: readonly Diagnostic[]
    /** Source text by path, for rendering excerpts */
    readonly sources: ReadonlyMap<string, string>
  }
> {}

/** Errors that stop a run immediately */
export type FatalError = ConnectionFailed | CatalogConsistencyError

// Union of all errors for convenience
export type QuillError =
  | ConfigNotFound
  | ConfigInvalid
  | QuerySyntaxError
  | SourceReadError
  | ConnectionFailed
  | StatementRejected
  | CatalogConsistencyError
  | UnsupportedTypeError
  | WriteError
  | GenerationFailed
