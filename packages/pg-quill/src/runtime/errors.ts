/**
 * Errors raised by generated accessors
 */
import { Data } from "effect"

/** A `one` query matched no row */
export class QueryNotFoundError extends Data.TaggedError("QueryNotFoundError")<{
  readonly message: string
  readonly query: string
}> {}

/** A `one` or `maybe-one` query matched more than one row */
export class TooManyRowsError extends Data.TaggedError("TooManyRowsError")<{
  readonly message: string
  readonly query: string
  readonly rowCount: number
}> {}

/** A value's text form could not be decoded */
export class DecodeError extends Data.TaggedError("DecodeError")<{
  readonly message: string
  readonly input: string
}> {}
