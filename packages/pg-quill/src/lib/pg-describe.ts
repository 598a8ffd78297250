/**
 * Statement description over the extended query protocol
 *
 * pg has no public API for Parse/Describe without Execute, so this is a
 * Submittable: pg queues it like any query and hands it the connection.
 * It sends Parse, Describe (statement), Close and Sync, collects the
 * ParameterDescription and RowDescription replies, and never executes.
 */
import pg from "pg"
import type { DatabaseError, Submittable } from "pg"
import type { DescribedColumn, StatementDescription } from "../ir/query-ir.js"

// ============================================================================
// Protocol surface
// ============================================================================

/** The part of pg's Connection this module drives */
interface ProtocolConnection {
  parse(query: { name: string; text: string; types: number[] }): void
  describe(target: { type: "S"; name: string }): void
  close(target: { type: "S"; name: string }): void
  sync(): void
  once(event: "parameterDescription", listener: (message: unknown) => void): unknown
  removeListener(event: "parameterDescription", listener: (message: unknown) => void): unknown
}

const PROTOCOL_METHODS = ["parse", "describe", "close", "sync", "once", "removeListener"] as const

function isProtocolConnection(value: unknown): value is ProtocolConnection {
  return (
    typeof value === "object" &&
    value !== null &&
    PROTOCOL_METHODS.every(method => typeof Reflect.get(value, method) === "function")
  )
}

const numberArray = (value: unknown): readonly number[] =>
  Array.isArray(value) ? value.filter((v): v is number => typeof v === "number") : []

const numberField = (value: object, key: string): number => {
  const field: unknown = Reflect.get(value, key)
  return typeof field === "number" ? field : 0
}

function readFields(message: unknown): readonly DescribedColumn[] {
  const fields: unknown = typeof message === "object" && message !== null ? Reflect.get(message, "fields") : undefined
  if (!Array.isArray(fields)) return []
  return fields.flatMap((field: unknown) => {
    if (typeof field !== "object" || field === null) return []
    const name: unknown = Reflect.get(field, "name")
    return [
      {
        name: typeof name === "string" ? name : "",
        typeOid: numberField(field, "dataTypeID"),
        tableOid: numberField(field, "tableID"),
        columnNumber: numberField(field, "columnID"),
      },
    ]
  })
}

// ============================================================================
// Outcome
// ============================================================================

export type DescribeOutcome =
  | { readonly _tag: "Described"; readonly description: StatementDescription }
  /** The server answered with an ErrorResponse; the connection stays usable once pg sees ReadyForQuery */
  | { readonly _tag: "Rejected"; readonly error: DatabaseError }
  /** Anything else: the connection cannot be trusted any more */
  | { readonly _tag: "Lost"; readonly cause: unknown }

// ============================================================================
// Submittable
// ============================================================================

/**
 * One Parse/Describe/Close round trip for a named statement.
 *
 * The object has no `name` property: pg records queries with a
 * name as prepared on the connection, and this statement is closed again.
 */
export class DescribeStatement implements Submittable {
  private params: readonly number[] = []
  private columns: readonly DescribedColumn[] = []
  private settled = false
  private detach: () => void = () => undefined

  constructor(
    private readonly statementName: string,
    private readonly text: string,
    private readonly callback: (outcome: DescribeOutcome) => void,
  ) {}

  private finish(outcome: DescribeOutcome): void {
    if (this.settled) return
    this.settled = true
    this.detach()
    this.callback(outcome)
  }

  submit(connection: unknown): void {
    if (!isProtocolConnection(connection)) {
      this.finish({ _tag: "Lost", cause: new Error("pg connection does not expose the extended query protocol") })
      return
    }
    const onParameters = (message: unknown) => {
      const ids: unknown = typeof message === "object" && message !== null ? Reflect.get(message, "dataTypeIDs") : undefined
      this.params = numberArray(ids)
    }
    connection.once("parameterDescription", onParameters)
    this.detach = () => {
      connection.removeListener("parameterDescription", onParameters)
    }

    const target = { type: "S", name: this.statementName } as const
    connection.parse({ name: this.statementName, text: this.text, types: [] })
    connection.describe(target)
    connection.close(target)
    connection.sync()
  }

  handleRowDescription(message: unknown): void {
    this.columns = readFields(message)
  }

  /**
   * pg detaches the active query before handing it an ErrorResponse, so the
   * ReadyForQuery that follows Sync never reaches this object. pg consumes it
   * itself and keeps later queries queued until it arrives.
   */
  handleError(error: unknown): void {
    this.finish(error instanceof pg.DatabaseError ? { _tag: "Rejected", error } : { _tag: "Lost", cause: error })
  }

  handleReadyForQuery(): void {
    this.finish({ _tag: "Described", description: { params: this.params, columns: this.columns } })
  }

  // Never executed, so no rows, copy data or completion tags arrive
  handleDataRow(): void {}
  handleCommandComplete(): void {}
  handleEmptyQuery(): void {}
  handlePortalSuspended(): void {}
}
