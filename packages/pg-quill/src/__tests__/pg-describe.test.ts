/**
 * DescribeStatement Tests
 *
 * Drives the Submittable through a real pg.Client whose protocol writes are
 * recorded instead of sent, so backend messages reach it in pg's own order.
 */
import { EventEmitter } from "node:events"
import { describe, expect, it } from "@effect/vitest"
import pg from "pg"
import { DescribeStatement, type DescribeOutcome } from "../lib/pg-describe.js"

/** A client that is ready for queries, with its connection's writes recorded */
const readyClient = () => {
  const client = new pg.Client()
  const connection: unknown = Reflect.get(client, "connection")
  const attachListeners: unknown = Reflect.get(client, "_attachListeners")
  if (!(connection instanceof EventEmitter) || typeof attachListeners !== "function") {
    throw new Error("pg.Client no longer exposes its connection")
  }
  const sent: string[] = []
  Reflect.set(connection, "parse", (query: { name: string; text: string }) => {
    sent.push(`parse ${query.name} ${query.text}`)
  })
  Reflect.set(connection, "describe", (target: { type: string; name: string }) => {
    sent.push(`describe ${target.type} ${target.name}`)
  })
  Reflect.set(connection, "close", (target: { type: string; name: string }) => {
    sent.push(`close ${target.type} ${target.name}`)
  })
  Reflect.set(connection, "sync", () => {
    sent.push("sync")
  })
  Reflect.apply(attachListeners, client, [connection])
  Reflect.set(client, "readyForQuery", true)
  return { client, connection, sent }
}

const submit = (client: pg.Client, text: string) => {
  const outcomes: DescribeOutcome[] = []
  client.query(new DescribeStatement("pgquill_1", text, outcome => outcomes.push(outcome)))
  return outcomes
}

describe("DescribeStatement", () => {
  it("sends parse, describe, close and sync without executing", () => {
    const { client, sent } = readyClient()
    submit(client, "select $1::int as n")

    expect(sent).toEqual(["parse pgquill_1 select $1::int as n", "describe S pgquill_1", "close S pgquill_1", "sync"])
  })

  it("collects parameter and row descriptions", () => {
    const { client, connection } = readyClient()
    const outcomes = submit(client, "select $1::int as n")

    connection.emit("parameterDescription", { dataTypeIDs: [23] })
    connection.emit("rowDescription", { fields: [{ name: "n", dataTypeID: 23, tableID: 0, columnID: 0 }] })
    connection.emit("readyForQuery", {})

    expect(outcomes).toEqual([
      {
        _tag: "Described",
        description: { params: [23], columns: [{ name: "n", typeOid: 23, tableOid: 0, columnNumber: 0 }] },
      },
    ])
    expect(connection.listenerCount("parameterDescription")).toBe(0)
  })

  it("reports a server error as soon as it arrives", () => {
    const { client, connection } = readyClient()
    const outcomes = submit(client, "selec 1")

    const error = new pg.DatabaseError('syntax error at or near "selec"', 0, "error")
    connection.emit("errorMessage", error)
    expect(outcomes).toEqual([{ _tag: "Rejected", error }])
    expect(connection.listenerCount("parameterDescription")).toBe(0)

    connection.emit("readyForQuery", {})
    expect(outcomes).toHaveLength(1)
  })

  it("runs the next statement on the same client after a rejection", () => {
    const { client, connection, sent } = readyClient()
    const first = submit(client, "selec 1")
    const second = submit(client, "select 2 as two")
    expect(sent).toHaveLength(4)

    connection.emit("errorMessage", new pg.DatabaseError('syntax error at or near "selec"', 0, "error"))
    expect(sent).toHaveLength(4)
    connection.emit("readyForQuery", {})
    expect(sent.slice(4)).toEqual(["parse pgquill_1 select 2 as two", "describe S pgquill_1", "close S pgquill_1", "sync"])

    connection.emit("parameterDescription", { dataTypeIDs: [] })
    connection.emit("rowDescription", { fields: [{ name: "two", dataTypeID: 23, tableID: 0, columnID: 0 }] })
    connection.emit("readyForQuery", {})

    expect(first.map(o => o._tag)).toEqual(["Rejected"])
    expect(second.map(o => o._tag)).toEqual(["Described"])
  })

  it("treats other errors as a lost connection and settles once", () => {
    const outcomes: DescribeOutcome[] = []
    const statement = new DescribeStatement("pgquill_1", "select 1", outcome => outcomes.push(outcome))

    statement.handleError(new Error("socket hang up"))
    statement.handleReadyForQuery()

    expect(outcomes.map(o => o._tag)).toEqual(["Lost"])
  })

  it("fails when handed something that is not a connection", () => {
    const outcomes: DescribeOutcome[] = []
    new DescribeStatement("pgquill_1", "select 1", outcome => outcomes.push(outcome)).submit({})
    expect(outcomes.map(o => o._tag)).toEqual(["Lost"])
  })
})
