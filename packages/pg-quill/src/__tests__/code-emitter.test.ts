/**
 * Code Emitter Tests
 */
import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import type { Query, ResolvedColumn, ResolvedModule, ResolvedParam, ResolvedQuery } from "../ir/query-ir.js"
import { TypeRegistry } from "../ir/type-registry.js"
import { parseQueryModule } from "../services/annotation-parser.js"
import { emitModule, generatedHeader, outputPathFor } from "../services/code-emitter.js"
import { defaultInflection } from "../services/inflection.js"

const RUNTIME = "pg-quill/runtime"

const makeRegistry = () => {
  const registry = new TypeRegistry(defaultInflection.typeName)
  registry.add({ kind: "scalar", oid: 23, schema: "pg_catalog", name: "int4", tsType: "number" })
  registry.add({ kind: "scalar", oid: 25, schema: "pg_catalog", name: "text", tsType: "string" })
  registry.add({ kind: "enum", oid: 5000, schema: "public", name: "mood", labels: ["sad", "ok"] })
  registry.add({ kind: "composite", oid: 5200, schema: "public", name: "address", fields: [{ name: "street", type: 25 }] })
  registry.add({ kind: "array", oid: 5201, schema: "public", name: "_address", element: 5200 })
  return registry
}

const parseQuery = (text: string): Query => {
  const result = parseQueryModule("users.sql", text)
  if (Either.isLeft(result)) throw new Error(result.left.map(e => e.message).join("\n"))
  const [query] = result.right.queries
  if (!query) throw new Error("no query in fixture")
  return query
}

const resolved = (
  registry: TypeRegistry,
  text: string,
  params: readonly ResolvedParam[],
  columns: readonly ResolvedColumn[],
): ResolvedQuery => {
  const query = parseQuery(text)
  return {
    query,
    params,
    columns,
    paramsType:
      params.length > 0 ? registry.shapeName("params", params, defaultInflection.paramsTypeName(query.name)) : undefined,
    rowType:
      query.cardinality !== "execute"
        ? registry.shapeName("row", columns, defaultInflection.rowTypeName(query.name))
        : undefined,
  }
}

const emit = (registry: TypeRegistry, ...queries: ResolvedQuery[]) => {
  const module: ResolvedModule = { path: "users.sql", queries }
  return emitModule(registry, module, { runtimeModule: RUNTIME })
}

describe("outputPathFor", () => {
  it("swaps the extension and keeps directories", () => {
    expect(outputPathFor("users.sql")).toBe("users.ts")
    expect(outputPathFor("admin/audit.sql")).toBe("admin/audit.ts")
  })
})

describe("emitModule", () => {
  it("writes a maybe-one accessor with params and row types", () => {
    const registry = makeRegistry()
    const file = emit(
      registry,
      resolved(
        registry,
        "--! get_user : maybe-one\nSELECT id, name FROM users WHERE id = :id;\n",
        [{ index: 1, name: "id", type: 23, nullable: false, innerNullable: false }],
        [
          { name: "id", type: 23, nullable: false, innerNullable: false },
          { name: "name", type: 25, nullable: true, innerNullable: false },
        ],
      ),
    )

    expect(file.path).toBe("users.ts")
    expect(file.content.startsWith(`${generatedHeader("users.sql")}\n\n`)).toBe(true)
    expect(file.content).toContain(
      `import { expectMaybeOne } from "${RUNTIME}";\n\nimport type { Queryable } from "${RUNTIME}";`,
    )
    expect(file.content).toContain("export interface GetUserParams {")
    expect(file.content).toContain("export interface GetUserRow {")
    expect(file.content).toContain("name: string | null")
    expect(file.content).toContain("async function getUser(client: Queryable, params: GetUserParams)")
    expect(file.content).toContain("Promise<GetUserRow | undefined>")
    expect(file.content).toContain(
      "await client.query<GetUserRow>(`SELECT id, name FROM users WHERE id = $1`, [params.id])",
    )
    expect(file.content).toContain('return expectMaybeOne(result.rows, "get_user");')
    expect(file.content.endsWith("}\n")).toBe(true)
  })

  it("writes many accessors as async generators", () => {
    const registry = makeRegistry()
    const file = emit(
      registry,
      resolved(registry, "--! list_moods : many\nSELECT mood FROM users;\n", [], [
        { name: "mood", type: 5000, nullable: false, innerNullable: false },
      ]),
    )

    expect(file.content).toContain('export type Mood = "sad" | "ok";')
    expect(file.content).toContain("export const Mood: Decoder<Mood> = {")
    expect(file.content).toContain('parse: decode.enumOf(["sad", "ok"])')
    expect(file.content).toContain("async function* listMoods(client: Queryable): AsyncGenerator<ListMoodsRow>")
    expect(file.content).toContain("await client.query<ListMoodsRow>(`SELECT mood FROM users`);")
    expect(file.content).toContain("yield* result.rows;")
    expect(file.content).not.toContain("decodeListMoodsRow")
  })

  it("writes execute accessors returning the row count", () => {
    const registry = makeRegistry()
    const file = emit(registry, resolved(registry, "--! touch : execute\nUPDATE users SET name = name;\n", [], []))

    expect(file.content).toContain(`import type { Queryable } from "${RUNTIME}";`)
    expect(file.content).toContain("async function touch(client: Queryable): Promise<number>")
    expect(file.content).toContain("await client.query(`UPDATE users SET name = name`);")
    expect(file.content).toContain("return result.rowCount ?? 0;")
  })

  it("declares composites with a codec and decodes their columns", () => {
    const registry = makeRegistry()
    const file = emit(
      registry,
      resolved(
        registry,
        "--! get_address : one\nSELECT address FROM users LIMIT 1;\n",
        [],
        [{ name: "address", type: 5200, nullable: true, innerNullable: false }],
      ),
    )

    expect(file.content).toContain(
      `import { decode, encode, expectOne } from "${RUNTIME}";\n\nimport type { Codec, Queryable } from "${RUNTIME}";`,
    )
    expect(file.content).toContain("export interface Address {")
    expect(file.content).toContain("street: string | null")
    expect(file.content).toContain("export const Address: Codec<Address> = {")
    expect(file.content).toContain("street: decode.field(fields, 0, decode.text)")
    expect(file.content).toContain("encode.record([value.street])")
    expect(file.content).toContain("address: decode.nullable(row.address, Address.parse)")
    expect(file.content).toContain('return decodeGetAddressRow(expectOne(result.rows, "get_address"));')
  })

  it("encodes composite array parameters", () => {
    const registry = makeRegistry()
    const file = emit(
      registry,
      resolved(
        registry,
        "--! save : execute\nSELECT save_all(:addresses);\n",
        [{ index: 1, name: "addresses", type: 5201, nullable: false, innerNullable: false }],
        [],
      ),
    )

    expect(file.content).toContain("addresses: Array<Address>")
    expect(file.content).toContain("encode.array(Address.encode)(params.addresses)")
  })

  it("encodes point and interval parameters", () => {
    const registry = makeRegistry()
    registry.add({ kind: "scalar", oid: 600, schema: "pg_catalog", name: "point", tsType: "Point" })
    registry.add({ kind: "scalar", oid: 1186, schema: "pg_catalog", name: "interval", tsType: "Interval" })
    const file = emit(
      registry,
      resolved(
        registry,
        "--! place : execute\nSELECT place(:at, :within);\n",
        [
          { index: 1, name: "at", type: 600, nullable: false, innerNullable: false },
          { index: 2, name: "within", type: 1186, nullable: true, innerNullable: false },
        ],
        [],
      ),
    )

    expect(file.content).toContain(
      `import { encode } from "${RUNTIME}";\n\nimport type { Interval, Point, Queryable } from "${RUNTIME}";`,
    )
    expect(file.content).toContain("at: Point")
    expect(file.content).toContain("within: Interval | null")
    expect(file.content).toContain("encode.point(params.at),")
    expect(file.content).toContain("params.within === null ? null : encode.interval(params.within)")
  })

  it("types array elements as nullable only when marked", () => {
    const registry = makeRegistry()
    registry.add({ kind: "array", oid: 1009, schema: "pg_catalog", name: "_text", element: 25 })
    const file = emit(
      registry,
      resolved(registry, "--! tags : many\nSELECT tags, aliases FROM posts;\n", [], [
        { name: "tags", type: 1009, nullable: false, innerNullable: false },
        { name: "aliases", type: 1009, nullable: false, innerNullable: true },
      ]),
    )

    expect(file.content).toContain("tags: Array<string>")
    expect(file.content).toContain("aliases: Array<string | null>")
    expect(file.content).toContain("tags: decode.value(row.tags, decode.array(decode.text))")
  })

  it("shares one declaration between queries of the same shape", () => {
    const registry = makeRegistry()
    const id: ResolvedColumn = { name: "id", type: 23, nullable: false, innerNullable: false }
    const file = emit(
      registry,
      resolved(registry, "--! list_a : many\nSELECT id FROM a;\n", [], [id]),
      resolved(registry, "--! list_b : many\nSELECT id FROM b;\n", [], [id]),
    )

    expect(file.content.split("export interface ListARow {")).toHaveLength(2)
    expect(file.content).not.toContain("ListBRow")
    expect(file.content).toContain("async function* listB(client: Queryable): AsyncGenerator<ListARow>")
  })

  it("is deterministic", () => {
    const build = () => {
      const registry = makeRegistry()
      return emit(
        registry,
        resolved(registry, "--! list_moods : many\nSELECT mood FROM users;\n", [], [
          { name: "mood", type: 5000, nullable: true, innerNullable: false },
        ]),
      ).content
    }
    expect(build()).toBe(build())
  })

  it("writes an empty module for a file without queries", () => {
    const file = emitModule(makeRegistry(), { path: "empty.sql", queries: [] }, { runtimeModule: RUNTIME })
    expect(file.content).toBe(`${generatedHeader("empty.sql")}\n\nexport {}\n`)
  })
})
