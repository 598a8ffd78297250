/**
 * Type Resolver Tests
 *
 * Runs parse → describe → introspect → resolve against an in-memory catalog.
 */
import { describe, expect, it } from "@effect/vitest"
import { Effect, Either, Logger, LogLevel } from "effect"
import type { QueryModule } from "../ir/query-ir.js"
import { TypeRegistry } from "../ir/type-registry.js"
import { parseQueryModule } from "../services/annotation-parser.js"
import { defaultInflection } from "../services/inflection.js"
import { describeModules, introspectModules } from "../services/introspection.js"
import { isAttenuated, resolveModules } from "../services/type-resolver.js"
import { builtinTypes, column, FakeCatalogLayer, type FakeStatement } from "../testing.js"

const QuietLogger = Logger.minimumLogLevel(LogLevel.None)

const USERS = 16400

const parse = (path: string, text: string): QueryModule => {
  const result = parseQueryModule(path, text)
  if (Either.isLeft(result)) throw new Error(result.left.map(e => e.message).join("\n"))
  return result.right
}

const resolve = (files: ReadonlyArray<readonly [string, string]>, statements: ReadonlyMap<string, FakeStatement>) =>
  Effect.gen(function* () {
    const modules = files.map(([path, text]) => parse(path, text))
    const registry = new TypeRegistry(defaultInflection.typeName)
    const described = yield* describeModules(modules, 2)
    const introspected = yield* introspectModules(described.modules, registry)
    return { registry, ...resolveModules(registry, introspected.modules) }
  }).pipe(
    Effect.provide(
      FakeCatalogLayer({
        types: builtinTypes,
        notNull: new Set([`${USERS}:1`, `${USERS}:2`]),
        statements,
      }),
    ),
    Effect.provide(QuietLogger),
  )

describe("isAttenuated", () => {
  it("spots outer joins and set operations", () => {
    expect(isAttenuated("select a from t left join u on true")).toBe(true)
    expect(isAttenuated("select 1 union select 2")).toBe(true)
    expect(isAttenuated("select a from t join u on true")).toBe(false)
  })

  it("ignores keywords inside literals and comments", () => {
    expect(isAttenuated("select 'left' from t -- full\n")).toBe(false)
  })
})

describe("resolveModules", () => {
  it.effect("takes nullability from the catalog", () =>
    Effect.gen(function* () {
      const { modules, diagnostics } = yield* resolve(
        [["users.sql", "--! get_user : maybe-one\nSELECT id, name, email FROM users WHERE id = :id;\n"]],
        new Map([
          [
            "SELECT id, name, email FROM users WHERE id = $1",
            {
              params: [23],
              columns: [column("id", 23, USERS, 1), column("name", 25, USERS, 2), column("email", 25, USERS, 3)],
            },
          ],
        ]),
      )

      expect(diagnostics).toEqual([])
      const [query] = modules[0]?.queries ?? []
      expect(query?.params).toEqual([{ index: 1, name: "id", type: 23, nullable: false, innerNullable: false }])
      expect(query?.columns).toEqual([
        { name: "id", type: 23, nullable: false, innerNullable: false },
        { name: "name", type: 25, nullable: false, innerNullable: false },
        { name: "email", type: 25, nullable: true, innerNullable: false },
      ])
      expect(query?.paramsType).toBe("GetUserParams")
      expect(query?.rowType).toBe("GetUserRow")
    }),
  )

  it.effect("treats every column of an outer join as nullable", () =>
    Effect.gen(function* () {
      const { modules } = yield* resolve(
        [["users.sql", "--! with_posts : many\nSELECT u.id FROM users u LEFT JOIN posts p ON p.author_id = u.id;\n"]],
        new Map([
          [
            "SELECT u.id FROM users u LEFT JOIN posts p ON p.author_id = u.id",
            { params: [], columns: [column("id", 23, USERS, 1)] },
          ],
        ]),
      )
      expect(modules[0]?.queries[0]?.columns).toEqual([{ name: "id", type: 23, nullable: true, innerNullable: false }])
      expect(modules[0]?.queries[0]?.paramsType).toBeUndefined()
    }),
  )

  it.effect("applies nullable overrides from the directive", () =>
    Effect.gen(function* () {
      const { modules } = yield* resolve(
        [["users.sql", "--! get_name : one (name?)\nSELECT name FROM users LIMIT 1;\n"]],
        new Map([["SELECT name FROM users LIMIT 1", { params: [], columns: [column("name", 25, USERS, 2)] }]]),
      )
      expect(modules[0]?.queries[0]?.columns).toEqual([{ name: "name", type: 25, nullable: true, innerNullable: false }])
    }),
  )

  it.effect("shares a row type between files", () =>
    Effect.gen(function* () {
      const { modules } = yield* resolve(
        [
          ["a.sql", "--! list_a : many\nSELECT id FROM users;\n"],
          ["b.sql", "--! list_b : many\nSELECT id FROM users;\n"],
        ],
        new Map([["SELECT id FROM users", { params: [], columns: [column("id", 23, USERS, 1)] }]]),
      )
      expect(modules.map(m => m.queries[0]?.rowType)).toEqual(["ListARow", "ListARow"])
    }),
  )

  it.effect("gives queries that name a row type that name, and lends it to identical rows", () =>
    Effect.gen(function* () {
      const text = [
        "--: User(nickname?)",
        "--! get_user : one User",
        "SELECT id, nickname FROM users WHERE id = :id;",
        "--! list_users : many User",
        "SELECT id, nickname FROM users;",
        "--! first_user : maybe-one",
        "SELECT id, nickname FROM users LIMIT 1;",
        "",
      ].join("\n")
      const columns = [column("id", 23, USERS, 1), column("nickname", 25, USERS, 3)]
      const { modules, diagnostics } = yield* resolve(
        [["users.sql", text]],
        new Map([
          ["SELECT id, nickname FROM users WHERE id = $1", { params: [23], columns }],
          ["SELECT id, nickname FROM users", { params: [], columns }],
          ["SELECT id, nickname FROM users LIMIT 1", { params: [], columns }],
        ]),
      )

      expect(diagnostics).toEqual([])
      expect(modules[0]?.queries.map(q => q.rowType)).toEqual(["User", "User", "User"])
      expect(modules[0]?.queries[0]?.paramsType).toBe("GetUserParams")
    }),
  )

  it.effect("rejects a named row type used for two different shapes", () =>
    Effect.gen(function* () {
      const text = [
        "--! get_user : one User",
        "SELECT id FROM users WHERE id = :id;",
        "--! list_users : many User",
        "SELECT id, name FROM users;",
        "",
      ].join("\n")
      const { modules, diagnostics } = yield* resolve(
        [["users.sql", text]],
        new Map([
          ["SELECT id FROM users WHERE id = $1", { params: [23], columns: [column("id", 23, USERS, 1)] }],
          ["SELECT id, name FROM users", { params: [], columns: [column("id", 23, USERS, 1), column("name", 25, USERS, 2)] }],
        ]),
      )

      expect(modules[0]?.queries.map(q => q.query.name)).toEqual(["get_user"])
      expect(diagnostics.map(d => d.message)).toEqual([
        "`User` is already used for a different shape; every use of a named type must have the same fields",
      ])
      expect(diagnostics[0]?.span.line).toBe(3)
    }),
  )

  it.effect("marks array elements nullable with [?] and rejects it on other types", () =>
    Effect.gen(function* () {
      const text = [
        "--! post_tags : many (tags[?])",
        "SELECT tags FROM posts;",
        "--! names : many (name[?])",
        "SELECT name FROM users;",
        "",
      ].join("\n")
      const { modules, diagnostics } = yield* resolve(
        [["posts.sql", text]],
        new Map([
          ["SELECT tags FROM posts", { params: [], columns: [column("tags", 1009)] }],
          ["SELECT name FROM users", { params: [], columns: [column("name", 25, USERS, 2)] }],
        ]),
      )

      expect(modules[0]?.queries.map(q => q.columns)).toEqual([
        [{ name: "tags", type: 1009, nullable: true, innerNullable: true }],
      ])
      expect(diagnostics.map(d => d.message)).toEqual([
        "`name[?]` marks array elements nullable, but column `name` of `names` is not an array",
      ])
    }),
  )

  it.effect("gives execute queries no row type", () =>
    Effect.gen(function* () {
      const { modules } = yield* resolve(
        [["users.sql", "--! touch : execute\nUPDATE users SET name = name;\n"]],
        new Map([["UPDATE users SET name = name", { params: [], columns: [] }]]),
      )
      expect(modules[0]?.queries[0]?.rowType).toBeUndefined()
    }),
  )

  it.effect("reports mismatched queries and keeps the others", () =>
    Effect.gen(function* () {
      const text = [
        "--! arity : one",
        "SELECT id FROM users WHERE id = :id;",
        "--! silent : one",
        "UPDATE users SET name = name;",
        "--! twice : many",
        "SELECT id, id FROM users;",
        "--! ghost : one (nickname?)",
        "SELECT id FROM users;",
        "--! fine : one",
        "SELECT 1 AS one;",
        "",
      ].join("\n")
      const { modules, diagnostics } = yield* resolve(
        [["users.sql", text]],
        new Map([
          ["SELECT id FROM users WHERE id = $1", { params: [23, 23], columns: [column("id", 23, USERS, 1)] }],
          ["UPDATE users SET name = name", { params: [], columns: [] }],
          ["SELECT id, id FROM users", { params: [], columns: [column("id", 23, USERS, 1), column("id", 23, USERS, 1)] }],
          ["SELECT id FROM users", { params: [], columns: [column("id", 23, USERS, 1)] }],
          ["SELECT 1 AS one", { params: [], columns: [column("one", 23)] }],
        ]),
      )

      expect(modules[0]?.queries.map(q => q.query.name)).toEqual(["fine"])
      expect(diagnostics.map(d => d.message)).toEqual([
        "the statement takes 2 parameter(s) but query `arity` binds 1",
        "query `silent` is declared `one` but returns no columns; declare it `execute`",
        "column `id` appears more than once in the result of `twice`; give it an alias",
        "`nickname` is not a column of the result of `ghost`",
      ])
      expect(diagnostics[3]?.span.line).toBe(7)
    }),
  )
})
