/**
 * Tests for Conjure - AST Builder DSL
 */
import { describe, it, expect } from "vitest"
import recast from "recast"
import type { ExpressionKind } from "ast-types/lib/gen/kinds.js"
import { conjure } from "../lib/conjure.js"

const { ts, stmt, decl, op } = conjure

/** Helper to get printed code from an expression */
const printExpr = (expr: ExpressionKind) => conjure.print(recast.types.builders.expressionStatement(expr))

describe("Conjure", () => {
  describe("chain builder", () => {
    it("chains property access and method calls", () => {
      const result = conjure.id("decode").method("array", [conjure.id("Address").prop("parse").build()]).build()
      expect(printExpr(result)).toBe("decode.array(Address.parse);")
    })

    it("quotes properties that are not identifiers", () => {
      expect(printExpr(conjure.id("params").prop("order-by").build())).toBe('params["order-by"];')
    })

    it("passes type arguments", () => {
      const result = conjure.id("decode").method("builtin", [conjure.num(1184)], [ts.ref("Date")]).build()
      expect(printExpr(result)).toBe("decode.builtin<Date>(1184);")
    })

    it("calls the chain itself", () => {
      const result = conjure.id("encode").prop("array").call([conjure.id("encode").prop("range").build()]).build()
      expect(printExpr(result)).toBe("encode.array(encode.range);")
    })
  })

  describe("literals", () => {
    it("escapes template literal text", () => {
      expect(printExpr(conjure.template("select '${x}', `y`"))).toBe("`select '\\${x}', \\`y\\``;")
    })

    it("prints arrays of strings", () => {
      expect(printExpr(conjure.arr(conjure.str("a"), conjure.str("b")))).toBe('["a", "b"];')
    })
  })

  describe("operators", () => {
    it("builds ternaries and nullish coalescing", () => {
      const value = conjure.id("value").build()
      expect(printExpr(op.ternary(op.eq(value, conjure.null()), conjure.null(), value))).toBe(
        "value === null ? null : value;",
      )
      expect(printExpr(op.nullish(conjure.id("result").prop("rowCount").build(), conjure.num(0)))).toBe(
        "result.rowCount ?? 0;",
      )
    })
  })

  describe("declarations", () => {
    it("prints type aliases", () => {
      expect(conjure.print(decl.export(decl.typeAlias("Mood", ts.union(ts.literal("sad"), ts.literal("ok")))))).toBe(
        'export type Mood = "sad" | "ok";',
      )
    })

    it("prints value and type imports", () => {
      expect(conjure.print(decl.import(["decode", "encode"], "pg-quill/runtime"))).toBe(
        'import { decode, encode } from "pg-quill/runtime";',
      )
      expect(conjure.print(decl.import(["Queryable"], "pg-quill/runtime", "type"))).toBe(
        'import type { Queryable } from "pg-quill/runtime";',
      )
    })

    it("prints typed constants", () => {
      expect(conjure.print(stmt.const("n", conjure.num(1), ts.number()))).toBe("const n: number = 1;")
    })
  })

  describe("function builder", () => {
    it("builds async function declarations", () => {
      const fn = conjure
        .fn()
        .async()
        .param("client", ts.ref("Queryable"))
        .returns(ts.ref("Promise", [ts.number()]))
        .body(stmt.return(conjure.num(0)))
        .toDeclaration("countUsers")
      expect(conjure.print(fn)).toBe(
        "async function countUsers(client: Queryable): Promise<number> {\n  return 0;\n}",
      )
    })

    it("builds generator declarations", () => {
      const fn = conjure
        .fn()
        .async()
        .generator()
        .body(stmt.yieldAll(conjure.id("rows").build()))
        .toDeclaration("list")
      expect(conjure.print(fn)).toBe("async function* list() {\n  yield* rows;\n}")
    })
  })
})
