/**
 * Code Emitter
 *
 * Pure rendering of resolved query modules to TypeScript. Each `.sql` file
 * becomes one `.ts` module holding, in order:
 *
 * - imports from the run-time module
 * - enum, domain and composite declarations, each followed by the codec
 *   constant of the same name (dependencies first)
 * - params and row interfaces
 * - row decoders, for rows with columns pg leaves in text form
 * - one accessor per query
 *
 * Output depends only on the registry and the modules: no timestamps, and
 * every collection is walked in a fixed order.
 */
import type { ExpressionKind, StatementKind, TSTypeKind } from "ast-types/lib/gen/kinds.js"
import type {
  CompositeType,
  NamedPgType,
  ResolvedColumn,
  ResolvedModule,
  ResolvedParam,
  ResolvedQuery,
  TypeRef,
} from "../ir/query-ir.js"
import type { TypeRegistry } from "../ir/type-registry.js"
import { conjure } from "../lib/conjure.js"
import { defaultInflection, type Inflection } from "./inflection.js"
import { RUNTIME_TYPES, TsType } from "./pg-types.js"

const { ts, stmt, decl, op } = conjure

// ============================================================================
// Types
// ============================================================================

export interface EmitOptions {
  /** Import path of the run-time support module */
  readonly runtimeModule: string
  readonly inflection?: Inflection
}

export interface EmittedFile {
  /** Output path relative to the output directory */
  readonly path: string
  readonly content: string
}

/** `users.sql` → `users.ts`, `admin/audit.sql` → `admin/audit.ts` */
export const outputPathFor = (sourcePath: string): string => sourcePath.replace(/\.sql$/i, "") + ".ts"

export const generatedHeader = (sourcePath: string): string =>
  [
    "/**",
    " * AUTO-GENERATED FILE - DO NOT EDIT",
    " *",
    ` * Generated by pg-quill from ${sourcePath}.`,
    " * Edit the SQL file and run `pgquill generate` again instead.",
    " */",
  ].join("\n")

/** Run-time encoder for the object types pg parses but does not write back */
const scalarEncoder = (tsType: string): "point" | "circle" | "interval" | undefined => {
  switch (tsType) {
    case TsType.Point:
      return "point"
    case TsType.Circle:
      return "circle"
    case TsType.Interval:
      return "interval"
    default:
      return undefined
  }
}

// ============================================================================
// Module builder
// ============================================================================

/**
 * Per-module state: which run-time names the emitted code used, so only
 * those are imported.
 */
class ModuleBuilder {
  readonly values = new Set<string>()
  readonly types = new Set<string>()

  constructor(private readonly registry: TypeRegistry) {}

  private typeNameOf(oid: TypeRef): string {
    return this.registry.typeName(oid) ?? `Unknown${oid}`
  }

  /**
   * TypeScript type of a value of the given PostgreSQL type. Elements of
   * arrays nested in declared types are always nullable; for a top-level
   * param or column the `[?]` marker decides.
   */
  tsType(oid: TypeRef, nullableElements = true): TSTypeKind {
    const type = this.registry.get(oid)
    if (!type) return ts.unknown()
    switch (type.kind) {
      case "scalar":
        switch (type.tsType) {
          case TsType.String:
            return ts.string()
          case TsType.Number:
            return ts.number()
          case TsType.Boolean:
            return ts.boolean()
          case TsType.Unknown:
            return ts.unknown()
          default:
            if (RUNTIME_TYPES.has(type.tsType)) this.types.add(type.tsType)
            return ts.ref(type.tsType)
        }
      case "enum":
      case "domain":
      case "composite":
        return ts.ref(this.typeNameOf(oid))
      case "array": {
        const element = this.tsType(type.element)
        return ts.ref("Array", [nullableElements ? ts.union(element, ts.null()) : element])
      }
      case "range":
        this.types.add("Range")
        return ts.ref("Range", [this.tsType(type.element)])
    }
  }

  tsTypeOrNull(oid: TypeRef, nullable: boolean, nullableElements = true): TSTypeKind {
    const type = this.tsType(oid, nullableElements)
    return nullable ? ts.union(type, ts.null()) : type
  }

  private decode(name: string, args: readonly ExpressionKind[] = [], typeArgs: readonly TSTypeKind[] = []) {
    this.values.add("decode")
    return conjure.id("decode").method(name, args, typeArgs).build()
  }

  private encode(name: string) {
    this.values.add("encode")
    return conjure.id("encode").prop(name)
  }

  /** Expression of the text parser for a type */
  parser(oid: TypeRef): ExpressionKind {
    const type = this.registry.get(oid)
    if (!type) {
      this.values.add("decode")
      return conjure.id("decode").prop("text").build()
    }
    switch (type.kind) {
      case "scalar":
        if (type.tsType === TsType.String) {
          this.values.add("decode")
          return conjure.id("decode").prop("text").build()
        }
        return this.decode("builtin", [conjure.num(type.oid)], [this.tsType(oid)])
      case "enum":
      case "domain":
      case "composite":
        return conjure.id(this.typeNameOf(oid)).prop("parse").build()
      case "array":
        return this.decode("array", [this.parser(type.element)])
      case "range":
        return this.decode("range", [this.parser(type.element)])
    }
  }

  /** Whether a value of this type needs encoding before pg can send it */
  needsEncode(oid: TypeRef): boolean {
    const type = this.registry.get(oid)
    switch (type?.kind) {
      case "scalar":
        return scalarEncoder(type.tsType) !== undefined
      case "composite":
      case "range":
        return true
      case "domain":
        return this.needsEncode(type.base)
      case "array":
        return this.needsEncode(type.element)
      default:
        return false
    }
  }

  /** Expression of the encoder function for a type, if it needs one */
  encoder(oid: TypeRef): ExpressionKind | undefined {
    const type = this.registry.get(oid)
    if (!type || !this.needsEncode(oid)) return undefined
    switch (type.kind) {
      case "scalar": {
        const name = scalarEncoder(type.tsType)
        return name ? this.encode(name).build() : undefined
      }
      case "composite":
      case "domain":
        return conjure.id(this.typeNameOf(oid)).prop("encode").build()
      case "range":
        return this.encode("range").build()
      case "array": {
        const element = this.encoder(type.element)
        return element ? this.encode("array").call([element]).build() : undefined
      }
      default:
        return undefined
    }
  }

  /** `value`, passed through its encoder when the type has one */
  encodeValue(oid: TypeRef, value: ExpressionKind, nullable: boolean): ExpressionKind {
    const encoder = this.encoder(oid)
    if (!encoder) return value
    const encoded = conjure.chain(encoder).call([value]).build()
    return nullable ? op.ternary(op.eq(value, conjure.null()), conjure.null(), encoded) : encoded
  }

  /** Whether pg hands a column of this type over still in text form */
  needsDecode(oid: TypeRef): boolean {
    const kind = this.registry.get(oid)?.kind
    return kind !== undefined && kind !== "scalar" && kind !== "enum"
  }

  // ==========================================================================
  // Named types
  // ==========================================================================

  namedType(type: NamedPgType): readonly StatementKind[] {
    const name = this.typeNameOf(type.oid)
    switch (type.kind) {
      case "enum":
        this.types.add("Decoder")
        return [
          decl.export(decl.typeAlias(name, ts.union(...type.labels.map(ts.literal)))),
          decl.exportConst(
            name,
            conjure.obj().prop("parse", this.decode("enumOf", [conjure.arr(...type.labels.map(conjure.str))])).build(),
            ts.ref("Decoder", [ts.ref(name)]),
          ),
        ]
      case "domain": {
        const encoder = this.encoder(type.base)
        const codec = conjure.obj().prop("parse", this.parser(type.base))
        this.types.add(encoder ? "Codec" : "Decoder")
        return [
          decl.export(decl.typeAlias(name, this.tsType(type.base))),
          decl.exportConst(
            name,
            (encoder ? codec.prop("encode", encoder) : codec).build(),
            ts.ref(encoder ? "Codec" : "Decoder", [ts.ref(name)]),
          ),
        ]
      }
      case "composite":
        this.types.add("Codec")
        return [
          decl.export(
            decl.interface(
              name,
              type.fields.map(f => ({ name: f.name, type: this.tsTypeOrNull(f.type, true) })),
            ),
          ),
          decl.exportConst(
            name,
            conjure
              .obj()
              .prop("parse", this.compositeParser(type))
              .prop("encode", this.compositeEncoder(type))
              .build(),
            ts.ref("Codec", [ts.ref(name)]),
          ),
        ]
    }
  }

  private compositeParser(type: CompositeType): ExpressionKind {
    const fields = type.fields.reduce(
      (obj, f, i) => obj.prop(f.name, this.decode("field", [conjure.id("fields").build(), conjure.num(i), this.parser(f.type)])),
      conjure.obj(),
    )
    return this.decode("composite", [conjure.fn().param("fields").arrow(fields.build())])
  }

  private compositeEncoder(type: CompositeType): ExpressionKind {
    const values = type.fields.map(f => this.encodeValue(f.type, conjure.id("value").prop(f.name).build(), true))
    return conjure
      .fn()
      .param("value")
      .arrow(this.encode("record").call([conjure.arr(...values)]).build())
  }

  // ==========================================================================
  // Shapes
  // ==========================================================================

  paramsInterface(name: string, params: readonly ResolvedParam[]): StatementKind {
    return decl.export(
      decl.interface(
        name,
        params.map(p => ({ name: p.name, type: this.tsTypeOrNull(p.type, p.nullable, p.innerNullable) })),
      ),
    )
  }

  rowInterface(name: string, columns: readonly ResolvedColumn[]): StatementKind {
    return decl.export(
      decl.interface(
        name,
        columns.map(c => ({ name: c.name, type: this.tsTypeOrNull(c.type, c.nullable, c.innerNullable) })),
      ),
    )
  }

  /** `const decodeXRow = (row: XRow): XRow => ({ ...row, col: decode.value(row.col, P) })` */
  rowDecoder(decoderName: string, rowType: string, columns: readonly ResolvedColumn[]): StatementKind {
    const body = columns
      .filter(c => this.needsDecode(c.type))
      .reduce(
        (obj, c) =>
          obj.prop(
            c.name,
            this.decode(c.nullable ? "nullable" : "value", [conjure.id("row").prop(c.name).build(), this.parser(c.type)]),
          ),
        conjure.obj().spread(conjure.id("row").build()),
      )
    return stmt.const(
      decoderName,
      conjure.fn().param("row", ts.ref(rowType)).returns(ts.ref(rowType)).arrow(body.build()),
    )
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  accessor(resolved: ResolvedQuery, name: string, rowDecoder: string | undefined): StatementKind {
    const { query } = resolved
    this.types.add("Queryable")

    const args: ExpressionKind[] = [conjure.template(query.text)]
    if (resolved.params.length > 0) {
      args.push(
        conjure.arr(
          ...resolved.params.map(p => this.encodeValue(p.type, conjure.id("params").prop(p.name).build(), p.nullable)),
        ),
      )
    }

    const rowType = resolved.rowType
    const runQuery = stmt.const(
      "result",
      conjure.await(conjure.id("client").method("query", args, rowType ? [ts.ref(rowType)] : []).build()),
    )
    const rows = conjure.id("result").prop("rows").build()
    const decodeRow = (expr: ExpressionKind) => (rowDecoder ? conjure.id(rowDecoder).call([expr]).build() : expr)

    let fn = conjure.fn().async().param("client", ts.ref("Queryable"))
    if (resolved.paramsType) fn = fn.param("params", ts.ref(resolved.paramsType))

    switch (query.cardinality) {
      case "one":
        this.values.add("expectOne")
        return decl.export(
          fn
            .returns(ts.ref("Promise", [ts.ref(rowType ?? "never")]))
            .body(runQuery, stmt.return(decodeRow(conjure.id("expectOne").call([rows, conjure.str(query.name)]).build())))
            .toDeclaration(name),
        )
      case "maybe-one": {
        this.values.add("expectMaybeOne")
        const found = conjure.id("expectMaybeOne").call([rows, conjure.str(query.name)]).build()
        const body: StatementKind[] = rowDecoder
          ? [
              runQuery,
              stmt.const("row", found),
              stmt.return(
                op.ternary(
                  op.eq(conjure.id("row").build(), conjure.id("undefined").build()),
                  conjure.id("undefined").build(),
                  decodeRow(conjure.id("row").build()),
                ),
              ),
            ]
          : [runQuery, stmt.return(found)]
        return decl.export(
          fn
            .returns(ts.ref("Promise", [ts.union(ts.ref(rowType ?? "never"), ts.undefined())]))
            .body(...body)
            .toDeclaration(name),
        )
      }
      case "many":
        return decl.export(
          fn
            .generator()
            .returns(ts.ref("AsyncGenerator", [ts.ref(rowType ?? "never")]))
            .body(runQuery, stmt.yieldAll(rowDecoder ? conjure.chain(rows).method("map", [conjure.id(rowDecoder).build()]).build() : rows))
            .toDeclaration(name),
        )
      case "execute":
        return decl.export(
          fn
            .returns(ts.ref("Promise", [ts.number()]))
            .body(runQuery, stmt.return(op.nullish(conjure.id("result").prop("rowCount").build(), conjure.num(0))))
            .toDeclaration(name),
        )
    }
  }

  imports(runtimeModule: string): readonly StatementKind[] {
    const sorted = (names: ReadonlySet<string>) => Array.from(names).sort()
    return [
      ...(this.values.size > 0 ? [decl.import(sorted(this.values), runtimeModule)] : []),
      ...(this.types.size > 0 ? [decl.import(sorted(this.types), runtimeModule, "type")] : []),
    ]
  }
}

// ============================================================================
// Emission
// ============================================================================

/** Every type a module's queries reach, directly or through other types */
function referencedTypes(registry: TypeRegistry, module: ResolvedModule): ReadonlySet<TypeRef> {
  const seen = new Set<TypeRef>()
  const visit = (oid: TypeRef): void => {
    if (seen.has(oid)) return
    seen.add(oid)
    const type = registry.get(oid)
    switch (type?.kind) {
      case "domain":
        return visit(type.base)
      case "composite":
        return type.fields.forEach(f => visit(f.type))
      case "array":
      case "range":
        return visit(type.element)
      default:
        return
    }
  }
  for (const q of module.queries) {
    q.params.forEach(p => visit(p.type))
    q.columns.forEach(c => visit(c.type))
  }
  return seen
}

/** Render one module's statements, without imports */
function emitBody(
  builder: ModuleBuilder,
  registry: TypeRegistry,
  module: ResolvedModule,
  inflection: Inflection,
): readonly StatementKind[] {
  const referenced = referencedTypes(registry, module)
  const declared = new Set<string>()
  const statements: StatementKind[] = []

  // Named types, in registry order so dependencies come first
  for (const type of registry.types()) {
    if (!referenced.has(type.oid) || (type.kind !== "enum" && type.kind !== "domain" && type.kind !== "composite")) continue
    const name = registry.typeName(type.oid)
    if (name === undefined || declared.has(name)) continue
    declared.add(name)
    statements.push(...builder.namedType(type))
  }

  // Shapes
  const accessorNames = new Set(module.queries.map(q => inflection.accessorName(q.query.name)))
  const decoders = new Map<string, string | undefined>()
  const rowDecoders: StatementKind[] = []
  for (const q of module.queries) {
    if (q.paramsType && !declared.has(q.paramsType)) {
      declared.add(q.paramsType)
      statements.push(builder.paramsInterface(q.paramsType, q.params))
    }
    if (q.rowType && !declared.has(q.rowType)) {
      declared.add(q.rowType)
      statements.push(builder.rowInterface(q.rowType, q.columns))
      if (q.columns.some(c => builder.needsDecode(c.type))) {
        let decoderName = `decode${q.rowType}`
        while (accessorNames.has(decoderName)) decoderName += "_"
        decoders.set(q.rowType, decoderName)
        rowDecoders.push(builder.rowDecoder(decoderName, q.rowType, q.columns))
      }
    }
  }
  statements.push(...rowDecoders)

  // Accessors
  for (const q of module.queries) {
    statements.push(
      builder.accessor(q, inflection.accessorName(q.query.name), q.rowType ? decoders.get(q.rowType) : undefined),
    )
  }
  return statements
}

/**
 * Render one module. Statements are printed one at a time and separated by
 * a blank line.
 */
export function emitModule(registry: TypeRegistry, module: ResolvedModule, options: EmitOptions): EmittedFile {
  const builder = new ModuleBuilder(registry)
  const body = emitBody(builder, registry, module, options.inflection ?? defaultInflection)
  const statements = [...builder.imports(options.runtimeModule), ...body]
  const code = statements.length > 0 ? statements.map(s => conjure.print(s)).join("\n\n") : "export {}"
  return {
    path: outputPathFor(module.path),
    content: `${generatedHeader(module.path)}\n\n${code}\n`,
  }
}

/** Render every module, in input order */
export function emitModules(
  registry: TypeRegistry,
  modules: readonly ResolvedModule[],
  options: EmitOptions,
): readonly EmittedFile[] {
  return modules.map(module => emitModule(registry, module, options))
}
