/**
 * Conjure - AST Builder DSL for recast
 *
 * A fluent, immutable API for constructing TypeScript AST nodes.
 * Wraps recast builders with ergonomic patterns for the code the emitter
 * writes: declarations, accessor functions and decoder expressions.
 *
 * @example
 * ```typescript
 * import { conjure } from "../lib/conjure.js"
 *
 * // Method chains
 * const parse = conjure.id("decode").method("array", [conjure.id("Address").prop("parse").build()]).build()
 *
 * // Functions
 * const accessor = conjure.fn()
 *   .async()
 *   .param("client", conjure.ts.ref("Queryable"))
 *   .returns(conjure.ts.ref("Promise", [conjure.ts.number()]))
 *   .body(conjure.stmt.return(conjure.num(0)))
 *   .toDeclaration("countUsers")
 * ```
 */
import recast from "recast"
import type {
  ExpressionKind,
  PatternKind,
  StatementKind,
  TSTypeKind,
} from "ast-types/lib/gen/kinds.js"

const b = recast.types.builders

type ObjMember = Parameters<typeof b.objectExpression>[0][number]
type InterfaceMember = Parameters<typeof b.tsInterfaceBody>[0][number]
type Declaration = NonNullable<Parameters<typeof b.exportNamedDeclaration>[0]>

const VALID_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

/** Identifier when `name` can be written bare, string literal otherwise */
const key = (name: string) => (VALID_IDENTIFIER.test(name) ? b.identifier(name) : b.stringLiteral(name))

// =============================================================================
// Chain Builder
// =============================================================================

/**
 * Fluent builder for method chains and property access.
 */
export interface ChainBuilder {
  /** The underlying AST node */
  readonly node: ExpressionKind

  /** Property access: `.name`, or `["name"]` when it is not an identifier */
  prop(name: string): ChainBuilder

  /** Method call: `.name(args)` or `.name<T>(args)` */
  method(name: string, args?: readonly ExpressionKind[], typeArgs?: readonly TSTypeKind[]): ChainBuilder

  /** Direct call: `(args)` */
  call(args?: readonly ExpressionKind[]): ChainBuilder

  /** Finalize and return the expression */
  build(): ExpressionKind
}

const callWith = (callee: ExpressionKind, args: readonly ExpressionKind[], typeArgs: readonly TSTypeKind[]) => {
  const call = b.callExpression(callee, [...args])
  return typeArgs.length > 0
    ? Object.assign(call, { typeParameters: b.tsTypeParameterInstantiation([...typeArgs]) })
    : call
}

function createChain(start: ExpressionKind): ChainBuilder {
  return {
    node: start,

    prop(name) {
      const property = key(name)
      return createChain(b.memberExpression(this.node, property, property.type === "StringLiteral"))
    },

    method(name, args = [], typeArgs = []) {
      return createChain(callWith(b.memberExpression(this.node, b.identifier(name)), args, typeArgs))
    },

    call(args = []) {
      return createChain(b.callExpression(this.node, [...args]))
    },

    build() {
      return this.node
    },
  }
}

// =============================================================================
// Object Builder
// =============================================================================

/**
 * Fluent builder for object literals.
 */
export interface ObjBuilder {
  /** Add a property: `key: value`; non-identifier keys are quoted */
  prop(key: string, value: ExpressionKind): ObjBuilder

  /** Add a spread: `...expr` */
  spread(expr: ExpressionKind): ObjBuilder

  /** Finalize and return the object expression */
  build(): ExpressionKind
}

function createObj(props: readonly ObjMember[] = []): ObjBuilder {
  return {
    prop(name, value) {
      return createObj([...props, b.objectProperty(key(name), value)])
    },

    spread(expr) {
      return createObj([...props, b.spreadElement(expr)])
    },

    build() {
      return b.objectExpression([...props])
    },
  }
}

// =============================================================================
// Function Builder
// =============================================================================

interface FnParam {
  readonly name: string
  readonly type: TSTypeKind | undefined
}

interface FnConfig {
  readonly params: readonly FnParam[]
  readonly body: readonly StatementKind[]
  readonly returnType: TSTypeKind | undefined
  readonly isAsync: boolean
  readonly isGenerator: boolean
}

/**
 * Fluent builder for function expressions and declarations.
 */
export interface FnBuilder {
  /** Add a parameter */
  param(name: string, type?: TSTypeKind): FnBuilder

  /** Set the return type annotation */
  returns(type: TSTypeKind): FnBuilder

  /** Set the function body */
  body(...statements: StatementKind[]): FnBuilder

  /** Mark as async */
  async(): FnBuilder

  /** Make it a generator function */
  generator(): FnBuilder

  /** Build as an arrow function whose body is a single expression */
  arrow(expr: ExpressionKind): ExpressionKind

  /** Build as a named function declaration */
  toDeclaration(name: string): Declaration
}

function createFn(config: FnConfig): FnBuilder {
  const buildParams = (): PatternKind[] =>
    config.params.map(p => {
      const id = b.identifier(p.name)
      if (p.type) {
        id.typeAnnotation = b.tsTypeAnnotation(p.type)
      }
      return id
    })

  return {
    param(name, type) {
      return createFn({ ...config, params: [...config.params, { name, type }] })
    },

    returns(type) {
      return createFn({ ...config, returnType: type })
    },

    body(...statements) {
      return createFn({ ...config, body: statements })
    },

    async() {
      return createFn({ ...config, isAsync: true })
    },

    generator() {
      return createFn({ ...config, isGenerator: true })
    },

    arrow(expr) {
      const fn = b.arrowFunctionExpression(buildParams(), expr, true)
      fn.async = config.isAsync
      if (config.returnType) {
        fn.returnType = b.tsTypeAnnotation(config.returnType)
      }
      return fn
    },

    toDeclaration(name) {
      const fn = b.functionDeclaration(
        b.identifier(name),
        buildParams(),
        b.blockStatement([...config.body]),
        config.isGenerator,
      )
      fn.async = config.isAsync
      if (config.returnType) {
        fn.returnType = b.tsTypeAnnotation(config.returnType)
      }
      return fn
    },
  }
}

// =============================================================================
// Operators
// =============================================================================

/**
 * Operator helpers for building expressions.
 */
const op = {
  /** Strict equality: `===` */
  eq: (left: ExpressionKind, right: ExpressionKind) => b.binaryExpression("===", left, right),

  /** Ternary/conditional expression */
  ternary: (test: ExpressionKind, consequent: ExpressionKind, alternate: ExpressionKind) =>
    b.conditionalExpression(test, consequent, alternate),

  /** Nullish coalescing: `??` */
  nullish: (left: ExpressionKind, right: ExpressionKind) => b.logicalExpression("??", left, right),
} as const

// =============================================================================
// Statement Helpers
// =============================================================================

/**
 * Statement builders.
 */
const stmt = {
  /** `const name: type = init` */
  const: (name: string, init: ExpressionKind, type?: TSTypeKind) => {
    const id = b.identifier(name)
    if (type) {
      id.typeAnnotation = b.tsTypeAnnotation(type)
    }
    return b.variableDeclaration("const", [b.variableDeclarator(id, init)])
  },

  /** `return expr` */
  return: (expr?: ExpressionKind) => b.returnStatement(expr ?? null),

  /** `yield* expr` */
  yieldAll: (expr: ExpressionKind) => b.expressionStatement(b.yieldExpression(expr, true)),
} as const

// =============================================================================
// TypeScript Type Helpers
// =============================================================================

/**
 * TypeScript type node builders.
 */
const ts = {
  // Keyword types
  string: () => b.tsStringKeyword(),
  number: () => b.tsNumberKeyword(),
  boolean: () => b.tsBooleanKeyword(),
  unknown: () => b.tsUnknownKeyword(),
  null: () => b.tsNullKeyword(),
  undefined: () => b.tsUndefinedKeyword(),

  /** Type reference: `TypeName` or `TypeName<T>` */
  ref: (name: string, typeParams: readonly TSTypeKind[] = []) =>
    b.tsTypeReference(
      b.identifier(name),
      typeParams.length > 0 ? b.tsTypeParameterInstantiation([...typeParams]) : null,
    ),

  /** Union type: `A | B | C` */
  union: (...types: TSTypeKind[]) => b.tsUnionType(types),

  /** String literal type: `"value"` */
  literal: (value: string) => b.tsLiteralType(b.stringLiteral(value)),
} as const

// =============================================================================
// Declarations
// =============================================================================

export interface InterfaceProp {
  readonly name: string
  readonly type: TSTypeKind
}

/**
 * Module-level declarations.
 */
const decl = {
  /** `export <declaration>` */
  export: (declaration: Declaration) => b.exportNamedDeclaration(declaration),

  /** `export const name: type = init` */
  exportConst: (name: string, init: ExpressionKind, type?: TSTypeKind) =>
    b.exportNamedDeclaration(stmt.const(name, init, type)),

  /** `interface Name { prop: Type }` with non-identifier keys quoted */
  interface: (name: string, props: readonly InterfaceProp[]) =>
    b.tsInterfaceDeclaration(
      b.identifier(name),
      b.tsInterfaceBody(
        props.map((p): InterfaceMember => b.tsPropertySignature(key(p.name), b.tsTypeAnnotation(p.type))),
      ),
    ),

  /** `type Name = Type` */
  typeAlias: (name: string, type: TSTypeKind) => b.tsTypeAliasDeclaration(b.identifier(name), type),

  /** `import { a, b } from "source"`, or `import type { ... }` */
  import: (names: readonly string[], source: string, kind: "value" | "type" = "value") =>
    b.importDeclaration(
      names.map(name => b.importSpecifier(b.identifier(name))),
      b.stringLiteral(source),
      kind,
    ),
} as const

// =============================================================================
// Main API
// =============================================================================

/**
 * Conjure - AST Builder DSL
 *
 * A fluent, immutable API for constructing TypeScript AST nodes.
 */
export const conjure = {
  // === Chain builders ===

  /** Start a chain from an identifier */
  id: (name: string) => createChain(b.identifier(name)),

  /** Start a chain from any expression */
  chain: (expr: ExpressionKind) => createChain(expr),

  // === Compound builders ===

  /** Start an object literal builder */
  obj: () => createObj(),

  /** Array literal */
  arr: (...elements: ExpressionKind[]) => b.arrayExpression(elements),

  /** Start a function builder */
  fn: () =>
    createFn({
      params: [],
      body: [],
      returnType: undefined,
      isAsync: false,
      isGenerator: false,
    }),

  // === Literals ===

  /** String literal */
  str: (value: string) => b.stringLiteral(value),

  /** Numeric literal */
  num: (value: number) => b.numericLiteral(value),

  /** null */
  null: () => b.nullLiteral(),

  /**
   * Template literal holding `text` verbatim. Backslashes, backticks and
   * `${` are escaped so the cooked value equals `text`.
   */
  template: (text: string) => {
    const raw = text.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${")
    return b.templateLiteral([b.templateElement({ raw, cooked: text }, true)], [])
  },

  // === Operators ===
  op,

  // === Statements ===
  stmt,

  // === TypeScript types ===
  ts,

  // === Declarations ===
  decl,

  // === Helpers ===

  /** Await expression */
  await: (expr: ExpressionKind) => b.awaitExpression(expr),

  /** Print an AST node to code */
  print: (node: Parameters<typeof recast.print>[0]) => recast.print(node, { quote: "double", tabWidth: 2 }).code,
} as const
