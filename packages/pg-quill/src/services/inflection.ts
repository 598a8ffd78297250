/**
 * Inflection - naming transformations for generated code
 *
 * Query names and catalog names are snake_case or camelCase SQL identifiers;
 * generated code uses camelCase for values and PascalCase for types.
 */
import { String as Str } from "effect"

// ============================================================================
// Reserved Words
// ============================================================================

const RESERVED_WORDS = new Set([
  // TypeScript/JavaScript reserved
  "break", "case", "catch", "class", "const", "continue", "debugger", "default",
  "delete", "do", "else", "enum", "export", "extends", "false", "finally", "for",
  "function", "if", "import", "in", "instanceof", "new", "null", "return", "super",
  "switch", "this", "throw", "true", "try", "typeof", "var", "void", "while", "with",
  "yield", "let", "static", "implements", "interface", "package", "private",
  "protected", "public", "abstract", "as", "async", "await", "constructor", "declare",
  "get", "is", "module", "namespace", "never", "readonly", "require", "number",
  "object", "set", "string", "symbol", "type", "undefined", "unique", "unknown",
  "from", "global", "keyof", "of", "infer", "any", "boolean", "bigint",
  // Names every generated module declares or imports
  "client", "params", "result", "row", "decode", "encode", "expectOne", "expectMaybeOne",
  "Codec", "Decoder", "Queryable", "Range", "Point", "Circle", "Interval",
  // Globals referenced by generated signatures
  "Array", "AsyncGenerator", "Boolean", "Buffer", "Date", "Error", "Number", "Object",
  "Promise", "ReadonlyArray", "Record", "String",
])

// ============================================================================
// Case transforms
// ============================================================================

const words = (text: string): readonly string[] =>
  text.split(/[^A-Za-z0-9]+/).filter(w => w.length > 0)

/** `get_user` → `getUser`, `getUser` → `getUser` */
export const camelCase = (text: string): string =>
  words(text)
    .map((w, i) => (i === 0 ? Str.uncapitalize(w) : Str.capitalize(w)))
    .join("")

/** `user_status` → `UserStatus` */
export const pascalCase = (text: string): string =>
  words(text).map(Str.capitalize).join("")

/** Suffix identifiers that would clash with a keyword or a generated name */
export const safeIdentifier = (text: string): string =>
  RESERVED_WORDS.has(text) ? text + "_" : text

// ============================================================================
// Generated names
// ============================================================================

export interface Inflection {
  /** Accessor function for a query */
  readonly accessorName: (queryName: string) => string
  /** Row interface for a query's result shape */
  readonly rowTypeName: (queryName: string) => string
  /** Params interface for a query's parameter shape */
  readonly paramsTypeName: (queryName: string) => string
  /**
   * Declaration for an enum, domain or composite type. The same name is used
   * for the value holding its codec.
   */
  readonly typeName: (pgName: string) => string
}

export const defaultInflection: Inflection = {
  accessorName: name => safeIdentifier(camelCase(name)),
  rowTypeName: name => `${pascalCase(name)}Row`,
  paramsTypeName: name => `${pascalCase(name)}Params`,
  typeName: pgName => safeIdentifier(pascalCase(pgName) || "Unnamed"),
}
