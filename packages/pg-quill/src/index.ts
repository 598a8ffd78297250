/**
 * pg-quill - typed accessors from annotated PostgreSQL queries
 *
 * Main entry point
 */

// Config
export {
  Config,
  TypeOverride,
  type ResolvedConfig,
  type ConfigInput,
} from "./config.js";

// Config Loader Service
export {
  type ConfigLoader,
  type LoadOptions,
  ConfigLoaderService,
  ConfigLoaderLive,
  CONFIG_FILE_NAMES,
  createConfigLoader,
  defineConfig,
} from "./services/config-loader.js";

// Errors
export * from "./errors.js";

// Query IR
export type {
  Span,
  Cardinality,
  BindParam,
  Query,
  QueryModule,
  DescribedColumn,
  StatementDescription,
  DescribedQuery,
  IntrospectedColumn,
  IntrospectedQuery,
  IntrospectedModule,
  TypeRef,
  PgTypeKind,
  ScalarType,
  EnumType,
  DomainType,
  CompositeField,
  CompositeType,
  ArrayType,
  RangeType,
  PgType,
  NamedPgType,
  ResolvedParam,
  ResolvedColumn,
  ResolvedQuery,
  ResolvedModule,
} from "./ir/query-ir.js";
export { Cardinalities, isCardinality, isNamedPgType } from "./ir/query-ir.js";
export { TypeRegistry, type ShapeField, type ShapeSpace } from "./ir/type-registry.js";

// Annotation parsing
export { parseQueryModule } from "./services/annotation-parser.js";
export { readQuerySources, type QuerySource } from "./services/query-sources.js";

// Catalog
export {
  type Catalog,
  type CatalogAttribute,
  type CatalogOptions,
  type CatalogType,
  type TypType,
  CatalogService,
  CatalogLive,
  createCatalog,
  maskConnectionString,
} from "./services/catalog.js";
export {
  type DescribedModule,
  type DescribeResult,
  type FetchError,
  type IntrospectResult,
  type TypeFetcher,
  createTypeFetcher,
  describeModules,
  introspectModules,
} from "./services/introspection.js";

// Type mapping
export {
  PgTypeOid,
  TsType,
  defaultPgToTs,
  composeMappers,
  extensionMapper,
  overrideMapper,
  scalarMapper,
  ExtensionTypeMap,
  type TypeMapper,
} from "./services/pg-types.js";

// Resolution
export { ATTENUATING_KEYWORDS, isAttenuated, resolveModules, type ResolveResult } from "./services/type-resolver.js";

// Inflection
export {
  type Inflection,
  defaultInflection,
  camelCase,
  pascalCase,
  safeIdentifier,
} from "./services/inflection.js";

// Emission
export {
  type EmitOptions,
  type EmittedFile,
  emitModule,
  emitModules,
  generatedHeader,
  outputPathFor,
} from "./services/code-emitter.js";
export {
  type FileWriter,
  type WriteOptions,
  type WriteResult,
  createFileWriter,
} from "./services/file-writer.js";

// Diagnostics
export { formatDiagnostic, formatDiagnostics, sortDiagnostics } from "./services/diagnostics.js";

// Generate
export {
  type GenerateOptions,
  type GenerateResult,
  type GenerateError,
  generate,
  generateWithConfig,
  GenerateLive,
  runGenerate,
} from "./generate.js";
