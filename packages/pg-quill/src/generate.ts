/**
 * Generate Orchestration Function
 *
 * Threads together the code generation pipeline:
 * 1. Load config
 * 2. Read and parse query files
 * 3. Describe every query against the database
 * 4. Introspect the types they mention
 * 5. Resolve signatures and deduplicate shapes
 * 6. Emit and write one module per file
 *
 * Problems scoped to a query or a file are collected across the whole run
 * and reported together; nothing is written if there are any. Connection
 * loss and catalog inconsistencies stop the run at once.
 *
 * Logging:
 * - Effect.log (INFO) - Progress messages shown by default
 * - Effect.logDebug (DEBUG) - Detailed info (query names, file lists)
 *
 * Configure via Logger.withMinimumLogLevel at the call site.
 */
import { Array as Arr, Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import type { ResolvedConfig } from "./config.js"
import {
  type CatalogConsistencyError,
  type ConfigInvalid,
  type ConfigNotFound,
  type ConnectionFailed,
  type Diagnostic,
  GenerationFailed,
  type SourceReadError,
  type WriteError,
} from "./errors.js"
import type { QueryModule } from "./ir/query-ir.js"
import { TypeRegistry } from "./ir/type-registry.js"
import { parseQueryModule } from "./services/annotation-parser.js"
import { CatalogLive, CatalogService } from "./services/catalog.js"
import { emitModules, type EmittedFile } from "./services/code-emitter.js"
import { ConfigLoaderLive, ConfigLoaderService } from "./services/config-loader.js"
import { defaultInflection } from "./services/inflection.js"
import { describeModules, introspectModules } from "./services/introspection.js"
import { createFileWriter, type WriteResult } from "./services/file-writer.js"
import { readQuerySources } from "./services/query-sources.js"
import { resolveModules } from "./services/type-resolver.js"

/**
 * Options for the generate function
 */
export interface GenerateOptions {
  /** Path to config file (optional - will search if not provided) */
  readonly configPath?: string
  /** Directory to search for config from (default: cwd) */
  readonly searchFrom?: string
  /** Override queries directory from config */
  readonly queriesDir?: string
  /** Override output directory from config */
  readonly outputDir?: string
  /** Dry run - don't write files, just return what would be written */
  readonly dryRun?: boolean
}

/**
 * Result of a generate operation
 */
export interface GenerateResult {
  readonly config: ResolvedConfig
  /** The run's type schema */
  readonly registry: TypeRegistry
  readonly files: readonly EmittedFile[]
  readonly writeResults: readonly WriteResult[]
}

/**
 * All possible errors from the generate pipeline
 */
export type GenerateError =
  | ConfigNotFound
  | ConfigInvalid
  | SourceReadError
  | ConnectionFailed
  | CatalogConsistencyError
  | GenerationFailed
  | WriteError

const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? "" : "s"}`

/**
 * Run the pipeline for an already loaded config. The catalog comes from the
 * environment, so tests can provide an in-memory one.
 */
export const generateWithConfig = (
  config: ResolvedConfig,
  options: Omit<GenerateOptions, "configPath" | "searchFrom"> = {},
): Effect.Effect<
  GenerateResult,
  Exclude<GenerateError, ConfigNotFound | ConfigInvalid>,
  CatalogService | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const path = yield* Path.Path
    // Overrides are relative to the working directory, config paths to the config file
    const queriesDir = options.queriesDir
      ? path.resolve(options.queriesDir)
      : path.resolve(config.configDir, config.queriesDir)
    const outputDir = options.outputDir
      ? path.resolve(options.outputDir)
      : path.resolve(config.configDir, config.outputDir)

    // 1. Read and parse
    yield* Effect.log(`Reading queries from ${queriesDir}...`)
    const sources = yield* readQuerySources(queriesDir)
    const sourceText = new Map(sources.map(s => [s.path, s.text]))
    yield* Effect.logDebug(`Files: ${sources.map(s => s.path).join(", ")}`)

    const [syntaxErrors, parsed] = Arr.partitionMap(sources, source => parseQueryModule(source.path, source.text))
    const modules: readonly QueryModule[] = parsed
    const queryCount = modules.reduce((n, m) => n + m.queries.length, 0)
    yield* Effect.log(`Found ${plural(queryCount, "query")} in ${plural(sources.length, "file")}`)

    // 2. Describe
    yield* Effect.log("Describing queries...")
    const described = yield* describeModules(modules, config.concurrency)

    // 3. Introspect
    yield* Effect.log("Resolving types...")
    const registry = new TypeRegistry(defaultInflection.typeName)
    const introspected = yield* introspectModules(described.modules, registry, config.typeOverrides)

    // 4. Resolve
    const resolved = resolveModules(registry, introspected.modules, defaultInflection)

    const diagnostics: readonly Diagnostic[] = [
      ...syntaxErrors.flat(),
      ...described.diagnostics,
      ...introspected.diagnostics,
      ...resolved.diagnostics,
    ]
    if (diagnostics.length > 0) {
      return yield* Effect.fail(
        new GenerationFailed({
          message: `${plural(diagnostics.length, "problem")} found; no files were written`,
          diagnostics,
          sources: sourceText,
        }),
      )
    }

    const named = registry.types().filter(t => registry.typeName(t.oid) !== undefined)
    yield* Effect.log(`Resolved ${plural(registry.types().length, "type")} (${named.length} named)`)

    // 5. Emit and write
    const files = emitModules(registry, resolved.modules, {
      runtimeModule: config.runtimeModule,
      inflection: defaultInflection,
    })

    yield* Effect.log(`Writing to ${outputDir}...`)
    const writeResults = yield* createFileWriter().writeAll(files, {
      outputDir,
      dryRun: options.dryRun ?? false,
    })

    yield* Effect.forEach(writeResults, result => {
      const status = options.dryRun ? "(dry run)" : result.written ? "✓" : "–"
      return Effect.logDebug(`${status} ${result.path}`)
    })

    const written = writeResults.filter(r => r.written).length
    yield* Effect.log(`Wrote ${plural(written, "file")}${options.dryRun ? " (dry run)" : ""}`)

    return { config, registry, files, writeResults }
  })

/**
 * The main generate pipeline
 */
export const generate = (
  options: GenerateOptions = {},
): Effect.Effect<GenerateResult, GenerateError, ConfigLoaderService | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    yield* Effect.logDebug("Loading configuration...")
    const loader = yield* ConfigLoaderService
    const config = yield* loader.load({ configPath: options.configPath, searchFrom: options.searchFrom })

    return yield* generateWithConfig(config, options).pipe(
      Effect.provide(
        CatalogLive({ connectionString: config.connectionString, concurrency: config.concurrency }),
      ),
    )
  })

/**
 * Layer that provides all services needed for generate()
 *
 * The catalog is not included: it needs the connection string from the
 * loaded config, so generate() provides it itself.
 */
export const GenerateLive: Layer.Layer<ConfigLoaderService> = ConfigLoaderLive

/**
 * Run generate with all dependencies provided
 *
 * This is the main entry point for programmatic usage.
 * Requires FileSystem and Path from @effect/platform.
 */
export const runGenerate = (
  options: GenerateOptions = {},
): Effect.Effect<GenerateResult, GenerateError, FileSystem.FileSystem | Path.Path> =>
  generate(options).pipe(Effect.provide(GenerateLive))
