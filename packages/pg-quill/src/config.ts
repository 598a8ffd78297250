/**
 * Configuration schema for pg-quill
 */
import { Schema as S } from "effect";

/**
 * Extra scalar mapping: a type OID or a (optionally schema-qualified) type
 * name, and the TypeScript type text to emit for it.
 */
export const TypeOverride = S.Struct({
  type: S.Union(S.Number, S.String),
  tsType: S.String,
});
export type TypeOverride = S.Schema.Type<typeof TypeOverride>;

const PositiveInt = S.Number.pipe(
  S.int(),
  S.positive({ message: () => "must be a positive integer" }),
);

/**
 * Main configuration schema
 */
export const Config = S.Struct({
  /** Database connection string */
  connectionString: S.propertySignature(
    S.String.annotations({
      message: () => "must be a string - set DATABASE_URL env var or add connectionString to config",
    }),
  ).annotations({
    missingMessage: () => "is required - set DATABASE_URL env var or add connectionString to config",
  }),

  /** Root directory searched recursively for `.sql` files */
  queriesDir: S.optionalWith(S.String, { default: () => "queries" }),

  /** Output directory root */
  outputDir: S.optionalWith(S.String, { default: () => "src/generated" }),

  /** Number of connections used to describe queries */
  concurrency: S.optionalWith(PositiveInt, { default: () => 4 }),

  /** Module generated code imports its run-time support from */
  runtimeModule: S.optionalWith(S.String, { default: () => "pg-quill/runtime" }),

  /** Extra scalar type mappings, consulted before the built-in table */
  typeOverrides: S.optionalWith(S.Array(TypeOverride), { default: () => [] }),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type, as accepted by `defineConfig()`.
 */
export interface ConfigInput {
  /** Database connection string (default: the DATABASE_URL env var) */
  readonly connectionString?: string;

  /** Root directory of the `.sql` files (default: "queries") */
  readonly queriesDir?: string;

  /** Output directory root (default: "src/generated") */
  readonly outputDir?: string;

  /** Describe pool size (default: 4) */
  readonly concurrency?: number;

  /** Import path of the run-time module (default: "pg-quill/runtime") */
  readonly runtimeModule?: string;

  /**
   * Extra scalar mappings.
   *
   * @example
   * ```typescript
   * typeOverrides: [
   *   { type: "int8", tsType: "string" },
   *   { type: "public.money_cents", tsType: "number" },
   * ]
   * ```
   */
  readonly typeOverrides?: readonly TypeOverride[];
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  readonly connectionString: string;
  readonly queriesDir: string;
  readonly outputDir: string;
  readonly concurrency: number;
  readonly runtimeModule: string;
  readonly typeOverrides: readonly TypeOverride[];
  /** Directory relative paths in the config are resolved against */
  readonly configDir: string;
}
