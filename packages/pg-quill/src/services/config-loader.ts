/**
 * Config Loader Service
 *
 * Loads and validates pgquill.config.{js,mjs,cjs,json}, or the `pgquill` key
 * of package.json, using lilconfig. Wraps the async config loading in Effect
 * for proper error handling.
 */
import { dirname, resolve } from "node:path";
import { Context, Effect, Layer, ParseResult, Schema as S, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { Config, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigInvalid, ConfigNotFound } from "../errors.js";

export interface LoadOptions {
  /** Explicit path to a config file */
  readonly configPath?: string;
  /** Directory to search from (default: cwd) */
  readonly searchFrom?: string;
}

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  readonly load: (options?: LoadOptions) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * ConfigLoader service tag
 */
export class ConfigLoaderService extends Context.Tag("ConfigLoader")<ConfigLoaderService, ConfigLoader>() {}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "package.json",
  "pgquill.config.js",
  "pgquill.config.mjs",
  "pgquill.config.cjs",
  "pgquill.config.json",
];

function createLilconfig() {
  return lilconfig("pgquill", { searchPlaces: CONFIG_FILE_NAMES });
}

function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(
    issue => `${issue.path.length > 0 ? issue.path.join(".") + ": " : ""}${issue.message}`,
  );
}

/** Fill `connectionString` from the environment when the file leaves it out */
const withEnvironment = (config: unknown, databaseUrl: string | undefined): unknown =>
  databaseUrl !== undefined && typeof config === "object" && config !== null && !("connectionString" in config)
    ? { ...config, connectionString: databaseUrl }
    : config;

/**
 * Create a ConfigLoader implementation. Without a config file, defaults and
 * DATABASE_URL are enough to run.
 */
export function createConfigLoader(env: Readonly<Record<string, string | undefined>> = process.env): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const searchFrom = options?.searchFrom ?? process.cwd();
        const configPath = options?.configPath;

        const result = yield* Effect.tryPromise({
          try: () => (configPath ? lc.load(resolve(searchFrom, configPath)) : lc.search(searchFrom)),
          catch: error =>
            new ConfigInvalid({
              message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
              path: configPath ?? searchFrom,
              errors: [String(error)],
            }),
        });

        const databaseUrl = env["DATABASE_URL"];
        if ((!result || result.isEmpty) && databaseUrl === undefined) {
          return yield* Effect.fail(
            new ConfigNotFound({
              message: "No configuration file found and DATABASE_URL is not set",
              searchPaths: CONFIG_FILE_NAMES.map(name => `${searchFrom}/${name}`),
            }),
          );
        }

        const found = result && !result.isEmpty ? result : undefined;
        const filepath = found?.filepath;
        const raw: unknown = found ? found.config : {};

        yield* Effect.logDebug(filepath ? `Loaded config from ${filepath}` : "No config file; using defaults");

        const parsed = yield* pipe(
          S.decodeUnknown(Config)(withEnvironment(raw, databaseUrl)),
          Effect.mapError(
            parseError =>
              new ConfigInvalid({
                message: `Invalid configuration in ${filepath ?? "defaults"}`,
                path: filepath ?? searchFrom,
                errors: formatSchemaErrors(parseError),
              }),
          ),
        );

        const resolved: ResolvedConfig = {
          ...parsed,
          configDir: filepath ? dirname(filepath) : searchFrom,
        };
        return resolved;
      }),
  };
}

/**
 * Live layer for ConfigLoader
 */
export const ConfigLoaderLive = Layer.succeed(ConfigLoaderService, createConfigLoader());

/**
 * Helper to define a config (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
